/**
 * Reconciles piped JSON (stdin) with command-line flags.
 *
 * Precedence is decided per field: a present, non-empty flag wins, then the
 * piped value, otherwise the field is absent. Nested objects (effort,
 * environment, correction) are merged sub-field by sub-field.
 */

import { readFileSync } from "node:fs";

import {
  type ContributeOptions,
  type Correction,
  DEFAULT_RUNTIME,
  type Effort,
  type Environment,
  FEEDBACK_OUTCOMES,
  type FeedbackOptions,
  type SearchContext,
  isFeedbackOutcome,
  isRecord,
} from "prior-sdk";

export const DEFAULT_MODEL = "unknown";

export type PipedInput = Record<string, unknown>;

export class InputError extends Error {
  readonly code: string;
  readonly hint?: string;

  constructor(message: string, options: { code?: string; hint?: string } = {}) {
    super(message);
    this.name = "InputError";
    this.code = options.code ?? "invalid_input";
    this.hint = options.hint;
  }
}

export interface ContributeFlags {
  title?: string;
  content?: string;
  /** Comma-separated. */
  tags?: string;
  model?: string;
  problem?: string;
  solution?: string;
  errorMessages?: string[];
  failedApproaches?: string[];
  /** Inline JSON object or @file. */
  environment?: string;
  effortTokens?: string;
  effortDuration?: string;
  effortToolCalls?: string;
  ttl?: string;
  visibility?: string;
}

export interface FeedbackFlags {
  notes?: string;
  reason?: string;
  correctionContent?: string;
  correctionTitle?: string;
  /** Comma-separated. */
  correctionTags?: string;
  correctionId?: string;
}

export interface SearchContextFlags {
  /** Inline JSON object or @file. */
  context?: string;
  runtime?: string;
  contextOs?: string;
  contextShell?: string;
  contextTools?: string[];
}

export interface FeedbackRequest {
  entryId: string;
  options: FeedbackOptions;
}

// ── Parsing ──────────────────────────────────────────────────────────

/** Parse piped text. Blank input means "nothing piped". */
export function parsePipedInput(text: string | null | undefined): PipedInput | null {
  if (text == null || !text.trim()) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new InputError(`Invalid JSON on stdin: ${errorDetail(err)}`, {
      code: "invalid_stdin",
      hint: "Pipe a single JSON object, e.g. {\"title\": \"...\"}.",
    });
  }
  if (!isRecord(parsed)) {
    throw new InputError(`Expected a JSON object on stdin, got ${describeJson(parsed)}.`, {
      code: "invalid_stdin",
      hint: "Pipe a single JSON object, e.g. {\"title\": \"...\"}.",
    });
  }
  return parsed;
}

/** Parse a flag that takes inline JSON, or `@path` to read it from a file. */
export function parseJsonFlag(flag: string, raw: string): unknown {
  let text = raw;
  if (raw.startsWith("@")) {
    const filePath = raw.slice(1).trim();
    try {
      text = readFileSync(filePath, "utf-8");
    } catch (err) {
      throw new InputError(`Unable to read ${flag} file ${filePath || "(empty path)"}: ${errorDetail(err)}`, {
        code: "invalid_option_value",
      });
    }
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new InputError(`Invalid JSON for ${flag}: ${errorDetail(err)}`, { code: "invalid_option_value" });
  }
}

export function parseJsonObjectFlag(flag: string, raw: string): Record<string, unknown> {
  const value = parseJsonFlag(flag, raw);
  if (!isRecord(value)) {
    throw new InputError(`Invalid JSON for ${flag}: expected an object, got ${describeJson(value)}.`, {
      code: "invalid_option_value",
    });
  }
  return value;
}

export function parseNumberFlag(
  flag: string,
  raw: string | undefined,
  opts: { integer?: boolean; min?: number; max?: number } = {},
): number | undefined {
  if (raw == null || raw.trim() === "") return undefined;
  const value = raw.trim();
  const pattern = opts.integer ? /^-?\d+$/ : /^-?(\d+\.?\d*|\.\d+)$/;
  const parsed = Number(value);
  const outOfRange = (opts.min != null && parsed < opts.min) || (opts.max != null && parsed > opts.max);
  if (!pattern.test(value) || !Number.isFinite(parsed) || outOfRange) {
    const kind = opts.integer ? "an integer" : "a number";
    const range = [
      opts.min != null ? `>= ${opts.min}` : null,
      opts.max != null ? `<= ${opts.max}` : null,
    ].filter(Boolean).join(" and ");
    throw new InputError(`Invalid value for ${flag}: ${raw}`, {
      code: "invalid_option_value",
      hint: `Use ${kind}${range ? ` ${range}` : ""}.`,
    });
  }
  return parsed;
}

export function splitList(raw: string): string[] {
  return raw.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

// ── Field pickers ────────────────────────────────────────────────────

function pipedString(piped: PipedInput | null, key: string): string | undefined {
  const value = piped?.[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new InputError(`stdin field "${key}" must be a string, got ${describeJson(value)}.`);
  }
  return value;
}

function pipedList(piped: PipedInput | null, key: string): string[] | undefined {
  const value = piped?.[key];
  if (value == null) return undefined;
  if (typeof value === "string") return nonEmpty(splitList(value));
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new InputError(`stdin field "${key}" must be a list of strings.`);
  }
  return nonEmpty(value.filter((item): item is string => typeof item === "string" && item.trim() !== ""));
}

function pipedObject(piped: PipedInput | null, key: string): Record<string, unknown> | undefined {
  const value = piped?.[key];
  if (value == null) return undefined;
  if (!isRecord(value)) {
    throw new InputError(`stdin field "${key}" must be an object, got ${describeJson(value)}.`);
  }
  return value;
}

function flagString(value: string | undefined): string | undefined {
  return value != null && value.trim() !== "" ? value : undefined;
}

function flagList(value: string | string[] | undefined): string[] | undefined {
  if (value == null) return undefined;
  const items = typeof value === "string"
    ? splitList(value)
    : value.map((item) => item.trim()).filter((item) => item !== "");
  return nonEmpty(items);
}

function nonEmpty(items: string[]): string[] | undefined {
  return items.length > 0 ? items : undefined;
}

/** Flag string, else piped string, else undefined. */
function pickString(flag: string | undefined, piped: PipedInput | null, key: string): string | undefined {
  return flagString(flag) ?? nonBlank(pipedString(piped, key));
}

function pickList(flag: string | string[] | undefined, piped: PipedInput | null, key: string): string[] | undefined {
  return flagList(flag) ?? pipedList(piped, key);
}

function nonBlank(value: string | undefined): string | undefined {
  return value != null && value !== "" ? value : undefined;
}

/** Piped object with the present flag sub-fields laid over it. */
function mergeObject(
  base: Record<string, unknown> | undefined,
  overrides: Record<string, unknown>,
): Record<string, unknown> | undefined {
  const merged: Record<string, unknown> = { ...(base ?? {}) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return Object.keys(merged).length > 0 ? merged : undefined;
}

function requireFields(missing: string[]): void {
  if (missing.length === 0) return;
  throw new InputError(
    `Missing required field${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
    { code: "missing_required_field", hint: "Pass the flags or pipe a JSON object on stdin." },
  );
}

// ── Commands ─────────────────────────────────────────────────────────

export function mergeContributeInput(flags: ContributeFlags, piped: PipedInput | null): ContributeOptions {
  const title = pickString(flags.title, piped, "title");
  const content = pickString(flags.content, piped, "content");
  const tags = pickList(flags.tags, piped, "tags");

  const environmentFlag = flagString(flags.environment);
  const environment: Environment | undefined = mergeObject(
    pipedObject(piped, "environment"),
    environmentFlag != null ? parseJsonObjectFlag("--environment", environmentFlag) : {},
  );

  const effort = toEffort(mergeObject(pipedObject(piped, "effort"), {
    tokensUsed: parseNumberFlag("--effort-tokens", flags.effortTokens, { integer: true, min: 0 }),
    durationSeconds: parseNumberFlag("--effort-duration", flags.effortDuration, { min: 0 }),
    toolCalls: parseNumberFlag("--effort-tool-calls", flags.effortToolCalls, { integer: true, min: 0 }),
  }));

  const missing: string[] = [];
  if (title == null) missing.push('title (--title or stdin "title")');
  if (content == null) missing.push('content (--content or stdin "content")');
  if (tags == null) missing.push('tags (--tags or stdin "tags")');
  requireFields(missing);

  const options: ContributeOptions = {
    title: title ?? "",
    content: content ?? "",
    tags: tags ?? [],
    model: pickString(flags.model, piped, "model") ?? DEFAULT_MODEL,
  };

  const problem = pickString(flags.problem, piped, "problem");
  const solution = pickString(flags.solution, piped, "solution");
  const errorMessages = pickList(flags.errorMessages, piped, "errorMessages");
  const failedApproaches = pickList(flags.failedApproaches, piped, "failedApproaches");
  const ttl = pickString(flags.ttl, piped, "ttl");
  const visibility = pickString(flags.visibility, piped, "visibility");

  if (problem != null) options.problem = problem;
  if (solution != null) options.solution = solution;
  if (errorMessages != null) options.errorMessages = errorMessages;
  if (failedApproaches != null) options.failedApproaches = failedApproaches;
  if (environment != null) options.environment = environment;
  if (effort != null) options.effort = effort;
  if (ttl != null) options.ttl = ttl;
  if (visibility != null) options.visibility = visibility;
  return options;
}

export function mergeFeedbackInput(
  args: { id?: string; outcome?: string },
  flags: FeedbackFlags,
  piped: PipedInput | null,
): FeedbackRequest {
  const entryId = flagString(args.id) ?? nonBlank(pipedString(piped, "entryId")) ?? nonBlank(pipedString(piped, "id"));
  const outcome = pickString(args.outcome, piped, "outcome");

  const pipedCorrection = piped?.["correction"];
  const correctionBase = typeof pipedCorrection === "string"
    ? (pipedCorrection ? { content: pipedCorrection } : undefined)
    : pipedObject(piped, "correction");
  const correction = mergeObject(correctionBase, {
    content: flagString(flags.correctionContent),
    title: flagString(flags.correctionTitle),
    tags: flagList(flags.correctionTags),
  });

  const missing: string[] = [];
  if (entryId == null) missing.push('entry ID (<id> argument or stdin "entryId")');
  if (outcome == null) missing.push('outcome (<outcome> argument or stdin "outcome")');
  if (correction != null && !(typeof correction["content"] === "string" && correction["content"])) {
    missing.push('correction content (--correction-content or stdin "correction.content")');
  }
  requireFields(missing);

  if (!isFeedbackOutcome(outcome)) {
    throw new InputError(`Invalid outcome "${outcome}".`, {
      code: "invalid_outcome",
      hint: `Use one of: ${FEEDBACK_OUTCOMES.join(", ")}.`,
    });
  }

  const options: FeedbackOptions = { outcome };
  const notes = pickString(flags.notes, piped, "notes");
  const reason = pickString(flags.reason, piped, "reason");
  const correctionId = pickString(flags.correctionId, piped, "correctionId");
  if (notes != null) options.notes = notes;
  if (reason != null) options.reason = reason;
  if (correction != null) options.correction = toCorrection(correction);
  if (correctionId != null) options.correctionId = correctionId;

  return { entryId: entryId ?? "", options };
}

function toEffort(merged: Record<string, unknown> | undefined): Effort | undefined {
  if (merged == null) return undefined;
  const effort: Effort = {};
  for (const [key, value] of Object.entries(merged)) effort[key] = value;
  return effort;
}

function toCorrection(merged: Record<string, unknown>): Correction {
  const content = merged["content"];
  const correction: Correction = { content: typeof content === "string" ? content : "" };
  const title = merged["title"];
  if (typeof title === "string" && title) correction.title = title;
  const tags = merged["tags"];
  if (Array.isArray(tags)) {
    const list = tags.filter((tag): tag is string => typeof tag === "string" && tag.trim() !== "");
    if (list.length > 0) correction.tags = list;
  }
  return correction;
}

export function buildSearchContext(flags: SearchContextFlags): SearchContext {
  const contextFlag = flagString(flags.context);
  const base = contextFlag != null ? parseJsonObjectFlag("--context", contextFlag) : {};
  const baseRuntime = base["runtime"];

  const context: SearchContext = {
    runtime: flagString(flags.runtime)
      ?? (typeof baseRuntime === "string" && baseRuntime ? baseRuntime : DEFAULT_RUNTIME),
  };
  for (const [key, value] of Object.entries(base)) {
    if (key !== "runtime") context[key] = value;
  }

  const os = flagString(flags.contextOs);
  const shell = flagString(flags.contextShell);
  const tools = flags.contextTools ? nonEmpty(flags.contextTools.flatMap(splitList)) : undefined;
  if (os != null) context.os = os;
  if (shell != null) context.shell = shell;
  if (tools != null) context.tools = tools;
  return context;
}

// ── Helpers ──────────────────────────────────────────────────────────

function errorDetail(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeJson(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return `a ${typeof value}`;
}
