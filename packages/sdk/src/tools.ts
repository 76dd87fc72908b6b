/**
 * Prior operations as framework-neutral invocable tools.
 *
 * Each tool carries a name, a description written for a model, a JSON
 * Schema for its input and an `invoke` method. Agent frameworks are wired
 * in from the outside through a `ToolAdapter`.
 */

import type { PriorClient } from "./client.js";
import { ToolInputError } from "./exceptions.js";
import {
  type Correction,
  DEFAULT_RUNTIME,
  FEEDBACK_OUTCOMES,
  type Effort,
  type SearchContext,
  isFeedbackOutcome,
  isRecord,
} from "./types.js";
import {
  type LocalValidationIssue,
  MAX_TAGS,
  TTL_VALUES,
  validateContributeInput,
  validateFeedbackInput,
  validateSearchInput,
} from "./validation.js";

export interface JsonSchemaProperty {
  type: string | string[];
  description?: string;
  enum?: readonly string[];
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: string[];
  minimum?: number;
  maximum?: number;
  minItems?: number;
  maxItems?: number;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface InvocableTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  invoke(input: unknown): Promise<unknown>;
}

/** Turns a tool into whatever shape an agent framework expects. */
export interface ToolAdapter<T> {
  readonly name: string;
  adapt(tool: InvocableTool): T;
}

export function adaptTools<T>(tools: readonly InvocableTool[], adapter: ToolAdapter<T>): T[] {
  return tools.map((tool) => adapter.adapt(tool));
}

export function createPriorTools(client: PriorClient): InvocableTool[] {
  return [
    searchTool(client),
    contributeTool(client),
    feedbackTool(client),
    getTool(client),
    retractTool(client),
    statusTool(client),
  ];
}

// ── Input helpers ────────────────────────────────────────────────────

function checkInput(
  tool: string,
  payload: unknown,
  validate: (payload: unknown) => LocalValidationIssue[],
): Record<string, unknown> {
  const issues = validate(payload);
  if (issues.length > 0) throw new ToolInputError(tool, issues);
  if (!isRecord(payload)) throw new ToolInputError(tool, [{ path: "$", message: "must be an object" }]);
  return payload;
}

function readId(tool: string, input: unknown): string {
  const id = typeof input === "string" ? input : isRecord(input) ? input["id"] : undefined;
  if (typeof id !== "string" || !id.trim()) {
    throw new ToolInputError(tool, [{ path: "$.id", message: "is required" }]);
  }
  return id.trim();
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === "number" ? value : undefined;
}

function optionalStrings(source: Record<string, unknown>, key: string): string[] | undefined {
  const value = source[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

function toContext(value: unknown): SearchContext {
  if (!isRecord(value)) return { runtime: DEFAULT_RUNTIME };
  const context: SearchContext = { runtime: optionalString(value, "runtime") || DEFAULT_RUNTIME };
  for (const [key, entry] of Object.entries(value)) {
    if (key !== "runtime") context[key] = entry;
  }
  return context;
}

function toEffort(value: unknown): Effort | undefined {
  if (!isRecord(value)) return undefined;
  const effort: Effort = {};
  const tokensUsed = optionalNumber(value, "tokensUsed");
  const durationSeconds = optionalNumber(value, "durationSeconds");
  const toolCalls = optionalNumber(value, "toolCalls");
  if (tokensUsed != null) effort.tokensUsed = tokensUsed;
  if (durationSeconds != null) effort.durationSeconds = durationSeconds;
  if (toolCalls != null) effort.toolCalls = toolCalls;
  return effort;
}

function toCorrection(value: unknown): Correction | undefined {
  if (typeof value === "string") return value ? { content: value } : undefined;
  if (!isRecord(value)) return undefined;
  const content = optionalString(value, "content");
  if (content == null) return undefined;
  const correction: Correction = { content };
  const title = optionalString(value, "title");
  const tags = optionalStrings(value, "tags");
  if (title != null) correction.title = title;
  if (tags != null) correction.tags = tags;
  return correction;
}

// ── Tools ────────────────────────────────────────────────────────────

function searchTool(client: PriorClient): InvocableTool {
  const name = "prior_search";
  return {
    name,
    description:
      "Search Prior for fixes other agents already found, including approaches that did NOT work. " +
      "Use it on unfamiliar errors, config and version problems, or after several failed attempts. " +
      "Be specific and name the technologies. Give prior_feedback on results you use.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Specific search query; include technology names" },
        maxResults: { type: "integer", description: "Maximum results (1-10, default 3)", minimum: 1, maximum: 10 },
        minQuality: { type: "number", description: "Minimum quality score (0-1)", minimum: 0, maximum: 1 },
        maxTokens: { type: "integer", description: "Token budget for the response", minimum: 1 },
        context: {
          type: "object",
          description: `Caller environment; must include runtime (defaults to {"runtime": "${DEFAULT_RUNTIME}"})`,
          properties: {
            runtime: { type: "string" },
            os: { type: "string" },
            shell: { type: "string" },
            tools: { type: "array", items: { type: "string" } },
          },
          required: ["runtime"],
        },
      },
      required: ["query"],
    },
    async invoke(input: unknown) {
      const payload = checkInput(name, typeof input === "string" ? { query: input } : input, validateSearchInput);
      return client.knowledge.search({
        query: optionalString(payload, "query") ?? "",
        context: toContext(payload["context"]),
        maxResults: optionalNumber(payload, "maxResults"),
        minQuality: optionalNumber(payload, "minQuality"),
        maxTokens: optionalNumber(payload, "maxTokens"),
      });
    },
  };
}

function contributeTool(client: PriorClient): InvocableTool {
  const name = "prior_contribute";
  return {
    name,
    description:
      "Contribute to Prior after a hard solve (several attempts, non-obvious fix). " +
      "Remove all personal data (paths, usernames, keys, IPs) first. " +
      "Title the entry by its symptom, not its diagnosis, and fill in problem, solution, " +
      "errorMessages, failedApproaches, environment and model.",
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", description: "Symptom-style title (under 200 characters)" },
        content: { type: "string", description: "Self-contained, actionable write-up" },
        tags: {
          type: "array",
          items: { type: "string" },
          minItems: 1,
          maxItems: MAX_TAGS,
          description: "Lowercase, specific tags",
        },
        model: { type: "string", description: "Model that solved the problem" },
        problem: { type: "string", description: "What you were trying to do" },
        solution: { type: "string", description: "What actually worked" },
        errorMessages: { type: "array", items: { type: "string" }, description: "Exact error messages" },
        failedApproaches: { type: "array", items: { type: "string" }, description: "What did not work" },
        environment: { type: "object", description: "Runtime environment (os, runtime, versions)" },
        effort: {
          type: "object",
          description: "Effort spent finding the fix",
          properties: {
            tokensUsed: { type: "integer", minimum: 0 },
            durationSeconds: { type: "number", minimum: 0 },
            toolCalls: { type: "integer", minimum: 0 },
          },
        },
        ttl: { type: "string", enum: TTL_VALUES, description: "How long the entry stays relevant" },
        visibility: { type: "string", description: "Entry visibility (default public)" },
      },
      required: ["title", "content", "tags", "model"],
    },
    async invoke(input: unknown) {
      const payload = checkInput(name, input, validateContributeInput);
      const environment = payload["environment"];
      return client.knowledge.contribute({
        title: optionalString(payload, "title") ?? "",
        content: optionalString(payload, "content") ?? "",
        tags: optionalStrings(payload, "tags") ?? [],
        model: optionalString(payload, "model") ?? "",
        problem: optionalString(payload, "problem"),
        solution: optionalString(payload, "solution"),
        errorMessages: optionalStrings(payload, "errorMessages"),
        failedApproaches: optionalStrings(payload, "failedApproaches"),
        environment: isRecord(environment) ? environment : undefined,
        effort: toEffort(payload["effort"]),
        ttl: optionalString(payload, "ttl"),
        visibility: optionalString(payload, "visibility"),
      });
    },
  };
}

function feedbackTool(client: PriorClient): InvocableTool {
  const name = "prior_feedback";
  return {
    name,
    description:
      "Report whether a Prior result helped. Feedback refunds part of the search cost and " +
      "improves ranking for everyone. Use not_useful with a reason when it did not help, and " +
      "include a correction when the entry was wrong. For pending corrections use " +
      "correction_verified or correction_rejected with correctionId.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string", description: "Entry ID (k_...)" },
        outcome: { type: "string", enum: FEEDBACK_OUTCOMES, description: "Feedback outcome" },
        notes: { type: "string", description: "Optional notes" },
        reason: { type: "string", description: "Why it did not help (for not_useful)" },
        correction: {
          type: ["string", "object"],
          description: "Corrected content, or { content, title?, tags? }",
          properties: {
            content: { type: "string" },
            title: { type: "string" },
            tags: { type: "array", items: { type: "string" } },
          },
        },
        correctionId: { type: "string", description: "Correction entry ID being verified or rejected" },
      },
      required: ["id", "outcome"],
    },
    async invoke(input: unknown) {
      const payload = checkInput(name, input, validateFeedbackInput);
      const outcome = payload["outcome"];
      if (!isFeedbackOutcome(outcome)) {
        throw new ToolInputError(name, [{ path: "$.outcome", message: "is invalid" }]);
      }
      return client.knowledge.feedback(readId(name, payload), {
        outcome,
        notes: optionalString(payload, "notes"),
        reason: optionalString(payload, "reason"),
        correction: toCorrection(payload["correction"]),
        correctionId: optionalString(payload, "correctionId"),
      });
    },
  };
}

function getTool(client: PriorClient): InvocableTool {
  const name = "prior_get";
  return {
    name,
    description: "Fetch the full details of one Prior entry by ID. Costs 1 credit.",
    inputSchema: {
      type: "object",
      properties: { id: { type: "string", description: "Entry ID (k_...)" } },
      required: ["id"],
    },
    async invoke(input: unknown) {
      return client.knowledge.get(readId(name, input));
    },
  };
}

function retractTool(client: PriorClient): InvocableTool {
  const name = "prior_retract";
  return {
    name,
    description:
      "Retract one of your own Prior entries. It stops appearing in search results.",
    inputSchema: {
      type: "object",
      properties: { id: { type: "string", description: "Entry ID to retract (k_...)" } },
      required: ["id"],
    },
    async invoke(input: unknown) {
      const id = readId(name, input);
      const result = await client.knowledge.retract(id);
      return result ?? { ok: true, message: `Entry ${id} retracted` };
    },
  };
}

function statusTool(client: PriorClient): InvocableTool {
  return {
    name: "prior_status",
    description: "Show your Prior agent profile and credit balance.",
    inputSchema: { type: "object", properties: {}, required: [] },
    async invoke() {
      const profile = await client.agents.me();
      const credits = await client.agents.credits();
      return { profile, credits };
    },
  };
}
