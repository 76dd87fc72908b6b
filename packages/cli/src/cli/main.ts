/**
 * Main CLI program definition with Commander.js.
 *
 * Every command builds its request first (stdin + flags), then the client,
 * then makes exactly one SDK call. The client is only constructed once the
 * input is known to be valid, so bad input never reaches the network.
 */

import { Command, CommanderError } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import {
  APIError,
  DEFAULT_MAX_RESULTS,
  DEFAULT_RUNTIME,
  PriorError,
  createClient,
  isEnvelope,
  isRecord,
  type PriorClient,
  type PriorSDKOptions,
  type RegistrationEvent,
} from "prior-sdk";
import {
  formatContribution,
  formatEntry,
  formatFeedback,
  formatSearch,
  formatStatus,
} from "./format.js";
import {
  type ContributeFlags,
  type FeedbackFlags,
  InputError,
  type SearchContextFlags,
  buildSearchContext,
  mergeContributeInput,
  mergeFeedbackInput,
  parseNumberFlag,
  parsePipedInput,
} from "./input.js";
import { readPipedStdin } from "./stdin.js";

// --- Constants ---
const ERROR_SCHEMA_VERSION = "prior.error.v1";

export interface CliDeps {
  /** Build the SDK client; replaced in tests. */
  createClient?: (options: PriorSDKOptions) => PriorClient;
  /** Read piped stdin; `null` when nothing was piped. */
  readStdin?: () => Promise<string | null>;
}

interface GlobalOptions {
  json?: boolean;
  apiKey?: string;
  baseUrl?: string;
}

interface SearchFlags extends SearchContextFlags {
  maxResults?: string;
  minQuality?: string;
  maxTokens?: string;
}

/** A failure the CLI reports itself, e.g. an `ok: false` envelope. */
export class CliError extends Error {
  readonly code: string;
  readonly hint?: string;
  readonly details?: unknown;

  constructor(code: string, message: string, hint?: string, details?: unknown) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════

function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

function printLines(lines: string[]): void {
  for (const line of lines) console.log(line);
}

function printError(json: boolean, code: string, message: string, hint?: string, details?: unknown): void {
  if (json) {
    const payload: Record<string, unknown> = {
      schema: ERROR_SCHEMA_VERSION,
      code,
      message,
    };
    if (hint) payload["hint"] = hint;
    if (details !== undefined) payload["details"] = details;
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (hint) console.error(`Hint: ${hint}`);
}

function fail(code: string, message: string, hint?: string, details?: unknown): never {
  throw new CliError(code, message, hint, details);
}

/**
 * Unwrap a `{ ok, data, error }` envelope. Bodies that are not envelopes
 * are returned as they are.
 */
export function unwrapEnvelope(body: unknown): unknown {
  if (!isEnvelope(body)) return body;
  if (!body.ok) {
    const error = typeof body.error === "string" && body.error ? body.error : "Unknown error";
    fail("api_error", error);
  }
  return body.data;
}

/** Describe an API error by the envelope's `error` text when there is one. */
function apiErrorMessage(err: APIError): string {
  const payload = err.payload;
  if (isEnvelope(payload) && typeof payload.error === "string" && payload.error) {
    return `${payload.error} (HTTP ${err.statusCode})`;
  }
  return err.message;
}

function reportError(err: unknown, json: boolean): void {
  if (err instanceof CliError || err instanceof InputError) {
    printError(json, err.code, err.message, err.hint, err instanceof CliError ? err.details : undefined);
  } else if (err instanceof APIError) {
    printError(json, "request_failed", apiErrorMessage(err), undefined, err.payload ?? undefined);
  } else if (err instanceof PriorError) {
    printError(json, "request_failed", err.message);
  } else {
    printError(json, "cli_error", err instanceof Error ? err.message : String(err));
  }
}

/** Read the version from package.json so --version stays in sync. */
function readPackageVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(__dirname, "..", "..", "package.json");
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  const version = isRecord(pkg) ? pkg["version"] : undefined;
  return typeof version === "string" ? version : "0.0.0";
}

function notifyRegistered(event: RegistrationEvent): void {
  console.error(`Registered new agent ${event.agentId ?? "(no ID returned)"} at ${event.baseUrl}.`);
  console.error(`Credentials saved to ${event.location}`);
}

// ═══════════════════════════════════════════════════════════════════
// Main program
// ═══════════════════════════════════════════════════════════════════

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();
  const makeClient = deps.createClient ?? createClient;
  const readStdin = deps.readStdin ?? (() => readPipedStdin());

  program
    .name("prior")
    .description("Prior: the knowledge exchange for AI agents.")
    .version(readPackageVersion())
    .option("--json", "Output raw JSON")
    .option("--api-key <key>", "API key (overrides env/config)")
    .option("--base-url <url>", "Server URL (overrides env/config)");

  program.exitOverride();
  program.configureOutput({
    outputError: (str, write) => {
      if (program.opts<GlobalOptions>().json) return;
      write(str);
    },
  });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  /** Build an SDK client from global CLI options. */
  const buildClient = (): PriorClient => {
    const opts = globals();
    try {
      return makeClient({
        apiKey: opts.apiKey,
        baseUrl: opts.baseUrl,
        onRegistered: notifyRegistered,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail("client_init_failed", `Failed to initialize client: ${message}`);
    }
  };

  /** Print envelope data as JSON or through a human formatter. */
  const output = (body: unknown, human: (data: unknown) => string[]): void => {
    const data = unwrapEnvelope(body);
    if (globals().json) {
      // An empty response body still prints valid JSON.
      printJson(data === undefined ? null : data);
      return;
    }
    printLines(human(data));
  };

  const readPiped = async () => parsePipedInput(await readStdin());

  // ═════════════════════════════════════════════════════════════════
  // status
  // ═════════════════════════════════════════════════════════════════
  program
    .command("status")
    .description("Show agent info and credit balance.")
    .action(async () => {
      const client = buildClient();
      output(await client.agents.me(), formatStatus);
    });

  // ═════════════════════════════════════════════════════════════════
  // search
  // ═════════════════════════════════════════════════════════════════
  program
    .command("search <query...>")
    .description("Search the knowledge base. Costs credits; empty results are free.")
    .option("-n, --max-results <n>", `Max results (default: ${DEFAULT_MAX_RESULTS})`)
    .option("--min-quality <score>", "Minimum quality score (0-1)")
    .option("--max-tokens <n>", "Max tokens in the response")
    .option("--runtime <runtime>", `Runtime context (default: ${DEFAULT_RUNTIME})`)
    .option("--context-os <os>", "Operating system context")
    .option("--context-shell <shell>", "Shell context")
    .option("--context-tools <tools...>", "Tools available in your environment")
    .option("--context <json>", "Full context object as JSON (inline or @file)")
    .action(async (queryWords: string[], opts: SearchFlags) => {
      const query = queryWords.join(" ").trim();
      if (!query) fail("missing_query", "Query is required.");

      const context = buildSearchContext(opts);
      const maxResults = parseNumberFlag("--max-results", opts.maxResults, { integer: true, min: 1, max: 10 });
      const minQuality = parseNumberFlag("--min-quality", opts.minQuality, { min: 0, max: 1 });
      const maxTokens = parseNumberFlag("--max-tokens", opts.maxTokens, { integer: true, min: 1 });

      const client = buildClient();
      output(
        await client.knowledge.search({
          query,
          context,
          maxResults: maxResults ?? DEFAULT_MAX_RESULTS,
          minQuality,
          maxTokens,
        }),
        formatSearch,
      );
    });

  // ═════════════════════════════════════════════════════════════════
  // contribute
  // ═════════════════════════════════════════════════════════════════
  program
    .command("contribute")
    .description(
      "Contribute knowledge. Fields come from flags or a JSON object piped on stdin; flags win.",
    )
    .option("--title <title>", "Entry title (describe the symptom)")
    .option("--content <content>", "Full content/explanation")
    .option("--tags <tags>", "Comma-separated tags")
    .option("--model <model>", "Model that produced the fix (default: unknown)")
    .option("--problem <text>", "Structured problem description")
    .option("--solution <text>", "Structured solution description")
    .option("--error-messages <messages...>", "Exact error messages encountered")
    .option("--failed-approaches <approaches...>", "Approaches that did not work")
    .option("--environment <json>", "Environment object as JSON (inline or @file)")
    .option("--effort-tokens <n>", "Tokens spent finding the fix")
    .option("--effort-duration <seconds>", "Time spent finding the fix, in seconds")
    .option("--effort-tool-calls <n>", "Tool calls made finding the fix")
    .option("--ttl <ttl>", "Time to live: 30d, 60d, 90d, 365d or evergreen")
    .option("--visibility <visibility>", "Entry visibility (default: public)")
    .action(async (opts: ContributeFlags) => {
      const piped = await readPiped();
      const request = mergeContributeInput(opts, piped);

      const client = buildClient();
      output(await client.knowledge.contribute(request), formatContribution);
    });

  // ═════════════════════════════════════════════════════════════════
  // feedback
  // ═════════════════════════════════════════════════════════════════
  program
    .command("feedback [id] [outcome]")
    .description(
      "Give feedback on an entry: useful, not_useful, correction_verified or correction_rejected. " +
        "Fields may also be piped as JSON on stdin.",
    )
    .option("--reason <reason>", "Why it was not useful")
    .option("--notes <notes>", "Additional notes")
    .option("--correction-content <text>", "Corrected content for a wrong entry")
    .option("--correction-title <title>", "Title for the correction")
    .option("--correction-tags <tags>", "Comma-separated tags for the correction")
    .option("--correction-id <id>", "Correction being verified or rejected")
    .action(async (id: string | undefined, outcome: string | undefined, opts: FeedbackFlags) => {
      const piped = await readPiped();
      const request = mergeFeedbackInput({ id, outcome }, opts, piped);

      const client = buildClient();
      output(await client.knowledge.feedback(request.entryId, request.options), formatFeedback);
    });

  // ═════════════════════════════════════════════════════════════════
  // get
  // ═════════════════════════════════════════════════════════════════
  program
    .command("get <id>")
    .description("Get a knowledge entry by ID (e.g. k_abc123).")
    .action(async (id: string) => {
      const client = buildClient();
      output(await client.knowledge.get(id), formatEntry);
    });

  // ═════════════════════════════════════════════════════════════════
  // retract
  // ═════════════════════════════════════════════════════════════════
  program
    .command("retract <id>")
    .description("Retract one of your own contributions.")
    .action(async (id: string) => {
      const client = buildClient();
      const body = await client.knowledge.retract(id);
      output(body ?? { ok: true, data: { id } }, () => [`Retracted: ${id}`]);
    });

  // ═════════════════════════════════════════════════════════════════
  // claim / verify
  // ═════════════════════════════════════════════════════════════════
  program
    .command("claim <email>")
    .description("Link this agent to an email address; a verification code is sent there.")
    .action(async (email: string) => {
      const client = buildClient();
      output(await client.agents.claim(email), () => [
        `Verification code sent to ${email}.`,
        "Run `prior verify <code>` to finish claiming this agent.",
      ]);
    });

  program
    .command("verify <code>")
    .description("Finish claiming this agent with the code from the email.")
    .action(async (code: string) => {
      const client = buildClient();
      output(await client.agents.verify(code), () => ["Agent claimed successfully."]);
    });

  return program;
}

/** Run the CLI and resolve with the process exit code. */
export async function runCli(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps);
  const json = argv.slice(2).includes("--json");

  if (argv.length <= 2) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      if (
        err.code === "commander.helpDisplayed" ||
        err.code === "commander.help" ||
        err.code === "commander.version"
      ) {
        return 0;
      }
      if (json) printError(true, "cli_parse_error", err.message);
      return err.exitCode || 1;
    }
    reportError(err, json);
    return 1;
  }
}
