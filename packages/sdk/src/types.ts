/**
 * Shared typed data structures for the SDK.
 */

import { ResponseParseError } from "./exceptions.js";

export interface APIResponse {
  statusCode: number;
  headers: Record<string, string>;
  text: string;
  /** Parsed JSON body, or `undefined` when the body was empty. */
  data: unknown;
  requestUrl: string;
  requestMethod: string;
  requestId: string | null;
  ok: boolean;
}

export async function fromFetchResponse(response: Response, requestMethod: string): Promise<APIResponse> {
  const text = await response.text();
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  const ok = response.status >= 200 && response.status < 300;

  return {
    statusCode: response.status,
    headers,
    text,
    data: parseResponseData(text, response.status, ok),
    requestUrl: response.url,
    requestMethod,
    requestId: response.headers.get("x-request-id") ?? null,
    ok,
  };
}

function parseResponseData(responseText: string, statusCode: number, strict: boolean): unknown {
  if (!responseText.trim()) return undefined;
  try {
    return JSON.parse(responseText);
  } catch (err) {
    // Error bodies are often plain text; only a successful reply must be JSON.
    if (!strict) return undefined;
    const detail = err instanceof Error ? err.message : String(err);
    throw new ResponseParseError({
      statusCode,
      text: responseText,
      message: `Invalid JSON in response (status ${statusCode}): ${detail}`,
    });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Domain types ─────────────────────────────────────────────────────

/** Persisted credentials. */
export interface CredentialRecord {
  baseUrl: string;
  apiKey: string | null;
  agentId: string | null;
}

export const DEFAULT_RUNTIME = "node";

/** Context sent with every search; `runtime` is required by the server. */
export interface SearchContext {
  runtime: string;
  os?: string;
  shell?: string;
  tools?: string[];
  [key: string]: unknown;
}

export interface SearchOptions {
  query: string;
  context: SearchContext;
  maxResults?: number;
  /** 0–1. Omitted from the request when unset or zero. */
  minQuality?: number;
  /** Omitted from the request when unset or zero. */
  maxTokens?: number;
}

export interface Effort {
  tokensUsed?: number;
  durationSeconds?: number;
  toolCalls?: number;
  [key: string]: unknown;
}

export type Environment = Record<string, unknown>;

export const DEFAULT_VISIBILITY = "public";

export interface ContributeOptions {
  title: string;
  content: string;
  tags: string[];
  model: string;
  problem?: string;
  solution?: string;
  errorMessages?: string[];
  failedApproaches?: string[];
  environment?: Environment;
  effort?: Effort;
  ttl?: string;
  visibility?: string;
}

export const FEEDBACK_OUTCOMES = [
  "useful",
  "not_useful",
  "correction_verified",
  "correction_rejected",
] as const;

export type FeedbackOutcome = (typeof FEEDBACK_OUTCOMES)[number];

export function isFeedbackOutcome(value: unknown): value is FeedbackOutcome {
  return FEEDBACK_OUTCOMES.some((outcome) => outcome === value);
}

export interface Correction {
  content: string;
  title?: string;
  tags?: string[];
}

export interface FeedbackOptions {
  outcome: FeedbackOutcome;
  notes?: string;
  reason?: string;
  correction?: Correction;
  correctionId?: string;
}

/** Shape of every Prior response body. */
export interface Envelope<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
}

export function isEnvelope(value: unknown): value is Envelope {
  return isRecord(value) && typeof value["ok"] === "boolean";
}
