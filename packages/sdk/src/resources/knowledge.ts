/**
 * Knowledge resource: wraps /v1/knowledge endpoints.
 *
 * Optional fields are left out of request bodies rather than sent as null.
 */
import type { PriorSDK } from "../core.js";
import {
  type ContributeOptions,
  DEFAULT_VISIBILITY,
  type FeedbackOptions,
  type SearchOptions,
} from "../types.js";

export const DEFAULT_MAX_RESULTS = 3;

export class KnowledgeResource {
  constructor(private client: PriorSDK) { }

  // ── Search ─────────────────────────────────────────────────────────
  async search(options: SearchOptions): Promise<unknown> {
    return (await this.client.post("/v1/knowledge/search", { json: buildSearchPayload(options) })).data;
  }

  // ── Contribute ─────────────────────────────────────────────────────
  async contribute(options: ContributeOptions): Promise<unknown> {
    return (await this.client.post("/v1/knowledge/contribute", { json: buildContributePayload(options) })).data;
  }

  // ── Feedback ───────────────────────────────────────────────────────
  async feedback(entryId: string, options: FeedbackOptions): Promise<unknown> {
    return (await this.client.post("/v1/knowledge/{id}/feedback", {
      pathParams: { id: entryId },
      json: buildFeedbackPayload(options),
    })).data;
  }

  // ── Get by ID ──────────────────────────────────────────────────────
  async get(entryId: string): Promise<unknown> {
    return (await this.client.get("/v1/knowledge/{id}", { pathParams: { id: entryId } })).data;
  }

  // ── Retract ────────────────────────────────────────────────────────
  async retract(entryId: string): Promise<unknown> {
    return (await this.client.delete("/v1/knowledge/{id}", { pathParams: { id: entryId } })).data;
  }
}

export function buildSearchPayload(options: SearchOptions): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    query: options.query,
    maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS,
    context: options.context,
  };
  if (options.minQuality) payload["minQuality"] = options.minQuality;
  if (options.maxTokens) payload["maxTokens"] = options.maxTokens;
  return payload;
}

export function buildContributePayload(options: ContributeOptions): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    title: options.title,
    content: options.content,
    tags: options.tags,
    model: options.model,
  };
  if (options.problem != null) payload["problem"] = options.problem;
  if (options.solution != null) payload["solution"] = options.solution;
  if (options.errorMessages != null) payload["errorMessages"] = options.errorMessages;
  if (options.failedApproaches != null) payload["failedApproaches"] = options.failedApproaches;
  if (options.environment != null) payload["environment"] = options.environment;
  if (options.effort != null) payload["effort"] = options.effort;
  if (options.ttl != null) payload["ttl"] = options.ttl;
  if (options.visibility != null && options.visibility !== DEFAULT_VISIBILITY) {
    payload["visibility"] = options.visibility;
  }
  return payload;
}

export function buildFeedbackPayload(options: FeedbackOptions): Record<string, unknown> {
  const payload: Record<string, unknown> = { outcome: options.outcome };
  if (options.notes != null) payload["notes"] = options.notes;
  if (options.reason != null) payload["reason"] = options.reason;
  if (options.correction != null) payload["correction"] = options.correction;
  if (options.correctionId != null) payload["correctionId"] = options.correctionId;
  return payload;
}
