/**
 * Local input validators, run before any network call.
 * They mirror the server's request constraints for search, contribute and
 * feedback so that callers get feedback without spending credits.
 */

import type { ToolInputIssue } from "./exceptions.js";
import { FEEDBACK_OUTCOMES, isFeedbackOutcome, isRecord } from "./types.js";

export type LocalValidationIssue = ToolInputIssue;

export const TTL_VALUES = ["30d", "60d", "90d", "365d", "evergreen"] as const;
export const MAX_TAGS = 10;

function addIssue(issues: LocalValidationIssue[], path: string, message: string): void {
  issues.push({ path, message });
}

function validateString(
  value: unknown,
  issues: LocalValidationIssue[],
  path: string,
  opts: { required?: boolean; minLength?: number; maxLength?: number } = {},
): void {
  const required = opts.required ?? false;
  const minLength = opts.minLength ?? 0;
  const maxLength = opts.maxLength;

  if (value == null) {
    if (required) addIssue(issues, path, "is required");
    return;
  }
  if (typeof value !== "string") {
    addIssue(issues, path, "must be a string");
    return;
  }
  if (value.length < minLength) {
    addIssue(issues, path, minLength === 1 ? "must not be empty" : `must be at least ${minLength} characters`);
  }
  if (maxLength != null && value.length > maxLength) {
    addIssue(issues, path, `must be <= ${maxLength} characters`);
  }
}

function validateNumber(
  value: unknown,
  issues: LocalValidationIssue[],
  path: string,
  opts: { min?: number; max?: number; integer?: boolean } = {},
): void {
  if (value == null) return;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    addIssue(issues, path, "must be a number");
    return;
  }
  if (opts.integer && !Number.isInteger(value)) {
    addIssue(issues, path, "must be an integer");
  }
  if (opts.min != null && value < opts.min) {
    addIssue(issues, path, `must be >= ${opts.min}`);
  }
  if (opts.max != null && value > opts.max) {
    addIssue(issues, path, `must be <= ${opts.max}`);
  }
}

function validateObject(
  value: unknown,
  issues: LocalValidationIssue[],
  path: string,
  required = false,
): value is Record<string, unknown> {
  if (value == null) {
    if (required) addIssue(issues, path, "is required");
    return false;
  }
  if (!isRecord(value)) {
    addIssue(issues, path, "must be an object");
    return false;
  }
  return true;
}

function validateStringArray(
  value: unknown,
  issues: LocalValidationIssue[],
  path: string,
  opts: { required?: boolean; min?: number; max?: number } = {},
): void {
  if (value == null) {
    if (opts.required) addIssue(issues, path, "is required");
    return;
  }
  if (!Array.isArray(value)) {
    addIssue(issues, path, "must be an array of strings");
    return;
  }
  if (opts.min != null && value.length < opts.min) {
    addIssue(issues, path, `must contain at least ${opts.min} item${opts.min === 1 ? "" : "s"}`);
  }
  if (opts.max != null && value.length > opts.max) {
    addIssue(issues, path, `must contain at most ${opts.max} items`);
  }
  value.forEach((item, index) => {
    if (typeof item !== "string" || !item.trim()) {
      addIssue(issues, `${path}[${index}]`, "must be a non-empty string");
    }
  });
}

export function validateSearchInput(payload: unknown): LocalValidationIssue[] {
  const issues: LocalValidationIssue[] = [];
  if (!validateObject(payload, issues, "$", true)) return issues;

  validateString(payload["query"], issues, "$.query", { required: true, minLength: 1 });
  validateNumber(payload["maxResults"], issues, "$.maxResults", { min: 1, max: 10, integer: true });
  validateNumber(payload["minQuality"], issues, "$.minQuality", { min: 0, max: 1 });
  validateNumber(payload["maxTokens"], issues, "$.maxTokens", { min: 1, integer: true });

  const context = payload["context"];
  if (validateObject(context, issues, "$.context")) {
    validateString(context["runtime"], issues, "$.context.runtime", { required: true, minLength: 1 });
    validateString(context["os"], issues, "$.context.os");
    validateString(context["shell"], issues, "$.context.shell");
    validateStringArray(context["tools"], issues, "$.context.tools");
  }
  return issues;
}

export function validateContributeInput(payload: unknown): LocalValidationIssue[] {
  const issues: LocalValidationIssue[] = [];
  if (!validateObject(payload, issues, "$", true)) return issues;

  validateString(payload["title"], issues, "$.title", { required: true, minLength: 1, maxLength: 200 });
  validateString(payload["content"], issues, "$.content", { required: true, minLength: 1, maxLength: 10_000 });
  validateStringArray(payload["tags"], issues, "$.tags", { required: true, min: 1, max: MAX_TAGS });
  validateString(payload["model"], issues, "$.model", { required: true, minLength: 1 });
  validateString(payload["problem"], issues, "$.problem");
  validateString(payload["solution"], issues, "$.solution");
  validateStringArray(payload["errorMessages"], issues, "$.errorMessages");
  validateStringArray(payload["failedApproaches"], issues, "$.failedApproaches");
  validateObject(payload["environment"], issues, "$.environment");

  const effort = payload["effort"];
  if (validateObject(effort, issues, "$.effort")) {
    validateNumber(effort["tokensUsed"], issues, "$.effort.tokensUsed", { min: 0, integer: true });
    validateNumber(effort["durationSeconds"], issues, "$.effort.durationSeconds", { min: 0 });
    validateNumber(effort["toolCalls"], issues, "$.effort.toolCalls", { min: 0, integer: true });
  }

  const ttl = payload["ttl"];
  if (ttl != null && !TTL_VALUES.some((value) => value === ttl)) {
    addIssue(issues, "$.ttl", `must be one of: ${TTL_VALUES.join(", ")}`);
  }
  validateString(payload["visibility"], issues, "$.visibility", { minLength: 1 });
  return issues;
}

export function validateFeedbackInput(payload: unknown): LocalValidationIssue[] {
  const issues: LocalValidationIssue[] = [];
  if (!validateObject(payload, issues, "$", true)) return issues;

  validateString(payload["id"], issues, "$.id", { required: true, minLength: 1 });

  const outcome = payload["outcome"];
  if (outcome == null) {
    addIssue(issues, "$.outcome", "is required");
  } else if (!isFeedbackOutcome(outcome)) {
    addIssue(issues, "$.outcome", `must be one of: ${FEEDBACK_OUTCOMES.join(", ")}`);
  }

  validateString(payload["notes"], issues, "$.notes");
  validateString(payload["reason"], issues, "$.reason");
  validateString(payload["correctionId"], issues, "$.correctionId", { minLength: 1 });

  const correction = payload["correction"];
  if (correction != null && typeof correction !== "string") {
    if (validateObject(correction, issues, "$.correction")) {
      validateString(correction["content"], issues, "$.correction.content", { required: true, minLength: 1 });
      validateString(correction["title"], issues, "$.correction.title");
      validateStringArray(correction["tags"], issues, "$.correction.tags", { max: MAX_TAGS });
    }
  }
  return issues;
}
