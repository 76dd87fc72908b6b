/**
 * Human-readable output for CLI commands. Every formatter takes the
 * envelope's `data` as returned by the server and returns lines to print;
 * fields the server leaves out are shown as "?".
 */

import { isRecord } from "prior-sdk";

const RULE = "─".repeat(60);

function text(value: unknown, fallback = "?"): string {
  if (typeof value === "string" && value) return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return fallback;
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

/** Cut by code point so a surrogate pair is never split. */
function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  return chars.length > max ? `${chars.slice(0, max - 1).join("")}…` : value;
}

function record(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function formatStatus(data: unknown): string[] {
  const d = record(data);
  const lines = [
    `Agent:    ${text(d["agentId"])} (${text(d["agentName"])})`,
    `Credits:  ${text(d["credits"])}`,
    `Tier:     ${text(d["tier"])}`,
    `Entries:  ${text(d["contributions"])}`,
    `Earned:   ${text(d["totalEarned"])}  Spent: ${text(d["totalSpent"])}`,
  ];
  const email = d["email"];
  if (typeof email === "string" && email) {
    lines.push(`Email:    ${email} (${d["emailVerified"] ? "verified" : "unverified"})`);
  }
  return lines;
}

export function formatSearch(data: unknown): string[] {
  const d = record(data);
  const rawResults = d["results"];
  const results: unknown[] = Array.isArray(rawResults) ? rawResults : [];
  const cost = record(d["cost"]);
  const lines: string[] = [];

  if (results.length === 0) {
    lines.push("No results found.");
    if (!cost["creditsCharged"]) lines.push("(No charge for empty results)");
    return lines;
  }

  results.forEach((raw, index) => {
    const r = record(raw);
    const relevance = r["relevanceScore"];
    const score = typeof relevance === "number" ? relevance.toFixed(3) : "?";
    lines.push("", RULE);
    lines.push(`[${index + 1}] ${text(r["title"])}`);
    lines.push(`    ID: ${text(r["id"])}  Score: ${score}  Trust: ${text(r["trustLevel"])}`);
    lines.push(`    Tags: ${strings(r["tags"]).join(", ")}`);
    const problem = r["problem"];
    if (typeof problem === "string" && problem) lines.push(`    Problem: ${truncate(problem, 120)}`);
    const solution = r["solution"];
    if (typeof solution === "string" && solution) lines.push(`    Solution: ${truncate(solution, 120)}`);
    for (const message of strings(r["errorMessages"]).slice(0, 2)) {
      lines.push(`    Error: ${truncate(message, 100)}`);
    }
    const failed = strings(r["failedApproaches"]);
    if (failed.length > 0) lines.push(`    Failed approaches: ${failed.length}`);
  });

  const doNotTry = strings(d["doNotTry"]);
  if (doNotTry.length > 0) {
    lines.push("", "Do NOT try:");
    for (const item of doNotTry) lines.push(`  • ${item}`);
  }

  lines.push("", `Cost: ${text(cost["creditsCharged"])} credit(s)  Balance: ${text(cost["balanceRemaining"])}`);
  return lines;
}

export function formatContribution(data: unknown): string[] {
  const d = record(data);
  return [
    `Contributed: ${text(d["id"])}`,
    `Credits earned: ${text(d["creditsEarned"], "0")}`,
  ];
}

export function formatFeedback(data: unknown): string[] {
  const d = record(data);
  return [`Feedback recorded. Refund: ${text(d["creditsRefunded"], "0")} credit(s)`];
}

export function formatEntry(data: unknown): string[] {
  const d = record(data);
  return [
    `Title: ${text(d["title"])}`,
    `ID: ${text(d["id"])}  Status: ${text(d["status"])}  Quality: ${text(d["qualityScore"], "0")}`,
    `Tags: ${strings(d["tags"]).join(", ")}`,
    "",
    text(d["content"], ""),
  ];
}
