/**
 * Credential storage for the Prior SDK.
 *
 * Records live in `~/.prior/config.json` (directory overridable with
 * PRIOR_CONFIG_DIR). PRIOR_BASE_URL, PRIOR_API_KEY and PRIOR_AGENT_ID
 * override the stored values field by field after the file is read.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, resolve } from "node:path";

import { type CredentialRecord, isRecord } from "./types.js";

export const DEFAULT_BASE_URL = "https://share.cg3.io";
export const PRIOR_BASE_URL = "PRIOR_BASE_URL";
export const PRIOR_API_KEY = "PRIOR_API_KEY";
export const PRIOR_AGENT_ID = "PRIOR_AGENT_ID";
export const PRIOR_CONFIG_DIR = "PRIOR_CONFIG_DIR";

export type Env = Record<string, string | undefined>;

/** Where the client gets and puts its credentials. */
export interface ConfigProvider {
  /** Human-readable location, used in messages. */
  readonly location: string;
  load(): CredentialRecord;
  save(record: CredentialRecord): void;
}

export function defaultCredentials(): CredentialRecord {
  return { baseUrl: DEFAULT_BASE_URL, apiKey: null, agentId: null };
}

export function defaultConfigPath(env: Env = process.env): string {
  const dir = env[PRIOR_CONFIG_DIR] || resolve(homedir(), ".prior");
  return resolve(dir, "config.json");
}

/** Apply PRIOR_* variables on top of a loaded record. Empty values are ignored. */
export function applyEnvOverrides(record: CredentialRecord, env: Env): CredentialRecord {
  const merged = { ...record };
  const baseUrl = env[PRIOR_BASE_URL];
  if (baseUrl) merged.baseUrl = baseUrl;
  const apiKey = env[PRIOR_API_KEY];
  if (apiKey) merged.apiKey = apiKey;
  const agentId = env[PRIOR_AGENT_ID];
  if (agentId) merged.agentId = agentId;
  return merged;
}

export function recordFromJson(raw: unknown): CredentialRecord {
  const record = defaultCredentials();
  if (!isRecord(raw)) return record;
  const baseUrl = raw["base_url"];
  if (typeof baseUrl === "string" && baseUrl) record.baseUrl = baseUrl;
  const apiKey = raw["api_key"];
  if (typeof apiKey === "string" && apiKey) record.apiKey = apiKey;
  const agentId = raw["agent_id"];
  if (typeof agentId === "string" && agentId) record.agentId = agentId;
  return record;
}

export function recordToJson(record: CredentialRecord): Record<string, string | null> {
  return {
    base_url: record.baseUrl,
    api_key: record.apiKey,
    agent_id: record.agentId,
  };
}

export class FileConfigStore implements ConfigProvider {
  readonly path: string;
  private env: Env;

  constructor(options: { path?: string; env?: Env } = {}) {
    this.env = options.env ?? process.env;
    this.path = options.path ?? defaultConfigPath(this.env);
  }

  get location(): string {
    return this.path;
  }

  load(): CredentialRecord {
    return applyEnvOverrides(recordFromJson(this.readFile()), this.env);
  }

  save(record: CredentialRecord): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, JSON.stringify(recordToJson(record), null, 2) + "\n", "utf-8");
  }

  private readFile(): unknown {
    if (!existsSync(this.path)) return null;
    try {
      return JSON.parse(readFileSync(this.path, "utf-8"));
    } catch {
      // Unreadable or corrupt: behave as if there were no file.
      return null;
    }
  }
}

/** Keeps the record in memory. Same env override rules as the file store. */
export class MemoryConfigStore implements ConfigProvider {
  readonly location = "memory";
  record: CredentialRecord;
  saves = 0;
  private env: Env;

  constructor(initial: Partial<CredentialRecord> = {}, options: { env?: Env } = {}) {
    this.record = { ...defaultCredentials(), ...initial };
    this.env = options.env ?? {};
  }

  load(): CredentialRecord {
    return applyEnvOverrides(this.record, this.env);
  }

  save(record: CredentialRecord): void {
    this.record = { ...record };
    this.saves += 1;
  }
}
