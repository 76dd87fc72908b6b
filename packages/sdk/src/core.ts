/**
 * Core Prior SDK client implementation.
 */

import { randomUUID } from "node:crypto";

import { type ConfigProvider, DEFAULT_BASE_URL, FileConfigStore } from "./config.js";
import { APIError, PriorError, RegistrationError } from "./exceptions.js";
import { HTTPTransport, type Timeout } from "./http.js";
import { type APIResponse, isEnvelope, isRecord } from "./types.js";

export const SDK_VERSION = "0.1.0";
export const USER_AGENT = `prior-node/${SDK_VERSION}`;
/** Runtime tag sent when this client registers a new agent. */
export const REGISTRATION_HOST = "node";
export const REGISTER_PATH = "/v1/agents/register";
const PATH_PARAM_RE = /\{([^{}]+)\}/g;

export interface RegistrationEvent {
  agentId: string | null;
  baseUrl: string;
  /** Where the new credentials were saved. */
  location: string;
}

export interface PriorSDKOptions {
  apiKey?: string | null;
  baseUrl?: string | null;
  /** Credential source; defaults to `~/.prior/config.json`. */
  config?: ConfigProvider;
  timeout?: Timeout;
  onRegistered?: (event: RegistrationEvent) => void;
}

export interface RequestOptions {
  pathParams?: Record<string, unknown> | null;
  json?: unknown;
  timeout?: Timeout | null;
}

export class PriorSDK {
  readonly baseUrl: string;
  private key: string | null;
  private agent: string | null;
  private config: ConfigProvider;
  private transport: HTTPTransport;
  private registration: Promise<void> | null = null;
  private onRegistered?: (event: RegistrationEvent) => void;

  constructor(options: PriorSDKOptions = {}) {
    this.config = options.config ?? new FileConfigStore();
    const stored = this.config.load();
    this.baseUrl = normalizeBaseUrl(options.baseUrl || stored.baseUrl || DEFAULT_BASE_URL);
    this.key = options.apiKey || stored.apiKey || null;
    this.agent = stored.agentId;
    this.transport = new HTTPTransport({ timeout: options.timeout });
    this.onRegistered = options.onRegistered;
  }

  get apiKey(): string | null {
    return this.key;
  }

  get agentId(): string | null {
    return this.agent;
  }

  get configLocation(): string {
    return this.config.location;
  }

  /**
   * Register a new agent if no API key was resolved at construction.
   * Runs at most once per instance; a failed registration stays failed.
   */
  ensureRegistered(): Promise<void> {
    if (this.registration) return this.registration;
    if (this.key) return Promise.resolve();
    this.registration = this.register();
    return this.registration;
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<APIResponse> {
    await this.ensureRegistered();

    const normalized = await this.transport.request({
      method,
      url: `${this.baseUrl}${resolvePath(path, options.pathParams)}`,
      headers: this.headers(),
      json: options.json,
      timeout: options.timeout ?? undefined,
    });

    raiseForStatus(normalized);
    return normalized;
  }

  get(path: string, options?: RequestOptions): Promise<APIResponse> {
    return this.request("GET", path, options);
  }

  post(path: string, options?: RequestOptions): Promise<APIResponse> {
    return this.request("POST", path, options);
  }

  delete(path: string, options?: RequestOptions): Promise<APIResponse> {
    return this.request("DELETE", path, options);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      "User-Agent": USER_AGENT,
    };
    if (this.key) headers["Authorization"] = `Bearer ${this.key}`;
    return headers;
  }

  private async register(): Promise<void> {
    let normalized: APIResponse;
    try {
      normalized = await this.transport.request({
        method: "POST",
        url: `${this.baseUrl}${REGISTER_PATH}`,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          "User-Agent": USER_AGENT,
        },
        json: { name: generateAgentName(), host: REGISTRATION_HOST },
      });
      raiseForStatus(normalized);
    } catch (err) {
      if (!(err instanceof PriorError)) throw err;
      throw new RegistrationError(`Auto-registration failed: ${err.message}`, { cause: err });
    }

    const credentials = extractCredentials(normalized.data);
    if (!credentials.apiKey) {
      const serverError = envelopeError(normalized.data);
      throw new RegistrationError(
        serverError
          ? `Auto-registration failed: ${serverError}`
          : "Auto-registration failed: response did not include an API key.",
      );
    }

    this.key = credentials.apiKey;
    this.agent = credentials.agentId;
    this.config.save({ baseUrl: this.baseUrl, apiKey: this.key, agentId: this.agent });
    this.onRegistered?.({
      agentId: this.agent,
      baseUrl: this.baseUrl,
      location: this.config.location,
    });
  }
}

// --- Helpers ---

export function generateAgentName(): string {
  return `prior-node-${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

/** Read `apiKey`/`agentId` from a flat body or a `{ data: {...} }` envelope. */
export function extractCredentials(payload: unknown): { apiKey: string | null; agentId: string | null } {
  const source = isRecord(payload) && isRecord(payload["data"]) ? payload["data"] : payload;
  if (!isRecord(source)) return { apiKey: null, agentId: null };
  const apiKey = source["apiKey"];
  const agentId = source["agentId"];
  return {
    apiKey: typeof apiKey === "string" && apiKey ? apiKey : null,
    agentId: typeof agentId === "string" && agentId ? agentId : null,
  };
}

/** The `error` text of an `ok: false` envelope, if there is one. */
function envelopeError(payload: unknown): string | null {
  if (!isEnvelope(payload) || payload.ok) return null;
  const error = payload.error;
  return typeof error === "string" && error.trim() ? error.trim() : null;
}

function normalizeBaseUrl(baseUrl: string): string {
  const normalized = baseUrl.trim();
  if (!normalized) throw new PriorError("baseUrl cannot be empty");
  return normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

function resolvePath(
  path: string,
  pathParams?: Record<string, unknown> | null,
): string {
  if (!path) throw new PriorError("path cannot be empty");

  let basePath = path.startsWith("/") ? path : `/${path}`;
  const requiredParams = [...new Set(Array.from(basePath.matchAll(PATH_PARAM_RE), (m) => m[1]))].sort();
  if (requiredParams.length === 0) return basePath;

  for (const key of requiredParams) {
    const value = pathParams?.[key];
    if (value == null || value === "") {
      throw new PriorError(`Missing required path parameter: ${key}`);
    }
    basePath = basePath.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
  }

  return basePath;
}

function extractErrorMessage(payload: unknown, fallback: string): string {
  if (typeof payload === "string" && payload.trim()) return payload.trim();

  if (isRecord(payload)) {
    for (const key of ["error", "message", "detail", "errors"]) {
      const value = payload[key];
      if (typeof value === "string" && value.trim()) return value.trim();
      if (Array.isArray(value) || isRecord(value)) {
        return JSON.stringify(value);
      }
    }
  }

  if (payload != null) {
    const asJson = JSON.stringify(payload);
    if (asJson && asJson !== "{}") return asJson;
  }

  return fallback.trim() || "An unknown API error occurred.";
}

function raiseForStatus(response: APIResponse): void {
  if (response.ok) return;

  const detail = extractErrorMessage(response.data, response.text);
  throw new APIError({
    statusCode: response.statusCode,
    message: `Request failed with status ${response.statusCode}: ${detail}`,
    payload: response.data,
    requestId: response.requestId,
  });
}
