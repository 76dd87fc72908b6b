import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  PriorSDK,
  USER_AGENT,
  extractCredentials,
  generateAgentName,
} from "../src/core.js";
import { DEFAULT_BASE_URL, MemoryConfigStore } from "../src/config.js";
import {
  APIError,
  NetworkError,
  RegistrationError,
  RequestTimeoutError,
  ResponseParseError,
} from "../src/exceptions.js";

function jsonResponse(status: number, body: unknown, headers?: Record<string, string>): Response {
  const h = new Headers({ "content-type": "application/json", ...(headers ?? {}) });
  return new Response(JSON.stringify(body), { status, headers: h });
}

function registrationResponse(apiKey = "ask_test", agentId = "ag_test"): Response {
  return jsonResponse(200, { ok: true, data: { apiKey, agentId } });
}

describe("PriorSDK", () => {
  let originalFetch: typeof globalThis.fetch;
  let mockFetch: ReturnType<typeof vi.fn<typeof globalThis.fetch>>;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
    mockFetch = vi.fn<typeof globalThis.fetch>();
    globalThis.fetch = mockFetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  describe("constructor", () => {
    it("uses the default base URL when nothing is configured", () => {
      const sdk = new PriorSDK({ config: new MemoryConfigStore() });
      expect(sdk.baseUrl).toBe(DEFAULT_BASE_URL);
    });

    it("strips a trailing slash from the base URL", () => {
      const sdk = new PriorSDK({ baseUrl: "https://prior.test/", config: new MemoryConfigStore() });
      expect(sdk.baseUrl).toBe("https://prior.test");
    });

    it("prefers the explicit base URL over the stored one", () => {
      const config = new MemoryConfigStore({ baseUrl: "https://stored.test" });
      const sdk = new PriorSDK({ baseUrl: "https://explicit.test", config });
      expect(sdk.baseUrl).toBe("https://explicit.test");
    });

    it("reads stored credentials", () => {
      const config = new MemoryConfigStore({ apiKey: "stored-key", agentId: "ag_stored" });
      const sdk = new PriorSDK({ config });
      expect(sdk.apiKey).toBe("stored-key");
      expect(sdk.agentId).toBe("ag_stored");
    });

    it("prefers the explicit API key over the stored one", () => {
      const config = new MemoryConfigStore({ apiKey: "stored-key" });
      const sdk = new PriorSDK({ apiKey: "explicit-key", config });
      expect(sdk.apiKey).toBe("explicit-key");
    });

    it("lets environment variables override the stored record", () => {
      const config = new MemoryConfigStore(
        { apiKey: "stored-key", baseUrl: "https://stored.test" },
        { env: { PRIOR_API_KEY: "env-key", PRIOR_BASE_URL: "https://env.test/" } },
      );
      const sdk = new PriorSDK({ config });
      expect(sdk.apiKey).toBe("env-key");
      expect(sdk.baseUrl).toBe("https://env.test");
    });

    it("makes no network call while constructing", () => {
      new PriorSDK({ config: new MemoryConfigStore() });
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe("request", () => {
    it("sends auth, user agent and JSON headers", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: true, data: {} }));
      const sdk = new PriorSDK({ apiKey: "test-key", baseUrl: "https://prior.test", config: new MemoryConfigStore() });

      await sdk.get("/v1/agents/me");

      const [url, init] = mockFetch.mock.calls[0]!;
      expect(url).toBe("https://prior.test/v1/agents/me");
      expect(init!.method).toBe("GET");
      const headers = init!.headers as Record<string, string>;
      expect(headers["Authorization"]).toBe("Bearer test-key");
      expect(headers["User-Agent"]).toBe(USER_AGENT);
      expect(headers["Accept"]).toBe("application/json");
      expect(headers["Content-Type"]).toBe("application/json");
    });

    it("serializes the JSON body", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: true }));
      const sdk = new PriorSDK({ apiKey: "test-key", baseUrl: "https://prior.test", config: new MemoryConfigStore() });

      await sdk.post("/v1/agents/claim", { json: { email: "dev@example.com" } });

      const init = mockFetch.mock.calls[0]![1]!;
      expect(init.method).toBe("POST");
      expect(init.body).toBe('{"email":"dev@example.com"}');
    });

    it("substitutes and encodes path parameters", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: true }));
      const sdk = new PriorSDK({ apiKey: "test-key", baseUrl: "https://prior.test", config: new MemoryConfigStore() });

      await sdk.get("/v1/knowledge/{id}", { pathParams: { id: "k/1 2" } });

      expect(mockFetch.mock.calls[0]![0]).toBe("https://prior.test/v1/knowledge/k%2F1%202");
    });

    it("rejects a missing path parameter before calling fetch", async () => {
      const sdk = new PriorSDK({ apiKey: "test-key", config: new MemoryConfigStore() });

      await expect(sdk.get("/v1/knowledge/{id}")).rejects.toThrow("Missing required path parameter: id");
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("returns the parsed envelope as data", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: true, data: { credits: 42 } }, { "x-request-id": "req-1" }));
      const sdk = new PriorSDK({ apiKey: "test-key", config: new MemoryConfigStore() });

      const response = await sdk.get("/v1/agents/me");

      expect(response.statusCode).toBe(200);
      expect(response.ok).toBe(true);
      expect(response.data).toEqual({ ok: true, data: { credits: 42 } });
      expect(response.requestId).toBe("req-1");
    });

    it("leaves data undefined for an empty body", async () => {
      mockFetch.mockResolvedValue(new Response("", { status: 200 }));
      const sdk = new PriorSDK({ apiKey: "test-key", config: new MemoryConfigStore() });

      const response = await sdk.delete("/v1/knowledge/{id}", { pathParams: { id: "k_1" } });

      expect(response.data).toBeUndefined();
    });

    it("throws ResponseParseError for a non-JSON success body", async () => {
      mockFetch.mockResolvedValue(new Response("<html>", { status: 200 }));
      const sdk = new PriorSDK({ apiKey: "test-key", config: new MemoryConfigStore() });

      await expect(sdk.get("/v1/agents/me")).rejects.toBeInstanceOf(ResponseParseError);
    });

    it("throws APIError with the envelope error text on non-2xx", async () => {
      mockFetch.mockResolvedValue(jsonResponse(402, { ok: false, error: "Insufficient credits" }));
      const sdk = new PriorSDK({ apiKey: "test-key", config: new MemoryConfigStore() });

      const err = await sdk.post("/v1/knowledge/search", { json: {} }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(APIError);
      const apiError = err as APIError;
      expect(apiError.statusCode).toBe(402);
      expect(apiError.message).toBe("Request failed with status 402: Insufficient credits");
      expect(apiError.payload).toEqual({ ok: false, error: "Insufficient credits" });
    });

    it("falls back to the raw text for a plain-text error body", async () => {
      mockFetch.mockResolvedValue(new Response("Bad Gateway", { status: 502 }));
      const sdk = new PriorSDK({ apiKey: "test-key", config: new MemoryConfigStore() });

      await expect(sdk.get("/v1/agents/me")).rejects.toThrow("Request failed with status 502: Bad Gateway");
    });

    it("wraps fetch failures in NetworkError", async () => {
      mockFetch.mockRejectedValue(new TypeError("fetch failed"));
      const sdk = new PriorSDK({ apiKey: "test-key", baseUrl: "https://prior.test", config: new MemoryConfigStore() });

      const err = await sdk.get("/v1/agents/me").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NetworkError);
      expect((err as NetworkError).message).toBe(
        "Network request failed for https://prior.test/v1/agents/me: fetch failed",
      );
    });

    it("maps an aborted request to RequestTimeoutError", async () => {
      const abort = new Error("This operation was aborted");
      abort.name = "AbortError";
      mockFetch.mockRejectedValue(abort);
      const sdk = new PriorSDK({
        apiKey: "test-key",
        baseUrl: "https://prior.test",
        timeout: 50,
        config: new MemoryConfigStore(),
      });

      await expect(sdk.get("/v1/agents/me")).rejects.toThrow(
        new RequestTimeoutError("Request to https://prior.test/v1/agents/me timed out after 50ms."),
      );
    });

    it("times out when the body stalls after the headers", async () => {
      const stalled = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"ok":'));
        },
      });
      mockFetch.mockResolvedValue(new Response(stalled, { status: 200 }));
      const sdk = new PriorSDK({
        apiKey: "test-key",
        baseUrl: "https://prior.test",
        timeout: 50,
        config: new MemoryConfigStore(),
      });

      const err = await sdk.get("/v1/agents/me").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RequestTimeoutError);
      expect((err as RequestTimeoutError).message).toBe(
        "Request to https://prior.test/v1/agents/me timed out after 50ms.",
      );
    });

    it("aborts the fetch signal when the timeout fires", async () => {
      const seen: { signal?: AbortSignal | null } = {};
      mockFetch.mockImplementation((_input, init) => {
        seen.signal = init?.signal;
        return new Promise<Response>(() => {});
      });
      const sdk = new PriorSDK({ apiKey: "test-key", timeout: 20, config: new MemoryConfigStore() });

      await expect(sdk.get("/v1/agents/me")).rejects.toBeInstanceOf(RequestTimeoutError);
      expect(seen.signal?.aborted).toBe(true);
    });
  });

  describe("auto-registration", () => {
    it("registers before the first call when no key is configured", async () => {
      mockFetch
        .mockResolvedValueOnce(registrationResponse("ask_new", "ag_new"))
        .mockResolvedValueOnce(jsonResponse(200, { ok: true, data: {} }));
      const config = new MemoryConfigStore();
      const sdk = new PriorSDK({ baseUrl: "https://prior.test", config });

      await sdk.get("/v1/agents/me");

      expect(mockFetch).toHaveBeenCalledTimes(2);
      const [registerUrl, registerInit] = mockFetch.mock.calls[0]!;
      expect(registerUrl).toBe("https://prior.test/v1/agents/register");
      expect(registerInit!.method).toBe("POST");
      const registerHeaders = registerInit!.headers as Record<string, string>;
      expect(registerHeaders["Authorization"]).toBeUndefined();
      const body = JSON.parse(String(registerInit!.body)) as { name: string; host: string };
      expect(body.host).toBe("node");
      expect(body.name).toMatch(/^prior-node-[0-9a-f]{8}$/);

      const callHeaders = mockFetch.mock.calls[1]![1]!.headers as Record<string, string>;
      expect(callHeaders["Authorization"]).toBe("Bearer ask_new");
    });

    it("persists the new credentials and reports them once", async () => {
      mockFetch
        .mockResolvedValueOnce(registrationResponse("ask_new", "ag_new"))
        .mockResolvedValueOnce(jsonResponse(200, { ok: true }));
      const config = new MemoryConfigStore();
      const onRegistered = vi.fn();
      const sdk = new PriorSDK({ baseUrl: "https://prior.test/", config, onRegistered });

      await sdk.get("/v1/agents/me");

      expect(config.saves).toBe(1);
      expect(config.record).toEqual({ baseUrl: "https://prior.test", apiKey: "ask_new", agentId: "ag_new" });
      expect(sdk.apiKey).toBe("ask_new");
      expect(sdk.agentId).toBe("ag_new");
      expect(onRegistered).toHaveBeenCalledOnce();
      expect(onRegistered).toHaveBeenCalledWith({
        agentId: "ag_new",
        baseUrl: "https://prior.test",
        location: "memory",
      });
    });

    it("registers only once across concurrent calls", async () => {
      mockFetch.mockImplementation(async (input) =>
        String(input).endsWith("/v1/agents/register")
          ? registrationResponse()
          : jsonResponse(200, { ok: true }),
      );
      const config = new MemoryConfigStore();
      const sdk = new PriorSDK({ baseUrl: "https://prior.test", config });

      await Promise.all([sdk.get("/v1/agents/me"), sdk.get("/v1/agents/me/credits")]);
      await sdk.get("/v1/agents/me");

      const registerCalls = mockFetch.mock.calls.filter(([url]) => String(url).endsWith("/register"));
      expect(registerCalls).toHaveLength(1);
      expect(mockFetch).toHaveBeenCalledTimes(4);
      expect(config.saves).toBe(1);
    });

    it("skips registration when a key is stored", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: true }));
      const sdk = new PriorSDK({ config: new MemoryConfigStore({ apiKey: "stored-key" }) });

      await sdk.get("/v1/agents/me");

      expect(mockFetch).toHaveBeenCalledOnce();
      expect(String(mockFetch.mock.calls[0]![0])).toContain("/v1/agents/me");
    });

    it("accepts a flat registration body", async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse(201, { apiKey: "ask_flat", agentId: "ag_flat" }))
        .mockResolvedValueOnce(jsonResponse(200, { ok: true }));
      const sdk = new PriorSDK({ config: new MemoryConfigStore() });

      await sdk.ensureRegistered();

      expect(sdk.apiKey).toBe("ask_flat");
    });

    it("fails the call with RegistrationError when the server rejects registration", async () => {
      mockFetch.mockResolvedValue(jsonResponse(503, { ok: false, error: "Registration closed" }));
      const config = new MemoryConfigStore();
      const sdk = new PriorSDK({ config });

      const err = await sdk.get("/v1/agents/me").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RegistrationError);
      expect((err as RegistrationError).message).toBe(
        "Auto-registration failed: Request failed with status 503: Registration closed",
      );
      expect((err as RegistrationError).cause).toBeInstanceOf(APIError);
      expect(config.saves).toBe(0);
      expect(mockFetch).toHaveBeenCalledOnce();
    });

    it("reports the server's error text from an ok:false registration reply", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: false, error: "Agent name already taken" }));
      const config = new MemoryConfigStore();
      const sdk = new PriorSDK({ config });

      await expect(sdk.ensureRegistered()).rejects.toThrow(
        new RegistrationError("Auto-registration failed: Agent name already taken"),
      );
      expect(config.saves).toBe(0);
    });

    it("does not retry a failed registration", async () => {
      mockFetch.mockResolvedValue(jsonResponse(500, { ok: false, error: "boom" }));
      const sdk = new PriorSDK({ config: new MemoryConfigStore() });

      await expect(sdk.get("/v1/agents/me")).rejects.toBeInstanceOf(RegistrationError);
      await expect(sdk.get("/v1/agents/me")).rejects.toBeInstanceOf(RegistrationError);

      expect(mockFetch).toHaveBeenCalledOnce();
    });

    it("fails when the registration response has no API key", async () => {
      mockFetch.mockResolvedValue(jsonResponse(200, { ok: true, data: { agentId: "ag_only" } }));
      const config = new MemoryConfigStore();
      const sdk = new PriorSDK({ config });

      await expect(sdk.ensureRegistered()).rejects.toThrow(
        "Auto-registration failed: response did not include an API key.",
      );
      expect(config.saves).toBe(0);
    });
  });
});

describe("helpers", () => {
  it("generateAgentName uses the prior-node prefix and eight hex digits", () => {
    expect(generateAgentName()).toMatch(/^prior-node-[0-9a-f]{8}$/);
  });

  it("extractCredentials reads enveloped and flat bodies", () => {
    expect(extractCredentials({ ok: true, data: { apiKey: "k", agentId: "a" } })).toEqual({ apiKey: "k", agentId: "a" });
    expect(extractCredentials({ apiKey: "k" })).toEqual({ apiKey: "k", agentId: null });
    expect(extractCredentials("nope")).toEqual({ apiKey: null, agentId: null });
  });
});
