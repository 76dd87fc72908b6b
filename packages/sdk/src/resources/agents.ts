/**
 * Agents resource: profile, credits and the email claim flow.
 */
import type { PriorSDK } from "../core.js";

export class AgentsResource {
  constructor(private client: PriorSDK) { }

  // ── Profile ────────────────────────────────────────────────────────
  async me(): Promise<unknown> {
    return (await this.client.get("/v1/agents/me")).data;
  }

  // ── Credits ────────────────────────────────────────────────────────
  async credits(): Promise<unknown> {
    return (await this.client.get("/v1/agents/me/credits")).data;
  }

  // ── Contributions ──────────────────────────────────────────────────
  async contributions(): Promise<unknown> {
    return (await this.client.get("/v1/agents/me/contributions")).data;
  }

  // ── Claim (sends a one-time code to the address) ───────────────────
  async claim(email: string): Promise<unknown> {
    return (await this.client.post("/v1/agents/claim", { json: { email } })).data;
  }

  // ── Verify ─────────────────────────────────────────────────────────
  async verify(code: string): Promise<unknown> {
    return (await this.client.post("/v1/agents/verify", { json: { code } })).data;
  }
}
