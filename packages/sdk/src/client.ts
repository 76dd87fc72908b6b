import { PriorSDK, type PriorSDKOptions } from "./core.js";
import { AgentsResource } from "./resources/agents.js";
import { KnowledgeResource } from "./resources/knowledge.js";

export interface PriorClient {
  /** Search, contribute, feedback, get, retract */
  knowledge: KnowledgeResource;
  /** Profile, credits, contributions, email claim/verify */
  agents: AgentsResource;
  /** Low-level SDK instance for raw requests and registration state */
  sdk: PriorSDK;
}

/**
 * Create a fully-wired Prior client.
 *
 * No API key is needed up front: when none is passed or stored, the first
 * call registers a new agent and saves its credentials.
 *
 * @example
 * ```ts
 * import { createClient } from "prior-sdk";
 *
 * const client = createClient();
 * const results = await client.knowledge.search({
 *   query: "vitest cannot find module with .js extension",
 *   context: { runtime: "node", os: "linux" },
 * });
 * ```
 */
export function createClient(options: PriorSDKOptions = {}): PriorClient {
  const sdk = new PriorSDK(options);
  return {
    knowledge: new KnowledgeResource(sdk),
    agents: new AgentsResource(sdk),
    sdk,
  };
}
