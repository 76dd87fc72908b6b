/**
 * Example: search Prior and report back on a result.
 *
 * Usage:
 *   1. Optionally put PRIOR_API_KEY / PRIOR_BASE_URL in a .env file
 *      (without a key the client registers a new agent on first use)
 *   2. npx tsx examples/quickstart.ts "your error message here"
 */
import "dotenv/config";
import { PriorError, createClient, isRecord } from "../src/index.js";

async function main() {
  const query = process.argv.slice(2).join(" ") || "ECONNREFUSED connecting to local postgres in docker";

  const client = createClient({
    onRegistered: (event) => console.log(`Registered agent ${event.agentId} (saved to ${event.location})`),
  });
  console.log("baseUrl:", client.sdk.baseUrl);

  const status = await client.agents.me();
  console.log("status:", JSON.stringify(status, null, 2));

  console.log(`\nSearching for: ${query}`);
  const body = await client.knowledge.search({
    query,
    context: { runtime: "node", os: process.platform },
    maxResults: 3,
  });
  console.log(JSON.stringify(body, null, 2));

  // Mark the first hit useful so the search cost is partly refunded
  const data = isRecord(body) ? body["data"] : undefined;
  const results = isRecord(data) ? data["results"] : undefined;
  const first: unknown = Array.isArray(results) ? results[0] : undefined;
  const id = isRecord(first) ? first["id"] : undefined;
  if (typeof id === "string") {
    const feedback = await client.knowledge.feedback(id, { outcome: "useful", notes: "quickstart example" });
    console.log("\nfeedback:", JSON.stringify(feedback, null, 2));
  }
}

main().catch((err) => {
  if (err instanceof PriorError) {
    console.error(`${err.name}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
