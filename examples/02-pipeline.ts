/**
 * 02-pipeline: retrieval pipeline with nested async spans.
 *
 * Spans started with tk.spanAsync() nest under whatever span is active,
 * across awaits, without passing handles around.
 *
 * Run: npm run pipeline --workspace=examples
 */

import { tk, sleep } from "./config.js";

const query = "How do I rotate an API key?";

async function embed(text: string): Promise<number[]> {
  return tk.spanAsync("embed", async (span) => {
    span.setInput(text);
    await sleep(80);
    const vector = [0.12, -0.48, 0.33];
    span.addMetadata("dimensions", vector.length);
    return vector;
  });
}

async function search(vector: number[]): Promise<string[]> {
  return tk.spanAsync("vector-search", async (span) => {
    span.setInput({ vector, topK: 3 });
    await sleep(120);
    const docs = ["docs/keys.md#rotate", "docs/keys.md#revoke", "docs/auth.md"];
    span.recordEvent("results", { count: docs.length });
    span.setOutput(docs);
    return docs;
  });
}

await tk.withTraceAsync(
  "rag-pipeline",
  async (trace) => {
    const docs = await tk.spanAsync("retrieve", async () => search(await embed(query)));

    const startTime = new Date();
    await sleep(400);
    const answer = "Open Settings → API keys, create a new key, then revoke the old one.";

    trace.recordGeneration({
      name:      "answer",
      model:     "example-model",
      startTime,
      endTime:   new Date(),
      input:     { messages: [{ role: "system", content: docs.join("\n") }, { role: "user", content: query }] },
      output:    answer,
      usage:     { promptTokens: 310, completionTokens: 24, totalTokens: 334 },
    });

    trace.score({ name: "grounded", value: 1, source: "eval" });
    trace.setOutput({ answer });
  },
  { userId: "user-example", tags: ["rag"] },
);

await tk.shutdown();
console.log("done");
