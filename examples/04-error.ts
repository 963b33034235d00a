/**
 * 04-error: trace with a failed span and error status.
 *
 * An error thrown inside a span is recorded on the span and on the trace,
 * then rethrown unchanged to the caller.
 *
 * Run: npm run error --workspace=examples
 */

import { tk, sleep } from "./config.js";

const prompt = "Write a 10,000 word essay on the history of computing.";

try {
  await tk.withTraceAsync(
    "failed-generation",
    async () => {
      await tk.spanAsync("chat-completion", async (span) => {
        span.setInput({ prompt });

        // Simulate a slow call that exceeds our timeout budget
        await sleep(2100);
        throw new Error("model request timed out after 2000ms");
      });
    },
    { input: { prompt } },
  );
} catch (err) {
  console.log("caught:", err instanceof Error ? err.message : err);
}

await tk.shutdown();
console.log("done");
