/**
 * 01-simple: one trace, one model call.
 *
 * The simplest possible usage: ask a question, get an answer.
 * Run: npm run simple --workspace=examples
 */

import type { Completion } from "@tracekit/sdk";
import { tk, sleep } from "./config.js";

const question = "What is the capital of France?";

const answer = await tk.withTraceAsync(
  "simple-chat",
  async (trace) => {
    console.log("trace started:", trace.traceId);

    const completion = await tk.spanAsync("chat-completion", async (span) => {
      span.setInput({ messages: [{ role: "user", content: question }] });

      // Simulate the model call
      await sleep(450);

      const result: Completion = {
        id:      "cmpl-example-1",
        created: Math.floor(Date.now() / 1000),
        model:   "example-model",
        message: { role: "assistant", content: "The capital of France is Paris." },
        usage:   { promptTokens: 22, completionTokens: 10, totalTokens: 32 },
      };
      span.setOutput(result);
      return result;
    });

    const text = completion.message.content ?? "";
    trace.setOutput({ answer: text });
    return text;
  },
  { input: { question } },
);

console.log("answer:", answer);

await tk.shutdown();
console.log("done");
