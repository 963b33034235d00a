/**
 * 03-agent: multi-step agent loop with generation and tool call spans.
 *
 * Each agent step is a span holding a generation span (the model picks a
 * tool) and a tool call span (the tool runs). The final follow-up runs
 * from a job queue, outside the trace, and is reattached with
 * captureContext()/withContext().
 *
 * Run: npm run agent --workspace=examples
 */

import { tk, sleep } from "./config.js";
import type { Context } from "@tracekit/sdk";

const task = "What is the weather in Paris and London right now?";
const cities = ["Paris", "London"];
const queue: { ctx: Context; run: () => void }[] = [];

const weather: Record<string, { temperature: number; conditions: string }> = {
  Paris:  { temperature: 18, conditions: "Partly cloudy" },
  London: { temperature: 12, conditions: "Overcast" },
};

tk.withTrace(
  "weather-agent",
  (trace) => {
    console.log("trace started:", trace.traceId);

    for (const [i, city] of cities.entries()) {
      tk.span(`agent-step-${i + 1}`, (step) => {
        step.generationSpan("plan", { model: "example-model", input: { task, tools: ["get_weather"] } }, (_span, tracker) => {
          tracker.finish({
            output: { toolCall: { name: "get_weather", args: { city } } },
            usage:  { promptTokens: 145, completionTokens: 28, totalTokens: 173 },
          });
        });

        step.toolCallSpan("get_weather", { toolName: "get_weather", input: { city } }, (_span, tracker) => {
          tracker.finish({ output: weather[city] });
        });
      });
    }

    trace.setOutput({
      answer: "In Paris it's currently 18°C and partly cloudy. In London it's 12°C and overcast.",
    });

    const ctx = tk.captureContext();
    if (ctx) {
      queue.push({
        ctx,
        run: () => tk.span("notify-user", (span) => span.addMetadata("channel", "email")),
      });
    }
  },
  { input: { task } },
);

// Later, from the job queue:
await sleep(50);
for (const job of queue) tk.withContext(job.ctx, job.run);

await tk.shutdown();
console.log("done");
