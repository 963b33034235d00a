import { config as loadEnv } from "dotenv";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { Tracekit } from "@tracekit/sdk";

// Load examples/.env relative to this file, so the path is correct
// regardless of which directory you run the script from.
loadEnv({ path: join(dirname(fileURLToPath(import.meta.url)), ".env") });

// Print to the console unless examples/.env says otherwise.
export const tk = Tracekit.fromEnv({
  env: { TRACING_MODE: "print", ...process.env },
});

export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));
