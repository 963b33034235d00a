import { describe, it, expect } from "vitest";
import {
  DEFAULT_TRACE_MANAGER_CONFIG,
  isRemoteConfigValid,
  resolveConfig,
} from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("resolveConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = resolveConfig({});
    expect(config.mode).toBe("none");
    expect(config.manager).toEqual(DEFAULT_TRACE_MANAGER_CONFIG);
    expect(config.remote).toEqual({
      host:      "http://localhost:3000",
      publicKey: "",
      secretKey: "",
      timeoutMs: 30000,
    });
    expect(config.logLevel).toBe("warn");
  });

  it("reads every setting", () => {
    const config = resolveConfig({
      TRACING_MODE:                      "remote",
      TRACING_ENABLED:                   "false",
      TRACING_BATCH_SIZE:                "10",
      TRACING_FLUSH_INTERVAL_MS:         "250",
      TRACING_MAX_RETRIES:               "0",
      TRACING_CIRCUIT_BREAKER_THRESHOLD: "2",
      TRACING_LOG_LEVEL:                 "debug",
      TRACEKIT_HOST:                     "https://ingest.test",
      TRACEKIT_PUBLIC_KEY:               "pk-test",
      TRACEKIT_SECRET_KEY:               "test-secret",
      TRACEKIT_ENV:                      "staging",
      TRACEKIT_RELEASE:                  "2.0.0",
      TRACEKIT_VERSION:                  "2.0.1",
      TRACEKIT_TIMEOUT_MS:               "1000",
    });

    expect(config.mode).toBe("remote");
    expect(config.manager).toEqual({
      enabled:                 false,
      batchSize:               10,
      flushIntervalMs:         250,
      maxRetries:              0,
      circuitBreakerThreshold: 2,
      environment:             "staging",
      release:                 "2.0.0",
      version:                 "2.0.1",
    });
    expect(config.remote).toEqual({
      host:      "https://ingest.test",
      publicKey: "pk-test",
      secretKey: "test-secret",
      timeoutMs: 1000,
    });
    expect(config.logLevel).toBe("debug");
  });

  it("normalises the mode", () => {
    expect(resolveConfig({ TRACING_MODE: "  Print " }).mode).toBe("print");
  });

  it("strips a trailing slash from the host", () => {
    expect(resolveConfig({ TRACEKIT_HOST: "https://ingest.test/" }).remote.host).toBe("https://ingest.test");
  });

  it.each([
    ["1", true],
    ["0", false],
    ["TRUE", true],
    ["FALSE", false],
  ])("parses TRACING_ENABLED=%s", (value, expected) => {
    expect(resolveConfig({ TRACING_ENABLED: value }).manager.enabled).toBe(expected);
  });

  it("throws ConfigurationError naming the bad fields", () => {
    expect(() => resolveConfig({ TRACING_BATCH_SIZE: "lots", TRACING_ENABLED: "maybe" })).toThrow(
      new ConfigurationError("invalid tracing configuration: TRACING_ENABLED, TRACING_BATCH_SIZE"),
    );
  });

  it("rejects a non-positive batch size", () => {
    expect(() => resolveConfig({ TRACING_BATCH_SIZE: "0" })).toThrow(ConfigurationError);
  });
});

describe("isRemoteConfigValid", () => {
  const remote = { host: "https://ingest.test", publicKey: "pk-test", secretKey: "test-secret", timeoutMs: 1000 };

  it("accepts a host and both keys", () => {
    expect(isRemoteConfigValid(remote)).toBe(true);
  });

  it("rejects a missing key", () => {
    expect(isRemoteConfigValid({ ...remote, publicKey: "" })).toBe(false);
    expect(isRemoteConfigValid({ ...remote, secretKey: "" })).toBe(false);
  });

  it("rejects an empty host", () => {
    expect(isRemoteConfigValid({ ...remote, host: "" })).toBe(false);
  });
});
