import { describe, it, expect } from "vitest";

import { loadCommConfig } from "../src/config/comm_config";
import { ConfigError } from "../src/config/config_error";

describe("loadCommConfig", () => {
  it("falls back to defaults", () => {
    expect(loadCommConfig({})).toEqual({
      listenAddress: "0.0.0.0",
      listenPort: 9700,
      maxPayloadBytes: 65_536,
      dedupCapacity: 256,
      dedupTtlMs: 300_000,
      sweepIntervalMs: 30_000,
      replyTimeoutMs: 300_000,
      handoffCapacity: 1024,
      inboxCapacity: 4096,
      shutdownMode: "drain",
      ackResendMinIntervalMs: 0,
      orchestratorConcurrency: 1,
      statusHost: "127.0.0.1",
      statusPort: 0,
    });
  });

  it("reads overrides and converts seconds to milliseconds", () => {
    const config = loadCommConfig({
      RELAY_HOST: "127.0.0.1",
      RELAY_PORT: "9800",
      RELAY_DEDUP_TTL_SECONDS: "60",
      RELAY_REPLY_TIMEOUT_SECONDS: "5",
      RELAY_SHUTDOWN_MODE: "immediate",
      STATUS_PORT: "8080",
    });

    expect(config).toMatchObject({
      listenAddress: "127.0.0.1",
      listenPort: 9800,
      dedupTtlMs: 60_000,
      replyTimeoutMs: 5_000,
      shutdownMode: "immediate",
      statusPort: 8080,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadCommConfig({ RELAY_PORT: "", RELAY_SHUTDOWN_MODE: " " })).toMatchObject({
      listenPort: 9700,
      shutdownMode: "drain",
    });
  });

  it("rejects invalid values with the offending keys", () => {
    let caught: unknown;
    try {
      loadCommConfig({ RELAY_PORT: "70000", RELAY_DEDUP_CAPACITY: "0", RELAY_SHUTDOWN_MODE: "later" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(Object.keys(caught.issues).sort()).toEqual([
      "RELAY_DEDUP_CAPACITY",
      "RELAY_PORT",
      "RELAY_SHUTDOWN_MODE",
    ]);
    expect(caught.toJSON().code).toBe("invalid_config");
  });
});
