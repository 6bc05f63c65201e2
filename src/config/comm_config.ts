import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { ConfigError } from "./config_error";
import { blankToUndefined, envInt, envString } from "./env_schema";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const DAY_SECONDS = 86_400;

const CommEnv = z.object({
  RELAY_HOST: envString("0.0.0.0"),
  RELAY_PORT: envInt(9700, 0, 65_535),
  RELAY_MAX_PAYLOAD_BYTES: envInt(65_536, 1, 1_048_576),
  RELAY_DEDUP_CAPACITY: envInt(256, 1, 1_000_000),
  RELAY_DEDUP_TTL_SECONDS: envInt(300, 1, DAY_SECONDS),
  RELAY_SWEEP_INTERVAL_SECONDS: envInt(30, 1, DAY_SECONDS),
  RELAY_REPLY_TIMEOUT_SECONDS: envInt(300, 1, DAY_SECONDS),
  RELAY_HANDOFF_CAPACITY: envInt(1024, 1, 1_000_000),
  RELAY_INBOX_CAPACITY: envInt(4096, 1, 1_000_000),
  RELAY_SHUTDOWN_MODE: z.preprocess(blankToUndefined, z.enum(["drain", "immediate"]).default("drain")),
  RELAY_ACK_RESEND_MIN_INTERVAL_MS: envInt(0, 0, 60_000),
  RELAY_ORCHESTRATOR_CONCURRENCY: envInt(1, 1, 64),
  STATUS_HOST: envString("127.0.0.1"),
  // 0 keeps the HTTP status server off.
  STATUS_PORT: envInt(0, 0, 65_535),
});

export type CommConfig = {
  listenAddress: string;
  listenPort: number;
  maxPayloadBytes: number;
  dedupCapacity: number;
  dedupTtlMs: number;
  sweepIntervalMs: number;
  replyTimeoutMs: number;
  handoffCapacity: number;
  inboxCapacity: number;
  shutdownMode: "drain" | "immediate";
  ackResendMinIntervalMs: number;
  orchestratorConcurrency: number;
  statusHost: string;
  statusPort: number;
};

export function loadCommConfig(env: NodeJS.ProcessEnv = process.env): CommConfig {
  const parsed = CommEnv.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid relay configuration", parsed.error.flatten().fieldErrors);
  }

  const e = parsed.data;
  return {
    listenAddress: e.RELAY_HOST,
    listenPort: e.RELAY_PORT,
    maxPayloadBytes: e.RELAY_MAX_PAYLOAD_BYTES,
    dedupCapacity: e.RELAY_DEDUP_CAPACITY,
    dedupTtlMs: e.RELAY_DEDUP_TTL_SECONDS * 1000,
    sweepIntervalMs: e.RELAY_SWEEP_INTERVAL_SECONDS * 1000,
    replyTimeoutMs: e.RELAY_REPLY_TIMEOUT_SECONDS * 1000,
    handoffCapacity: e.RELAY_HANDOFF_CAPACITY,
    inboxCapacity: e.RELAY_INBOX_CAPACITY,
    shutdownMode: e.RELAY_SHUTDOWN_MODE,
    ackResendMinIntervalMs: e.RELAY_ACK_RESEND_MIN_INTERVAL_MS,
    orchestratorConcurrency: e.RELAY_ORCHESTRATOR_CONCURRENCY,
    statusHost: e.STATUS_HOST,
    statusPort: e.STATUS_PORT,
  };
}
