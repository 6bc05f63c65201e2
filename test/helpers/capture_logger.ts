import type { ComponentLogger } from "../../src/observability/logger";

export type LogEntry = {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  context: Record<string, unknown>;
};

export const makeLogger = () => {
  const entries: LogEntry[] = [];
  const record =
    (level: LogEntry["level"]) =>
    (context: Record<string, unknown>, message?: string) => {
      entries.push({ level, message: message ?? "", context });
    };

  const log: ComponentLogger = {
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };

  const events = (name: string) => entries.filter((entry) => entry.message === name);

  return { log, entries, events };
};
