import os from "node:os";
import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";

import { ConfigError } from "../config/config_error";
import { envInt, envString } from "../config/env_schema";
import { DEFAULT_MAX_PAYLOAD_BYTES } from "../contracts/packet";

export type TargetAddress = {
  host: string;
  port: number;
};

export type ClientConfig = {
  target: TargetAddress;
  ackTimeoutMs: number;
  resultTimeoutMs: number;
  maxRetries: number;
  maxPayloadBytes: number;
  historyFile: string;
  historySize: number;
  // Set in one-shot mode (arguments after `--`).
  command: string | null;
  help: boolean;
};

export const DEFAULT_TARGET = "127.0.0.1:9700";

export const USAGE = `Usage: relaybox-cli [options] [-- command...]

Options:
  --target <host:port>        daemon address (default ${DEFAULT_TARGET})
  --timeout <seconds>         acknowledgement timeout per attempt (default 5)
  --result-timeout <seconds>  wait for the result after an acknowledgement (default 120)
  --max-retries <n>           transmissions before giving up (default 3)
  --max-payload-bytes <n>     largest request payload (default ${DEFAULT_MAX_PAYLOAD_BYTES})
  --history-file <path>       line history (default ~/.relaybox_history)
  --history-size <n>          lines kept in the history file (default 1000)
  -h, --help                  show this help

With a command after \`--\`, sends it once and exits 0 on success, 1 otherwise.`;

const TARGET_PATTERN = /^(?:\[([0-9A-Fa-f:.]+)\]|([^\s:[\]]+)):(\d{1,5})$/;

/** Splits `host:port` or `[v6]:port`; null when malformed. */
export function parseTarget(value: string): TargetAddress | null {
  const match = TARGET_PATTERN.exec(value.trim());
  if (!match) return null;

  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (!host || !Number.isInteger(port) || port < 1 || port > 65_535) return null;
  return { host, port };
}

export function expandHome(file: string): string {
  if (file === "~") return os.homedir();
  if (file.startsWith("~/")) return path.join(os.homedir(), file.slice(2));
  return file;
}

const ClientFlags = z.object({
  target: envString(DEFAULT_TARGET).transform((value, ctx) => {
    const target = parseTarget(value);
    if (!target) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected host:port" });
      return z.NEVER;
    }
    return target;
  }),
  timeout: envInt(5, 1, 3_600),
  resultTimeout: envInt(120, 1, 86_400),
  maxRetries: envInt(3, 1, 100),
  maxPayloadBytes: envInt(DEFAULT_MAX_PAYLOAD_BYTES, 1, 1_048_576),
  historyFile: envString(path.join(os.homedir(), ".relaybox_history")),
  historySize: envInt(1000, 0, 100_000),
});

export function parseClientArgs(argv: string[]): ClientConfig {
  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  const flags = ClientFlags.safeParse({
    target: values.target,
    timeout: values.timeout,
    resultTimeout: values["result-timeout"],
    maxRetries: values["max-retries"],
    maxPayloadBytes: values["max-payload-bytes"],
    historyFile: values["history-file"],
    historySize: values["history-size"],
  });
  if (!flags.success) {
    throw new ConfigError("Invalid client options", flags.error.flatten().fieldErrors);
  }

  const f = flags.data;
  const command = positionals.join(" ").trim();
  return {
    target: f.target,
    ackTimeoutMs: f.timeout * 1000,
    resultTimeoutMs: f.resultTimeout * 1000,
    maxRetries: f.maxRetries,
    maxPayloadBytes: f.maxPayloadBytes,
    historyFile: expandHome(f.historyFile),
    historySize: f.historySize,
    command: command.length > 0 ? command : null,
    help: values.help ?? false,
  };
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: true,
    options: {
      target: { type: "string" },
      timeout: { type: "string" },
      "result-timeout": { type: "string" },
      "max-retries": { type: "string" },
      "max-payload-bytes": { type: "string" },
      "history-file": { type: "string" },
      "history-size": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}
