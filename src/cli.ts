#!/usr/bin/env node
import readline from "node:readline";

import { parseClientArgs, USAGE, type ClientConfig } from "./client/client_config";
import { RelayClient } from "./client/relay_client";
import {
  WAITING_INDICATOR,
  loadHistory,
  localeWarning,
  renderFailure,
  renderResult,
  resolveTarget,
  saveHistory,
} from "./client/terminal";
import { UdpTransport } from "./comm/udp_transport";
import { ConfigError } from "./config/config_error";
import { peerId } from "./contracts/peer";
import { createLogger, errorMessage } from "./observability/logger";

async function main(): Promise<number> {
  const warning = localeWarning(process.env.LANG);
  if (warning) console.error(warning);

  const config = parseClientArgs(process.argv.slice(2));
  if (config.help) {
    console.log(USAGE);
    return 0;
  }

  const log = createLogger({
    name: "relaybox-cli",
    level: process.env.LOG_LEVEL ?? "warn",
    stderr: true,
  });

  const resolved = await resolveTarget(config.target);
  const target = { address: resolved.address, port: resolved.port };
  const transport = await UdpTransport.bind({
    address: resolved.family === 6 ? "::" : "0.0.0.0",
    port: 0,
    log,
  });

  const client = new RelayClient({
    transport,
    target,
    ackTimeoutMs: config.ackTimeoutMs,
    resultTimeoutMs: config.resultTimeoutMs,
    maxRetries: config.maxRetries,
    maxPayloadBytes: config.maxPayloadBytes,
    log,
  });

  try {
    if (config.command !== null) {
      return await oneShot(client, config.command);
    }
    return await interactive(client, config, peerId(target));
  } finally {
    await client.close();
  }
}

async function oneShot(client: RelayClient, command: string): Promise<number> {
  try {
    const result = await client.request(command);
    console.log(renderResult(result));
    return result.isError ? 1 : 0;
  } catch (error) {
    console.error(renderFailure(error));
    return 1;
  }
}

async function interactive(client: RelayClient, config: ClientConfig, targetLabel: string): Promise<number> {
  const loaded = await loadHistory(config.historyFile, config.historySize).catch((error: unknown) => {
    console.error(`[warning] Failed to load history: ${errorMessage(error)}`);
    return [];
  });

  // readline keeps history newest first.
  let history = [...loaded].reverse();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
    history,
    historySize: config.historySize,
    removeHistoryDuplicates: true,
  });

  rl.on("history", (lines: string[]) => {
    history = lines;
  });

  // Ctrl+C drops the current line; Ctrl+D ends the session.
  rl.on("SIGINT", () => {
    rl.write("", { ctrl: true, name: "e" });
    rl.write("", { ctrl: true, name: "u" });
    process.stdout.write("^C\n");
    rl.prompt();
  });

  console.log("relaybox-cli");
  console.log(`Target: ${targetLabel}`);
  console.log("Type your message and press Enter. Ctrl+D to quit.");
  console.log();

  rl.prompt();
  for await (const line of rl) {
    const input = line.trim();
    if (input.length > 0) {
      process.stdout.write(WAITING_INDICATOR);
      const rendered = await client.request(input).then(renderResult, renderFailure);
      process.stdout.write(`\r${" ".repeat(WAITING_INDICATOR.length)}\r${rendered}\n`);
    }
    rl.prompt();
  }

  await saveHistory(config.historyFile, [...history].reverse(), config.historySize).catch((error: unknown) => {
    console.error(`[warning] Failed to save history: ${errorMessage(error)}`);
  });

  console.log("\nGoodbye!");
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(`[error] ${error.message}: ${JSON.stringify(error.issues)}`);
      console.error(USAGE);
    } else {
      console.error(renderFailure(error));
    }
    process.exit(1);
  });
