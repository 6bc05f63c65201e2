import { promises as dns } from "node:dns";
import { promises as fs } from "node:fs";
import path from "node:path";

import type { PeerKey } from "../contracts/peer";
import type { TargetAddress } from "./client_config";
import type { ExchangeResult } from "./relay_client";

export const WAITING_INDICATOR = "[waiting...]";

/** Null when the locale is unset or already UTF-8. */
export function localeWarning(lang: string | undefined): string | null {
  if (lang === undefined) return null;
  const normalized = lang.toLowerCase();
  if (normalized.includes("utf-8") || normalized.includes("utf8")) return null;
  return "[warning] Terminal locale is not UTF-8. Non-ASCII characters may not display correctly.";
}

export function renderResult(result: ExchangeResult): string {
  return result.isError ? `[error] ${result.content}` : result.content;
}

export function renderFailure(error: unknown): string {
  return `[error] ${error instanceof Error ? error.message : String(error)}`;
}

// Replies are matched by source address, so the target must be a literal IP.
export async function resolveTarget(target: TargetAddress): Promise<PeerKey & { family: 4 | 6 }> {
  const { address, family } = await dns.lookup(target.host);
  return { address, port: target.port, family: family === 6 ? 6 : 4 };
}

/**
 * Reads the history file, oldest line first. A missing file is an empty history.
 * Returns the newest `limit` lines.
 */
export async function loadHistory(file: string, limit: number): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }

  const lines = raw.split("\n").filter((line) => line.trim().length > 0);
  return limit > 0 ? lines.slice(-limit) : [];
}

/** Writes `lines` (oldest first), keeping the newest `limit`. */
export async function saveHistory(file: string, lines: string[], limit: number): Promise<void> {
  const kept = limit > 0 ? lines.slice(-limit) : [];
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, kept.length > 0 ? `${kept.join("\n")}\n` : "", "utf8");
}

const isNotFound = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
