import { peerId, type PeerKey } from "../contracts/peer";

export type DedupEntry = {
  createdAtMs: number;
  lastAckAtMs: number;
  // Encoded result packet; absent while the exchange is in flight.
  cachedResult: Buffer | null;
};

export type Classification =
  | { status: "new" }
  | { status: "still_pending" }
  | { status: "resolved"; cachedResult: Buffer };

export type DedupTableOptions = {
  capacityPerPeer?: number;
  ttlMs?: number;
  now?: () => number;
};

export type DedupStats = {
  peers: number;
  entries: number;
  capacityPerPeer: number;
  ttlMs: number;
};

export const DEFAULT_DEDUP_CAPACITY = 256;
export const DEFAULT_DEDUP_TTL_MS = 300_000;

/**
 * Per-peer window of recently seen request sequences.
 *
 * Each peer owns its own bucket (insertion-ordered), so eviction for one
 * peer never touches another's entries. Every operation runs synchronously,
 * which makes classify/resolve atomic with respect to the event loop.
 */
export class DedupTable {
  private readonly peers = new Map<string, Map<number, DedupEntry>>();
  private readonly capacityPerPeer: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: DedupTableOptions = {}) {
    this.capacityPerPeer = Math.max(1, opts.capacityPerPeer ?? DEFAULT_DEDUP_CAPACITY);
    this.ttlMs = Math.max(1, opts.ttlMs ?? DEFAULT_DEDUP_TTL_MS);
    this.now = opts.now ?? Date.now;
  }

  classify(peer: PeerKey, sequence: number): Classification {
    const now = this.now();
    const key = peerId(peer);
    const bucket = this.peers.get(key) ?? new Map<number, DedupEntry>();
    this.evictExpired(bucket, now);

    const existing = bucket.get(sequence);
    if (existing) {
      return existing.cachedResult
        ? { status: "resolved", cachedResult: existing.cachedResult }
        : { status: "still_pending" };
    }

    bucket.set(sequence, { createdAtMs: now, lastAckAtMs: now, cachedResult: null });
    this.trimToCapacity(bucket);
    this.peers.set(key, bucket);
    return { status: "new" };
  }

  /**
   * Moves a pending entry to resolved. Returns false when the entry is gone
   * (evicted while in flight) or already carries a result.
   *
   * The cached result gets a fresh lifetime and moves to the newest end of
   * the peer's bucket.
   */
  resolve(peer: PeerKey, sequence: number, encodedResult: Buffer): boolean {
    const bucket = this.peers.get(peerId(peer));
    const entry = bucket?.get(sequence);
    if (!bucket || !entry || entry.cachedResult) return false;
    entry.cachedResult = encodedResult;
    entry.createdAtMs = this.now();
    bucket.delete(sequence);
    bucket.set(sequence, entry);
    return true;
  }

  /**
   * Decides whether a pending exchange may be acknowledged again, recording
   * the re-send when it may. A zero interval never holds an acknowledgement back.
   */
  allowAckResend(peer: PeerKey, sequence: number, minIntervalMs: number): boolean {
    const entry = this.peers.get(peerId(peer))?.get(sequence);
    if (!entry) return true;
    const now = this.now();
    if (minIntervalMs > 0 && now - entry.lastAckAtMs < minIntervalMs) {
      return false;
    }
    entry.lastAckAtMs = now;
    return true;
  }

  get(peer: PeerKey, sequence: number): DedupEntry | null {
    return this.peers.get(peerId(peer))?.get(sequence) ?? null;
  }

  /** Evicts expired entries for every peer and forgets empty peers. Returns the number removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, bucket] of this.peers) {
      removed += this.evictExpired(bucket, now);
      if (bucket.size === 0) {
        this.peers.delete(key);
      }
    }
    return removed;
  }

  stats(): DedupStats {
    let entries = 0;
    for (const bucket of this.peers.values()) {
      entries += bucket.size;
    }
    return {
      peers: this.peers.size,
      entries,
      capacityPerPeer: this.capacityPerPeer,
      ttlMs: this.ttlMs,
    };
  }

  private evictExpired(bucket: Map<number, DedupEntry>, now: number): number {
    let removed = 0;
    for (const [sequence, entry] of bucket) {
      if (now - entry.createdAtMs >= this.ttlMs) {
        bucket.delete(sequence);
        removed += 1;
      }
    }
    return removed;
  }

  private trimToCapacity(bucket: Map<number, DedupEntry>) {
    while (bucket.size > this.capacityPerPeer) {
      const oldest = bucket.keys().next();
      if (oldest.done) break;
      bucket.delete(oldest.value);
    }
  }
}
