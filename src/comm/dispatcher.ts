import {
  DEFAULT_MAX_PAYLOAD_BYTES,
  HEADER_BYTES,
  acknowledgePacket,
  resultPacket,
  type RequestPacket,
} from "../contracts/packet";
import type { OrchestratorReply, UserRequest } from "../contracts/handoff";
import { peerId, type PeerKey } from "../contracts/peer";
import type { DedupTable } from "../dedup/dedup_table";
import { errorMessage, silentLogger, type ComponentLogger } from "../observability/logger";
import { decodePacket, encodePacket } from "../protocol/codec";
import { PayloadTooLargeError } from "../protocol/protocol_errors";
import type { BoundedChannel } from "./bounded_channel";
import { ChannelClosedError, SendCancelledError } from "./comm_errors";
import type { Datagram, DatagramTransport } from "./datagram_transport";
import { ReplySlot } from "./reply_slot";

export type ShutdownMode = "drain" | "immediate";
export type DispatcherState = "idle" | "running" | "draining" | "stopped";
export type DispatcherExitReason = "transport_closed" | "handoff_closed" | "stopped";

export type DispatcherExit = {
  reason: DispatcherExitReason;
  // Exchanges still in flight when the receive loop ended.
  inFlightAtExit: number;
};

export type DispatcherStats = {
  state: DispatcherState;
  inFlight: number;
  received: number;
  forwarded: number;
  duplicates: number;
  replayed: number;
  dropped: number;
};

export type DispatcherOptions = {
  transport: DatagramTransport;
  handoff: BoundedChannel<UserRequest>;
  dedup: DedupTable;
  log?: ComponentLogger;
  maxPayloadBytes?: number;
  replyTimeoutMs?: number;
  sweepIntervalMs?: number;
  shutdownMode?: ShutdownMode;
  ackResendMinIntervalMs?: number;
};

export const INTERNAL_ERROR_MESSAGE = "Internal server error";
export const NO_RESPONSE_MESSAGE = "No response from handler";
export const RESPONSE_TIMEOUT_MESSAGE = "Response timeout";

const REPLY_TIMEOUT_REASON = "reply_timeout";
const SHUTDOWN_REASON = "shutdown";
const STOP_SIGNAL = { done: true, value: undefined } as const;

/**
 * Receive loop bound to one datagram transport.
 *
 * New requests are acknowledged before anything else happens. The hand-off to
 * the orchestrator and the wait for its reply run as one task per exchange, so
 * neither a full hand-off queue nor a slow reply holds up the loop. The reply
 * deadline covers the time spent waiting for room in the queue.
 */
export class Dispatcher {
  private readonly transport: DatagramTransport;
  private readonly handoff: BoundedChannel<UserRequest>;
  private readonly dedup: DedupTable;
  private readonly log: ComponentLogger;
  private readonly maxPayloadBytes: number;
  private readonly replyTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly shutdownMode: ShutdownMode;
  private readonly ackResendMinIntervalMs: number;

  private readonly inFlight = new Set<Promise<void>>();
  // Exchanges still waiting for room in the hand-off queue.
  private readonly queued = new Set<AbortController>();
  private state: DispatcherState = "idle";
  private exitReason: DispatcherExitReason | null = null;
  private exitMode: ShutdownMode;
  private wake: (() => void) | null = null;
  private running: Promise<DispatcherExit> | null = null;

  private readonly counters = {
    received: 0,
    forwarded: 0,
    duplicates: 0,
    replayed: 0,
    dropped: 0,
  };

  constructor(opts: DispatcherOptions) {
    this.transport = opts.transport;
    this.handoff = opts.handoff;
    this.dedup = opts.dedup;
    this.log = opts.log ?? silentLogger;
    this.maxPayloadBytes = opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.replyTimeoutMs = opts.replyTimeoutMs ?? 300_000;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? 30_000;
    this.shutdownMode = opts.shutdownMode ?? "drain";
    this.exitMode = this.shutdownMode;
    this.ackResendMinIntervalMs = opts.ackResendMinIntervalMs ?? 0;
  }

  /** Runs the receive loop until the transport closes, the hand-off closes, or stop() is called. */
  run(): Promise<DispatcherExit> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  /** Ends the receive loop. Resolves once the dispatcher has fully stopped. */
  async stop(mode: ShutdownMode = this.shutdownMode): Promise<DispatcherExit> {
    this.beginShutdown("stopped", mode);
    if (!this.running) {
      this.state = "stopped";
      await this.transport.close();
      return { reason: "stopped", inFlightAtExit: 0 };
    }
    return this.running;
  }

  stats(): DispatcherStats {
    return {
      state: this.state,
      inFlight: this.inFlight.size,
      ...this.counters,
    };
  }

  private async loop(): Promise<DispatcherExit> {
    this.state = "running";
    const local = this.transport.localAddress();
    this.log.info(
      { evt: "comm.dispatcher.started", address: peerId(local), maxPayloadBytes: this.maxPayloadBytes },
      "comm.dispatcher.started"
    );

    const sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    sweepTimer.unref();
    void this.handoff.whenClosed().then(() => this.beginShutdown("handoff_closed", this.shutdownMode));

    const datagrams = this.transport.datagrams()[Symbol.asyncIterator]();
    try {
      while (this.exitReason === null) {
        // New wake-up promise per read; beginShutdown() resolves it.
        const stopped = new Promise<typeof STOP_SIGNAL>((resolve) => {
          this.wake = () => resolve(STOP_SIGNAL);
        });
        const next = await Promise.race([datagrams.next(), stopped]);
        this.wake = null;
        if (next.done) break;
        await this.handleDatagram(next.value);
      }
    } finally {
      clearInterval(sweepTimer);
    }

    const reason = this.exitReason ?? "transport_closed";
    const inFlightAtExit = this.inFlight.size;

    if (reason !== "transport_closed" && this.exitMode === "drain" && inFlightAtExit > 0) {
      this.state = "draining";
      this.log.info({ evt: "comm.dispatcher.draining", inFlight: inFlightAtExit }, "comm.dispatcher.draining");
      await Promise.allSettled([...this.inFlight]);
    }

    await this.transport.close();
    this.state = "stopped";
    this.log.info(
      { evt: "comm.dispatcher.stopped", reason, inFlightAtExit, ...this.counters },
      "comm.dispatcher.stopped"
    );
    return { reason, inFlightAtExit };
  }

  private async handleDatagram(datagram: Datagram) {
    const { data, peer } = datagram;
    this.counters.received += 1;

    const payloadBytes = data.byteLength - HEADER_BYTES;
    if (payloadBytes > this.maxPayloadBytes) {
      this.counters.dropped += 1;
      this.log.warn(
        {
          evt: "comm.packet.oversized",
          peer: peerId(peer),
          payloadBytes,
          maxPayloadBytes: this.maxPayloadBytes,
        },
        "comm.packet.oversized"
      );
      return;
    }

    const decoded = decodePacket(data);
    if (!decoded.ok) {
      this.counters.dropped += 1;
      this.log.warn(
        { evt: "comm.packet.decode_failed", peer: peerId(peer), ...decoded.error.details },
        "comm.packet.decode_failed"
      );
      return;
    }

    const { packet } = decoded;
    if (packet.kind !== "request") {
      // Acknowledgements and results only ever travel daemon -> peer.
      this.counters.dropped += 1;
      this.log.debug(
        { evt: "comm.packet.unexpected_kind", peer: peerId(peer), kind: packet.kind, sequence: packet.sequence },
        "comm.packet.unexpected_kind"
      );
      return;
    }

    await this.handleRequest(packet, peer);
  }

  private async handleRequest(packet: RequestPacket, peer: PeerKey) {
    const { sequence } = packet;
    const classification = this.dedup.classify(peer, sequence);

    if (classification.status === "still_pending") {
      this.counters.duplicates += 1;
      if (!this.dedup.allowAckResend(peer, sequence, this.ackResendMinIntervalMs)) {
        this.log.debug(
          { evt: "comm.request.ack_suppressed", peer: peerId(peer), sequence },
          "comm.request.ack_suppressed"
        );
        return;
      }
      this.log.debug({ evt: "comm.request.duplicate_pending", peer: peerId(peer), sequence }, "comm.request.duplicate_pending");
      await this.sendTo(encodePacket(acknowledgePacket(sequence)), peer, "acknowledge", sequence);
      return;
    }

    if (classification.status === "resolved") {
      this.counters.duplicates += 1;
      this.counters.replayed += 1;
      this.log.info({ evt: "comm.request.duplicate_replayed", peer: peerId(peer), sequence }, "comm.request.duplicate_replayed");
      await this.sendTo(classification.cachedResult, peer, "cached_result", sequence);
      return;
    }

    this.log.info(
      { evt: "comm.request.new", peer: peerId(peer), sequence, contentChars: packet.payload.content.length },
      "comm.request.new"
    );
    await this.sendTo(encodePacket(acknowledgePacket(sequence)), peer, "acknowledge", sequence);
    this.track(this.exchange(peer, sequence, packet.payload.content));
  }

  private async exchange(peer: PeerKey, sequence: number, content: string) {
    const slot = new ReplySlot();
    const cancel = new AbortController();
    const timer = setTimeout(() => {
      slot.drop(REPLY_TIMEOUT_REASON);
      cancel.abort();
    }, this.replyTimeoutMs);
    timer.unref();

    this.queued.add(cancel);
    try {
      await this.handoff.send({ content, peer, reply: slot }, cancel.signal);
      this.counters.forwarded += 1;
    } catch (error) {
      if (error instanceof SendCancelledError) {
        slot.drop(SHUTDOWN_REASON);
      } else if (error instanceof ChannelClosedError) {
        clearTimeout(timer);
        this.log.error(
          { evt: "comm.handoff.send_failed", peer: peerId(peer), sequence },
          "comm.handoff.send_failed"
        );
        await this.complete(peer, sequence, { content: INTERNAL_ERROR_MESSAGE, isError: true });
        this.beginShutdown("handoff_closed", this.shutdownMode);
        return;
      } else {
        throw error;
      }
    } finally {
      this.queued.delete(cancel);
    }

    const outcome = await slot.outcome;
    clearTimeout(timer);

    if (outcome.status === "resolved") {
      await this.complete(peer, sequence, outcome.reply);
      return;
    }

    const timedOut = outcome.reason === REPLY_TIMEOUT_REASON;
    this.log.warn(
      { evt: "comm.exchange.dropped", peer: peerId(peer), sequence, reason: outcome.reason },
      "comm.exchange.dropped"
    );
    await this.complete(peer, sequence, {
      content: timedOut ? RESPONSE_TIMEOUT_MESSAGE : NO_RESPONSE_MESSAGE,
      isError: true,
    });
  }

  // Encode, cache (pending -> resolved), then send.
  private async complete(peer: PeerKey, sequence: number, reply: OrchestratorReply) {
    let encoded: Buffer;
    try {
      encoded = encodePacket(resultPacket(sequence, reply.content, reply.isError), {
        maxPayloadBytes: this.maxPayloadBytes,
      });
    } catch (error) {
      if (!(error instanceof PayloadTooLargeError)) throw error;
      this.log.warn(
        { evt: "comm.result.too_large", peer: peerId(peer), sequence, size: error.size, max: error.max },
        "comm.result.too_large"
      );
      encoded = encodePacket(resultPacket(sequence, `Result too large: ${error.size} bytes`, true));
    }

    if (!this.dedup.resolve(peer, sequence, encoded)) {
      this.log.debug({ evt: "comm.result.not_cached", peer: peerId(peer), sequence }, "comm.result.not_cached");
    }

    await this.sendTo(encoded, peer, "result", sequence);
    this.log.debug(
      { evt: "comm.result.sent", peer: peerId(peer), sequence, isError: reply.isError, contentChars: reply.content.length },
      "comm.result.sent"
    );
  }

  private async sendTo(data: Buffer, peer: PeerKey, what: string, sequence: number): Promise<boolean> {
    try {
      await this.transport.send(data, peer);
      return true;
    } catch (error) {
      this.log.warn(
        { evt: "comm.send_failed", peer: peerId(peer), sequence, what, error: errorMessage(error) },
        "comm.send_failed"
      );
      return false;
    }
  }

  private track(work: Promise<void>) {
    const task: Promise<void> = work
      .catch((error: unknown) => {
        this.log.error({ evt: "comm.exchange.error", error: errorMessage(error) }, "comm.exchange.error");
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private sweep() {
    const removed = this.dedup.sweep();
    if (removed > 0) {
      this.log.debug({ evt: "comm.dedup.swept", removed, ...this.dedup.stats() }, "comm.dedup.swept");
    }
  }

  private beginShutdown(reason: DispatcherExitReason, mode: ShutdownMode) {
    if (this.exitReason !== null) return;
    this.exitReason = reason;
    this.exitMode = mode;

    // Draining leaves queued exchanges to their reply deadline.
    if (mode === "immediate") {
      for (const cancel of this.queued) {
        cancel.abort();
      }
    }

    if (reason === "handoff_closed") {
      this.log.error(
        { evt: "comm.handoff.closed_fatal", mode, inFlight: this.inFlight.size },
        "comm.handoff.closed_fatal"
      );
    } else {
      this.log.info({ evt: "comm.dispatcher.stopping", reason, mode }, "comm.dispatcher.stopping");
    }
    this.wake?.();
  }
}
