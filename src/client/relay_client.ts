import type { DatagramTransport } from "../comm/datagram_transport";
import { DEFAULT_MAX_PAYLOAD_BYTES, MAX_SEQUENCE, requestPacket } from "../contracts/packet";
import { peerId, samePeer, type PeerKey } from "../contracts/peer";
import { errorMessage, silentLogger, type ComponentLogger } from "../observability/logger";
import { decodePacket, encodePacket, peekHeader } from "../protocol/codec";
import { ExchangeError } from "./exchange_error";
import {
  idleState,
  transition,
  type ExchangeEffect,
  type ExchangeEvent,
  type ExchangeState,
  type TimerKind,
} from "./exchange_machine";

export type RelayClientOptions = {
  transport: DatagramTransport;
  // Must be a literal address: replies are matched against it.
  target: PeerKey;
  ackTimeoutMs?: number;
  resultTimeoutMs?: number;
  maxRetries?: number;
  maxPayloadBytes?: number;
  firstSequence?: number;
  log?: ComponentLogger;
};

export type ExchangeResult = {
  sequence: number;
  content: string;
  isError: boolean;
};

export const DEFAULT_ACK_TIMEOUT_MS = 5_000;
export const DEFAULT_RESULT_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Drives the exchange state machine over a datagram transport: owns the
 * sequence counter, the timers and the socket. One exchange at a time.
 */
export class RelayClient {
  private readonly transport: DatagramTransport;
  private readonly target: PeerKey;
  private readonly ackTimeoutMs: number;
  private readonly resultTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly maxPayloadBytes: number;
  private readonly log: ComponentLogger;

  private state: ExchangeState = idleState;
  private nextSequence: number;
  private timer: NodeJS.Timeout | null = null;
  private settleCurrent: ((final: ExchangeState) => void) | null = null;
  private readonly receiving: Promise<void>;
  private closed = false;

  constructor(opts: RelayClientOptions) {
    this.transport = opts.transport;
    this.target = opts.target;
    this.ackTimeoutMs = opts.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
    this.resultTimeoutMs = opts.resultTimeoutMs ?? DEFAULT_RESULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, opts.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.maxPayloadBytes = opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    this.log = opts.log ?? silentLogger;
    this.nextSequence = opts.firstSequence ?? 1;

    this.receiving = this.receiveLoop().catch((error: unknown) => {
      this.log.error({ evt: "client.receive.error", error: errorMessage(error) }, "client.receive.error");
    });
  }

  get phase(): ExchangeState["phase"] {
    return this.state.phase;
  }

  /**
   * Sends one request and waits for its result.
   *
   * Rejects with PayloadTooLargeError before anything is sent, or with
   * ExchangeError (`not_responding`, `invalid_response`, `network_error`, `busy`).
   * Either way the client is idle again afterwards.
   */
  async request(content: string): Promise<ExchangeResult> {
    if (this.closed) {
      throw new ExchangeError("network_error", "client closed");
    }
    if (this.state.phase !== "idle") {
      throw new ExchangeError("busy", "an exchange is already in progress");
    }

    const sequence = this.allocateSequence();
    const request = encodePacket(requestPacket(sequence, content), {
      maxPayloadBytes: this.maxPayloadBytes,
    });

    const settled = new Promise<ExchangeState>((resolve) => {
      this.settleCurrent = resolve;
    });
    this.dispatch({ type: "start", sequence, request });
    const final = await settled;
    this.settleCurrent = null;
    this.dispatch({ type: "reset" });

    if (final.phase === "done") {
      return { sequence, content: final.result.content, isError: final.result.isError };
    }
    if (final.phase === "failed") {
      throw new ExchangeError(final.failure.code, final.failure.message, sequence);
    }
    throw new Error(`exchange settled in phase ${final.phase}`);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.dispatch({ type: "abort", reason: "client closed" });
    await this.transport.close();
    await this.receiving;
  }

  private allocateSequence(): number {
    const sequence = this.nextSequence;
    this.nextSequence = sequence >= MAX_SEQUENCE ? 0 : sequence + 1;
    return sequence;
  }

  private dispatch(event: ExchangeEvent) {
    const next = transition(this.state, event, { maxRetries: this.maxRetries });
    this.state = next.state;
    for (const effect of next.effects) {
      this.apply(effect);
    }
  }

  private apply(effect: ExchangeEffect) {
    switch (effect.type) {
      case "send":
        this.transport.send(effect.data, this.target).catch((error: unknown) => {
          this.dispatch({ type: "send_failed", sequence: effect.sequence, message: errorMessage(error) });
        });
        return;
      case "start_timer":
        this.startTimer(effect.timer, effect.sequence);
        return;
      case "cancel_timer":
        this.cancelTimer();
        return;
      case "settle":
        this.settleCurrent?.(this.state);
        return;
    }
  }

  private startTimer(timer: TimerKind, sequence: number) {
    this.cancelTimer();
    const ms = timer === "ack" ? this.ackTimeoutMs : this.resultTimeoutMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.log.warn(
        { evt: "client.exchange.timeout", timer, sequence, target: peerId(this.target) },
        "client.exchange.timeout"
      );
      this.dispatch({ type: "timeout", timer, sequence });
    }, ms);
  }

  private cancelTimer() {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async receiveLoop() {
    for await (const datagram of this.transport.datagrams()) {
      if (!samePeer(datagram.peer, this.target)) {
        this.log.debug(
          { evt: "client.packet.foreign_source", from: peerId(datagram.peer) },
          "client.packet.foreign_source"
        );
        continue;
      }

      const decoded = decodePacket(datagram.data);
      if (decoded.ok) {
        this.dispatch({ type: "received", packet: decoded.packet });
      } else {
        this.dispatch({
          type: "undecodable",
          header: peekHeader(datagram.data),
          reason: decoded.error.message,
        });
      }
    }
  }
}
