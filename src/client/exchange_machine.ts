import type { Packet, ResultPayload } from "../contracts/packet";
import type { PacketHeader } from "../protocol/codec";

export type ExchangeFailureCode = "not_responding" | "invalid_response" | "network_error";

export type ExchangeFailure = {
  code: ExchangeFailureCode;
  message: string;
};

export type ExchangeState =
  | { phase: "idle" }
  | { phase: "awaiting_ack"; sequence: number; request: Buffer; attempts: number }
  | { phase: "awaiting_result"; sequence: number; request: Buffer; attempts: number }
  | { phase: "done"; sequence: number; result: ResultPayload }
  | { phase: "failed"; sequence: number; failure: ExchangeFailure };

export type TimerKind = "ack" | "result";

export type ExchangeEvent =
  | { type: "start"; sequence: number; request: Buffer }
  | { type: "received"; packet: Packet }
  | { type: "undecodable"; header: PacketHeader | null; reason: string }
  | { type: "timeout"; timer: TimerKind; sequence: number }
  | { type: "send_failed"; sequence: number; message: string }
  | { type: "abort"; reason: string }
  | { type: "reset" };

export type ExchangeEffect =
  | { type: "send"; sequence: number; data: Buffer }
  | { type: "start_timer"; timer: TimerKind; sequence: number }
  | { type: "cancel_timer" }
  | { type: "settle" };

export type Transition = {
  state: ExchangeState;
  effects: ExchangeEffect[];
};

export type MachineConfig = {
  // Every transmission of a request, the first included, counts against this.
  maxRetries: number;
};

export const idleState: ExchangeState = { phase: "idle" };

const unchanged = (state: ExchangeState): Transition => ({ state, effects: [] });

const fail = (sequence: number, failure: ExchangeFailure): Transition => ({
  state: { phase: "failed", sequence, failure },
  effects: [{ type: "cancel_timer" }, { type: "settle" }],
});

/**
 * Idle -> AwaitingAck -> AwaitingResult -> Done | Failed.
 *
 * Pure: the caller owns the socket and timers and carries out the returned
 * effects. Packets and timer firings for any sequence other than the one in
 * flight leave the state untouched.
 */
export function transition(
  state: ExchangeState,
  event: ExchangeEvent,
  config: MachineConfig
): Transition {
  if (event.type === "reset") {
    const inFlight = state.phase === "awaiting_ack" || state.phase === "awaiting_result";
    return { state: idleState, effects: inFlight ? [{ type: "cancel_timer" }] : [] };
  }

  if (event.type === "start") {
    if (state.phase !== "idle") return unchanged(state);
    return {
      state: { phase: "awaiting_ack", sequence: event.sequence, request: event.request, attempts: 1 },
      effects: [
        { type: "send", sequence: event.sequence, data: event.request },
        { type: "start_timer", timer: "ack", sequence: event.sequence },
      ],
    };
  }

  if (state.phase !== "awaiting_ack" && state.phase !== "awaiting_result") {
    return unchanged(state);
  }

  switch (event.type) {
    case "received": {
      const { packet } = event;
      if (packet.sequence !== state.sequence) return unchanged(state);

      if (packet.kind === "result") {
        return {
          state: { phase: "done", sequence: state.sequence, result: packet.payload },
          effects: [{ type: "cancel_timer" }, { type: "settle" }],
        };
      }

      if (packet.kind === "acknowledge" && state.phase === "awaiting_ack") {
        return {
          state: { ...state, phase: "awaiting_result" },
          effects: [{ type: "start_timer", timer: "result", sequence: state.sequence }],
        };
      }

      return unchanged(state);
    }

    case "undecodable": {
      const { header } = event;
      if (!header || header.kind !== "result" || header.sequence !== state.sequence) {
        return unchanged(state);
      }
      return fail(state.sequence, {
        code: "invalid_response",
        message: `invalid response: ${event.reason}`,
      });
    }

    case "timeout": {
      const expected: TimerKind = state.phase === "awaiting_ack" ? "ack" : "result";
      if (event.sequence !== state.sequence || event.timer !== expected) return unchanged(state);

      if (state.attempts >= config.maxRetries) {
        return fail(state.sequence, {
          code: "not_responding",
          message: `daemon not responding after ${state.attempts} attempts`,
        });
      }

      // The daemon answers a resend with an ack or the cached result.
      return {
        state: {
          phase: "awaiting_ack",
          sequence: state.sequence,
          request: state.request,
          attempts: state.attempts + 1,
        },
        effects: [
          { type: "send", sequence: state.sequence, data: state.request },
          { type: "start_timer", timer: "ack", sequence: state.sequence },
        ],
      };
    }

    case "send_failed": {
      if (event.sequence !== state.sequence) return unchanged(state);
      return fail(state.sequence, { code: "network_error", message: `network error: ${event.message}` });
    }

    case "abort":
      return fail(state.sequence, { code: "network_error", message: event.reason });

    default: {
      const exhaustive: never = event;
      return exhaustive;
    }
  }
}
