import { decode as decodeMsgpack, encode as encodeMsgpack } from "@msgpack/msgpack";

import {
  DEFAULT_MAX_PAYLOAD_BYTES,
  HEADER_BYTES,
  KIND_BYTE,
  MAX_SEQUENCE,
  RequestPayload,
  ResultPayload,
  kindFromByte,
  type Packet,
  type PacketKind,
} from "../contracts/packet";
import { errorMessage } from "../observability/logger";
import { DecodeError, PayloadTooLargeError } from "./protocol_errors";

export type DecodeResult = { ok: true; packet: Packet } | { ok: false; error: DecodeError };

export type PacketHeader = {
  kind: PacketKind | null;
  kindByte: number;
  sequence: number;
};

export type EncodeOptions = {
  maxPayloadBytes?: number;
};

/**
 * Wire layout: [kind:1][sequence:4 big-endian][payload: MessagePack map, absent for acks].
 *
 * Throws PayloadTooLargeError when the serialized payload exceeds the ceiling,
 * so nothing oversized ever reaches the socket.
 */
export function encodePacket(packet: Packet, opts: EncodeOptions = {}): Buffer {
  if (!Number.isInteger(packet.sequence) || packet.sequence < 0 || packet.sequence > MAX_SEQUENCE) {
    throw new RangeError(`sequence out of range: ${packet.sequence}`);
  }

  const header = Buffer.alloc(HEADER_BYTES);
  header.writeUInt8(KIND_BYTE[packet.kind], 0);
  header.writeUInt32BE(packet.sequence, 1);

  if (packet.kind === "acknowledge") {
    return header;
  }

  const wirePayload =
    packet.kind === "request"
      ? { content: packet.payload.content }
      : { content: packet.payload.content, is_error: packet.payload.isError };

  const payload = encodeMsgpack(wirePayload);
  const max = opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
  if (payload.byteLength > max) {
    throw new PayloadTooLargeError(payload.byteLength, max);
  }

  return Buffer.concat([header, payload]);
}

export function peekHeader(data: Uint8Array): PacketHeader | null {
  if (data.byteLength < HEADER_BYTES) return null;
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const kindByte = view.getUint8(0);
  return {
    kind: kindFromByte(kindByte),
    kindByte,
    sequence: view.getUint32(1),
  };
}

export function decodePacket(data: Uint8Array): DecodeResult {
  const header = peekHeader(data);
  if (!header) {
    return fail({
      code: "truncated",
      message: `Packet too short: ${data.byteLength} bytes`,
      length: data.byteLength,
    });
  }

  const { kind, kindByte, sequence } = header;
  if (!kind) {
    return fail({
      code: "unknown_kind",
      message: `Unknown message kind: ${kindByte}`,
      kindByte,
      sequence,
    });
  }

  const body = data.subarray(HEADER_BYTES);

  if (kind === "acknowledge") {
    if (body.byteLength !== 0) {
      return fail({
        code: "unexpected_payload",
        message: `Acknowledge carries ${body.byteLength} payload bytes`,
        length: data.byteLength,
        sequence,
      });
    }
    return { ok: true, packet: { kind, sequence } };
  }

  let raw: unknown;
  try {
    raw = decodeMsgpack(body);
  } catch (error) {
    return fail({
      code: "invalid_payload",
      message: `Malformed ${kind} payload: ${errorMessage(error)}`,
      length: data.byteLength,
      sequence,
    });
  }

  if (kind === "request") {
    const parsed = RequestPayload.safeParse(raw);
    if (!parsed.success) {
      return fail({
        code: "invalid_payload",
        message: "Request payload does not match { content }",
        length: data.byteLength,
        sequence,
      });
    }
    return { ok: true, packet: { kind, sequence, payload: parsed.data } };
  }

  const parsed = ResultPayload.safeParse(raw);
  if (!parsed.success) {
    return fail({
      code: "invalid_payload",
      message: "Result payload does not match { content, is_error }",
      length: data.byteLength,
      sequence,
    });
  }
  return { ok: true, packet: { kind, sequence, payload: parsed.data } };
}

const fail = (details: ConstructorParameters<typeof DecodeError>[0]): DecodeResult => ({
  ok: false,
  error: new DecodeError(details),
});
