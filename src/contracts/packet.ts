import { z } from "zod";

// Wire kind bytes. Requests flow peer -> daemon; acknowledgements and results flow back.
export const KIND_BYTE = {
  request: 0x01,
  acknowledge: 0x02,
  result: 0x03,
} as const;

export type PacketKind = keyof typeof KIND_BYTE;

export const HEADER_BYTES = 5;
export const MAX_SEQUENCE = 0xffff_ffff;
export const DEFAULT_MAX_PAYLOAD_BYTES = 65_536;

export function kindFromByte(byte: number): PacketKind | null {
  switch (byte) {
    case KIND_BYTE.request:
      return "request";
    case KIND_BYTE.acknowledge:
      return "acknowledge";
    case KIND_BYTE.result:
      return "result";
    default:
      return null;
  }
}

// Payloads are accepted in map form (what we encode) or in the positional form
// compact MessagePack encoders emit for structs. Unknown keys and trailing
// elements are ignored so newer senders can add fields.
export const RequestPayload = z
  .union([
    z.object({ content: z.string() }),
    z.tuple([z.string()]).rest(z.unknown()),
  ])
  .transform((raw) => (Array.isArray(raw) ? { content: raw[0] } : { content: raw.content }));

export type RequestPayload = z.output<typeof RequestPayload>;

export const ResultPayload = z
  .union([
    z.object({ content: z.string(), is_error: z.boolean() }),
    z.tuple([z.string(), z.boolean()]).rest(z.unknown()),
  ])
  .transform((raw) =>
    Array.isArray(raw)
      ? { content: raw[0], isError: raw[1] }
      : { content: raw.content, isError: raw.is_error }
  );

export type ResultPayload = z.output<typeof ResultPayload>;

export type RequestPacket = {
  kind: "request";
  sequence: number;
  payload: RequestPayload;
};

export type AcknowledgePacket = {
  kind: "acknowledge";
  sequence: number;
};

export type ResultPacket = {
  kind: "result";
  sequence: number;
  payload: ResultPayload;
};

export type Packet = RequestPacket | AcknowledgePacket | ResultPacket;

export const requestPacket = (sequence: number, content: string): RequestPacket => ({
  kind: "request",
  sequence,
  payload: { content },
});

export const acknowledgePacket = (sequence: number): AcknowledgePacket => ({
  kind: "acknowledge",
  sequence,
});

export const resultPacket = (
  sequence: number,
  content: string,
  isError: boolean
): ResultPacket => ({
  kind: "result",
  sequence,
  payload: { content, isError },
});
