export type DecodeErrorCode =
  | "truncated"
  | "unknown_kind"
  | "invalid_payload"
  | "unexpected_payload";

export interface DecodeErrorDetails {
  code: DecodeErrorCode;
  message: string;
  // Bounded details (never the payload itself)
  length?: number;
  kindByte?: number;
  sequence?: number;
}

export class DecodeError extends Error {
  public readonly code: DecodeErrorCode;
  public readonly details: DecodeErrorDetails;

  constructor(details: DecodeErrorDetails) {
    super(details.message);
    this.name = "DecodeError";
    this.code = details.code;
    this.details = details;
  }

  toJSON() {
    return {
      error: "decode_failed",
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class PayloadTooLargeError extends Error {
  public readonly code = "payload_too_large" as const;

  constructor(
    public readonly size: number,
    public readonly max: number
  ) {
    super(`Payload too large: ${size} bytes (max ${max})`);
    this.name = "PayloadTooLargeError";
  }

  toJSON() {
    return {
      error: "payload_too_large",
      code: this.code,
      message: this.message,
      details: { size: this.size, max: this.max },
    };
  }
}
