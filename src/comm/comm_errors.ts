import { errorMessage } from "../observability/logger";

export class ChannelClosedError extends Error {
  public readonly code = "channel_closed" as const;

  constructor(message = "Channel closed") {
    super(message);
    this.name = "ChannelClosedError";
  }
}

export class SendCancelledError extends Error {
  public readonly code = "send_cancelled" as const;

  constructor(message = "Send cancelled before the channel had room") {
    super(message);
    this.name = "SendCancelledError";
  }
}

export class BindError extends Error {
  public readonly code = "bind_failed" as const;

  constructor(
    public readonly address: string,
    public readonly port: number,
    cause: unknown
  ) {
    super(`Failed to bind UDP socket on ${address}:${port}: ${errorMessage(cause)}`);
    this.name = "BindError";
  }

  toJSON() {
    return {
      error: "bind_failed",
      code: this.code,
      message: this.message,
      details: { address: this.address, port: this.port },
    };
  }
}
