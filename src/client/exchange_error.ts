import type { ExchangeFailureCode } from "./exchange_machine";

export type ExchangeErrorCode = ExchangeFailureCode | "busy";

export class ExchangeError extends Error {
  constructor(
    public readonly code: ExchangeErrorCode,
    message: string,
    public readonly sequence?: number
  ) {
    super(message);
    this.name = "ExchangeError";
  }

  toJSON() {
    return {
      error: "exchange_failed",
      code: this.code,
      message: this.message,
      details: { sequence: this.sequence },
    };
  }
}
