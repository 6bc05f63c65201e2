import type { OrchestratorReply } from "../contracts/handoff";

export type ReplyOutcome =
  | { status: "resolved"; reply: OrchestratorReply }
  | { status: "dropped"; reason: string };

type SlotState = "pending" | "resolved" | "dropped";

/**
 * Single-use reply slot between the dispatcher and the orchestrator.
 *
 * Exactly one of resolve()/drop() takes effect; later calls return false and
 * change nothing. `outcome` settles with whichever came first.
 */
export class ReplySlot {
  private state: SlotState = "pending";
  private settle: (outcome: ReplyOutcome) => void = () => {};
  readonly outcome: Promise<ReplyOutcome>;

  constructor() {
    this.outcome = new Promise<ReplyOutcome>((resolve) => {
      this.settle = resolve;
    });
  }

  get settled(): boolean {
    return this.state !== "pending";
  }

  get status(): SlotState {
    return this.state;
  }

  resolve(reply: OrchestratorReply): boolean {
    if (this.state !== "pending") return false;
    this.state = "resolved";
    this.settle({ status: "resolved", reply: { content: reply.content, isError: reply.isError } });
    return true;
  }

  drop(reason = "dropped"): boolean {
    if (this.state !== "pending") return false;
    this.state = "dropped";
    this.settle({ status: "dropped", reason });
    return true;
  }
}
