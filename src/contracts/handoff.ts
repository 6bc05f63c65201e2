import type { ReplySlot } from "../comm/reply_slot";
import type { PeerKey } from "./peer";

export type OrchestratorReply = {
  content: string;
  isError: boolean;
};

// One unit of work handed from the dispatcher to the orchestrator.
export type UserRequest = {
  content: string;
  peer: PeerKey;
  reply: ReplySlot;
};
