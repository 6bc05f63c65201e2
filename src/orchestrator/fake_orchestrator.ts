import type { OrchestratorReply } from "../contracts/handoff";

/**
 * Deterministic stand-in for the reasoning loop. It lets the daemon run the
 * full request/acknowledge/result cycle without any model or executor wired in.
 */
export async function fakeOrchestratorReply(input: { content: string }): Promise<OrchestratorReply> {
  if (!input.content.trim()) {
    return { content: "Empty request", isError: true };
  }
  return {
    content: `Stub response: I received ${input.content.length} chars.`,
    isError: false,
  };
}
