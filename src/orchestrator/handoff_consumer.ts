import type { BoundedChannel } from "../comm/bounded_channel";
import type { OrchestratorReply, UserRequest } from "../contracts/handoff";
import { peerId, type PeerKey } from "../contracts/peer";
import { errorMessage, silentLogger, type ComponentLogger } from "../observability/logger";

export type OrchestratorHandler = (input: { content: string; peer: PeerKey }) => Promise<OrchestratorReply>;

type ConsumeOptions = {
  channel: BoundedChannel<UserRequest>;
  handler: OrchestratorHandler;
  concurrency?: number;
  log?: ComponentLogger;
};

/**
 * Drains the hand-off channel until it closes. Every request's reply slot is
 * settled exactly once: resolved with the handler's reply, or dropped when the
 * handler throws. The channel is closed once the workers stop, however they
 * stop, so senders never wait on a consumer that is gone.
 */
export async function consumeHandoff(opts: ConsumeOptions): Promise<void> {
  const log = opts.log ?? silentLogger;
  const concurrency = Math.max(1, opts.concurrency ?? 1);

  const worker = async (workerIndex: number) => {
    for await (const request of opts.channel) {
      const startedAt = Date.now();
      try {
        const reply = await opts.handler({ content: request.content, peer: request.peer });
        if (!request.reply.resolve(reply)) {
          log.debug(
            { evt: "orchestrator.reply_late", peer: peerId(request.peer), workerIndex },
            "orchestrator.reply_late"
          );
        }
      } catch (error) {
        log.warn(
          {
            evt: "orchestrator.handler_failed",
            peer: peerId(request.peer),
            workerIndex,
            error: errorMessage(error),
          },
          "orchestrator.handler_failed"
        );
        request.reply.drop(errorMessage(error));
      }
      log.debug(
        { evt: "orchestrator.request_done", peer: peerId(request.peer), workerIndex, ms: Date.now() - startedAt },
        "orchestrator.request_done"
      );
    }
  };

  try {
    await Promise.all(Array.from({ length: concurrency }, (_, index) => worker(index)));
  } finally {
    opts.channel.close();
  }
}
