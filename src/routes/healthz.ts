import type { FastifyInstance } from "fastify";

import type { DispatcherStats } from "../comm/dispatcher";
import type { DedupStats } from "../dedup/dedup_table";

export type StatusSource = {
  dispatcher: () => DispatcherStats;
  dedup: () => DedupStats;
};

export async function healthRoutes(app: FastifyInstance, opts: { status: StatusSource }) {
  app.get("/healthz", async () => {
    const dispatcher = opts.status.dispatcher();
    const dedup = opts.status.dedup();

    return {
      ok: dispatcher.state === "running" || dispatcher.state === "draining",
      service: "relaybox",
      ts: new Date().toISOString(),
      dispatcher: {
        state: dispatcher.state,
        inFlight: dispatcher.inFlight,
        received: dispatcher.received,
        forwarded: dispatcher.forwarded,
        duplicates: dispatcher.duplicates,
        dropped: dispatcher.dropped,
      },
      dedup: {
        peers: dedup.peers,
        entries: dedup.entries,
      },
    };
  });
}
