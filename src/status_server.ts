import Fastify, { type FastifyInstance } from "fastify";

import { healthRoutes, type StatusSource } from "./routes/healthz";

export function buildStatusServer(opts: { status: StatusSource; logLevel?: string }): FastifyInstance {
  const app = Fastify({
    logger: { name: "relaybox-status", level: opts.logLevel ?? "warn" },
  });

  app.register(healthRoutes, { status: opts.status });
  return app;
}
