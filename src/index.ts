#!/usr/bin/env node
import { BindError } from "./comm/comm_errors";
import { BoundedChannel } from "./comm/bounded_channel";
import { Dispatcher, type DispatcherExit } from "./comm/dispatcher";
import { UdpTransport } from "./comm/udp_transport";
import { loadCommConfig } from "./config/comm_config";
import { ConfigError } from "./config/config_error";
import type { UserRequest } from "./contracts/handoff";
import { DedupTable } from "./dedup/dedup_table";
import { createLogger, errorMessage } from "./observability/logger";
import { consumeHandoff } from "./orchestrator/handoff_consumer";
import { fakeOrchestratorReply } from "./orchestrator/fake_orchestrator";
import { buildStatusServer } from "./status_server";

const log = createLogger({ name: "relayboxd" });

async function main(): Promise<number> {
  const config = loadCommConfig();

  const transport = await UdpTransport.bind({
    address: config.listenAddress,
    port: config.listenPort,
    inboxCapacity: config.inboxCapacity,
    log,
  });

  const dedup = new DedupTable({ capacityPerPeer: config.dedupCapacity, ttlMs: config.dedupTtlMs });
  const handoff = new BoundedChannel<UserRequest>(config.handoffCapacity);
  const dispatcher = new Dispatcher({
    transport,
    handoff,
    dedup,
    log,
    maxPayloadBytes: config.maxPayloadBytes,
    replyTimeoutMs: config.replyTimeoutMs,
    sweepIntervalMs: config.sweepIntervalMs,
    shutdownMode: config.shutdownMode,
    ackResendMinIntervalMs: config.ackResendMinIntervalMs,
  });

  // A consumer that stops closes the hand-off, which stops the dispatcher.
  const consuming = consumeHandoff({
    channel: handoff,
    handler: fakeOrchestratorReply,
    concurrency: config.orchestratorConcurrency,
    log,
  }).catch((error: unknown) => {
    log.error({ evt: "orchestrator.consumer_failed", error: errorMessage(error) }, "orchestrator.consumer_failed");
  });

  const status =
    config.statusPort > 0
      ? buildStatusServer({
          status: { dispatcher: () => dispatcher.stats(), dedup: () => dedup.stats() },
          logLevel: process.env.LOG_LEVEL,
        })
      : null;

  if (status) {
    await status.listen({ port: config.statusPort, host: config.statusHost });
    log.info({ evt: "status.listening", host: config.statusHost, port: config.statusPort }, "status.listening");
  }

  let signalled: NodeJS.Signals | null = null;
  const onSignal = (signal: NodeJS.Signals) => {
    if (signalled) return;
    signalled = signal;
    log.info({ evt: "relay.signal", signal }, "relay.signal");
    dispatcher.stop("drain").catch((error: unknown) => {
      log.error({ evt: "relay.stop_failed", error: errorMessage(error) }, "relay.stop_failed");
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const exit: DispatcherExit = await dispatcher.run();

  handoff.close();
  await consuming;
  await status?.close();

  if (exit.reason === "stopped") {
    log.info({ evt: "relay.shutdown", signal: signalled, inFlightAtExit: exit.inFlightAtExit }, "relay.shutdown");
    return 0;
  }

  log.error({ evt: "relay.fatal", reason: exit.reason, inFlightAtExit: exit.inFlightAtExit }, "relay.fatal");
  return 1;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    if (error instanceof BindError || error instanceof ConfigError) {
      log.error({ evt: "relay.startup_fatal", ...error.toJSON() }, "relay.startup_fatal");
    } else {
      log.error({ evt: "relay.fatal", error: errorMessage(error) }, "relay.fatal");
    }
    process.exit(1);
  });
