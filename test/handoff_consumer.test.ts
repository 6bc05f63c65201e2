import { describe, it, expect } from "vitest";

import { BoundedChannel } from "../src/comm/bounded_channel";
import { ChannelClosedError } from "../src/comm/comm_errors";
import { ReplySlot } from "../src/comm/reply_slot";
import type { UserRequest } from "../src/contracts/handoff";
import { consumeHandoff } from "../src/orchestrator/handoff_consumer";
import { fakeOrchestratorReply } from "../src/orchestrator/fake_orchestrator";
import { makeLogger } from "./helpers/capture_logger";

const peer = { address: "192.0.2.10", port: 7000 };

const makeRequest = (content: string): UserRequest => ({ content, peer, reply: new ReplySlot() });

describe("fakeOrchestratorReply", () => {
  it("reports the size of what it received", async () => {
    await expect(fakeOrchestratorReply({ content: "df -h" })).resolves.toEqual({
      content: "Stub response: I received 5 chars.",
      isError: false,
    });
  });

  it("flags blank input as an error", async () => {
    await expect(fakeOrchestratorReply({ content: " \n" })).resolves.toEqual({
      content: "Empty request",
      isError: true,
    });
  });
});

describe("consumeHandoff", () => {
  it("resolves each reply slot with the handler's reply", async () => {
    const channel = new BoundedChannel<UserRequest>(4);
    const first = makeRequest("one");
    const second = makeRequest("three");
    await channel.send(first);
    await channel.send(second);
    channel.close();

    await consumeHandoff({ channel, handler: fakeOrchestratorReply });

    await expect(first.reply.outcome).resolves.toEqual({
      status: "resolved",
      reply: { content: "Stub response: I received 3 chars.", isError: false },
    });
    await expect(second.reply.outcome).resolves.toMatchObject({
      reply: { content: "Stub response: I received 5 chars." },
    });
  });

  it("drops the slot when the handler throws and keeps going", async () => {
    const channel = new BoundedChannel<UserRequest>(4);
    const failing = makeRequest("boom");
    const fine = makeRequest("ok");
    await channel.send(failing);
    await channel.send(fine);
    channel.close();
    const { log, events } = makeLogger();

    await consumeHandoff({
      channel,
      log,
      handler: async ({ content }) => {
        if (content === "boom") throw new Error("handler exploded");
        return { content: "fine", isError: false };
      },
    });

    await expect(failing.reply.outcome).resolves.toEqual({ status: "dropped", reason: "handler exploded" });
    await expect(fine.reply.outcome).resolves.toMatchObject({ status: "resolved" });
    expect(events("orchestrator.handler_failed")).toHaveLength(1);
  });

  it("notes replies that arrive after the slot was settled", async () => {
    const channel = new BoundedChannel<UserRequest>(1);
    const request = makeRequest("late");
    request.reply.drop("reply_timeout");
    await channel.send(request);
    channel.close();
    const { log, events } = makeLogger();

    await consumeHandoff({ channel, log, handler: fakeOrchestratorReply });

    expect(events("orchestrator.reply_late")).toHaveLength(1);
  });

  it("closes the channel when it stops on an error", async () => {
    const channel = new BoundedChannel<UserRequest>(2);
    await channel.send(makeRequest("one"));
    const { log } = makeLogger();
    const failingLog = {
      ...log,
      debug: () => {
        throw new Error("log sink gone");
      },
    };

    await expect(consumeHandoff({ channel, log: failingLog, handler: fakeOrchestratorReply })).rejects.toThrow(
      "log sink gone"
    );
    expect(channel.closed).toBe(true);
    await expect(channel.send(makeRequest("two"))).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it("runs several workers concurrently", async () => {
    const channel = new BoundedChannel<UserRequest>(4);
    let active = 0;
    let peak = 0;
    const requests = ["a", "b", "c"].map(makeRequest);
    for (const request of requests) await channel.send(request);
    channel.close();

    await consumeHandoff({
      channel,
      concurrency: 3,
      handler: async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return { content: "done", isError: false };
      },
    });

    expect(peak).toBe(3);
    expect(requests.every((request) => request.reply.status === "resolved")).toBe(true);
  });
});
