import { describe, it, expect, vi } from "vitest";
import { parseEther } from "viem";
import {
  createRedisEventSink,
  serializeProtocolEvent,
  type EventPublisher,
} from "../../src/services/protocol-events.service.js";
import type { ProtocolEvent } from "../../src/types/resolution.js";
import { CHALLENGER, MARKET, RecordingLogger, T0 } from "../helpers/harness.js";

const event: ProtocolEvent = {
  type: "DisputeFiled",
  at: T0,
  marketId: MARKET,
  round: 0,
  index: 0,
  challenger: CHALLENGER,
  alternativeOutcome: 0,
  bond: parseEther("2"),
};

describe("protocol event broadcast", () => {
  it("serializes amounts as decimal strings", () => {
    expect(JSON.parse(serializeProtocolEvent(event))).toEqual({
      type: "DisputeFiled",
      at: T0,
      marketId: MARKET,
      round: 0,
      index: 0,
      challenger: CHALLENGER,
      alternativeOutcome: 0,
      bond: "2000000000000000000",
    });
  });

  it("publishes each event on the resolution channel", () => {
    const publish = vi.fn(async (_channel: string, _message: string) => 1);
    const publisher: EventPublisher = { publish };
    const sink = createRedisEventSink(publisher, new RecordingLogger());

    sink(event);
    expect(publish).toHaveBeenCalledWith("resolution_events", serializeProtocolEvent(event));
  });

  it("logs a failed publish instead of throwing", async () => {
    const publisher: EventPublisher = { publish: () => Promise.reject(new Error("redis down")) };
    const log = new RecordingLogger();
    const sink = createRedisEventSink(publisher, log);

    expect(() => sink(event)).not.toThrow();
    await vi.waitFor(() => {
      expect(log.messages("warn")).toEqual(["Protocol event broadcast failed"]);
    });
  });
});
