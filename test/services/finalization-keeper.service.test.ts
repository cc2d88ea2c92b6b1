import { describe, it, expect, afterEach, vi } from "vitest";
import { DISPUTE_PERIOD } from "../../src/engine/resolution/constants.js";
import {
  runFinalizationSweep,
  startFinalizationKeeper,
  stopFinalizationKeeper,
  type FinalizationTarget,
} from "../../src/services/finalization-keeper.service.js";
import { MANAGER, MARKET, RecordingLogger, createHarness, propose } from "../helpers/harness.js";

describe("finalization keeper", () => {
  afterEach(() => {
    stopFinalizationKeeper();
    vi.useRealTimers();
  });

  it("finalizes every round whose dispute window has closed", () => {
    const h = createHarness();
    const { proposedAt } = propose(h);
    const log = new RecordingLogger();

    expect(runFinalizationSweep(h.protocol, MANAGER, log)).toEqual({ finalized: [], failed: [] });

    h.clock.set(proposedAt + DISPUTE_PERIOD);
    expect(runFinalizationSweep(h.protocol, MANAGER, log)).toEqual({
      finalized: [{ marketId: MARKET, round: 0 }],
      failed: [],
    });
    expect(h.protocol.getResolution(MARKET).status).toBe("APPROVED");
    expect(log.messages("info")).toEqual(["Keeper finalized resolution"]);
  });

  it("keeps sweeping past a round that fails", () => {
    const target: FinalizationTarget = {
      listFinalizable: () => [
        { marketId: "market-a", round: 0 },
        { marketId: "market-b", round: 2 },
      ],
      finalizeResolution: (_call, marketId) => {
        throw new Error(`cannot finalize ${marketId}`);
      },
    };
    const log = new RecordingLogger();

    const result = runFinalizationSweep(target, MANAGER, log);
    expect(result.finalized).toEqual([]);
    expect(result.failed).toEqual([
      { marketId: "market-a", round: 0, error: "cannot finalize market-a" },
      { marketId: "market-b", round: 2, error: "cannot finalize market-b" },
    ]);
    expect(log.messages("warn")).toEqual(["Keeper finalization failed", "Keeper finalization failed"]);
  });

  it("sweeps on an interval until stopped", () => {
    vi.useFakeTimers();
    const listFinalizable = vi.fn(() => []);
    const target: FinalizationTarget = {
      listFinalizable,
      finalizeResolution: () => {
        throw new Error("unreachable");
      },
    };
    const log = new RecordingLogger();

    startFinalizationKeeper(target, MANAGER, 10_000, log);
    startFinalizationKeeper(target, MANAGER, 10_000, log);
    vi.advanceTimersByTime(25_000);
    expect(listFinalizable).toHaveBeenCalledTimes(2);

    stopFinalizationKeeper();
    vi.advanceTimersByTime(30_000);
    expect(listFinalizable).toHaveBeenCalledTimes(2);
    expect(log.messages("info")).toEqual(["Finalization keeper started"]);
  });
});
