import { describe, it, expect, beforeEach } from "vitest";
import { parseEther } from "viem";
import { resolutionCommitment } from "../../src/engine/index.js";
import { MAX_REVEAL_DELAY, MIN_COMMIT_BOND } from "../../src/engine/resolution/constants.js";
import { MarketRegistry } from "../../src/services/market-registry.service.js";
import type { MarketResolutionState } from "../../src/types/collaborators.js";
import {
  EVIDENCE_HASH,
  EVIDENCE_URI,
  MARKET,
  OUTSIDER,
  PROPOSER,
  SALT,
  STARTING_BALANCE,
  SUPPORTER,
  T0,
  captureError,
  createHarness,
  eventTypes,
  propose,
  type Harness,
} from "../helpers/harness.js";

const commitHash = resolutionCommitment(1, EVIDENCE_URI, EVIDENCE_HASH, SALT, PROPOSER);

describe("commit-reveal proposal", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("opens a round with the proposer's bonus-weighted stake", () => {
    const resolution = propose(h);

    expect(resolution).toMatchObject({
      marketId: MARKET,
      round: 0,
      proposer: PROPOSER,
      proposedOutcome: 1,
      proposedAt: T0 + 300,
      supportStake: parseEther("1"),
      weightedSupportStake: parseEther("1.05"),
      supportCount: 1,
      proposerBonusBps: 500n,
      status: "PENDING",
      finalized: false,
    });
    expect(h.markets.getResolutionState(MARKET)).toBe("DISPUTE_WINDOW");
    expect(h.protocol.getRosterSnapshot(MARKET)).toHaveLength(3);
    expect(h.protocol.getCommit(MARKET, PROPOSER)).toMatchObject({ revealed: true, bond: MIN_COMMIT_BOND });
    expect(h.funds.balanceOf(PROPOSER)).toBe(STARTING_BALANCE - parseEther("1"));
    expect(eventTypes(h)).toEqual(["ResolutionCommitted", "ResolutionProposed"]);
    expect(h.protocol.getMetrics().resolutionsProposed).toBe(1);
  });

  it("requires the market to be in settlement", () => {
    h.markets.register({ marketId: "market-2", tradingEnd: T0, resolutionTime: T0, outcomeCount: 2 });
    expect(() => h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, "market-2", commitHash)).toThrow(
      "Market market-2 is not in settlement (state TRADING)"
    );
  });

  it("rejects a bond below the minimum", () => {
    expect(() =>
      h.protocol.commitResolution({ sender: PROPOSER, value: parseEther("0.05") }, MARKET, commitHash)
    ).toThrow("Commit bond 50000000000000000 is below the minimum 100000000000000000");
  });

  it("allows one pending commit per market and enforces the cooldown across markets", () => {
    h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, MARKET, commitHash);
    expect(() => h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, MARKET, commitHash)).toThrow(
      "A pending commit already exists for this market"
    );

    h.markets.register({ marketId: "market-2", tradingEnd: T0, resolutionTime: T0, outcomeCount: 2, state: "SETTLEMENT" });
    h.clock.advance(600);
    expect(() =>
      h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, "market-2", commitHash)
    ).toThrow("Commit cooldown has not elapsed");
  });

  it("enforces the reveal window", () => {
    h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, MARKET, commitHash);
    const input = { outcome: 1, evidenceUri: EVIDENCE_URI, evidenceHash: EVIDENCE_HASH, salt: SALT };

    h.clock.advance(299);
    expect(captureError(() => h.protocol.proposeResolution({ sender: PROPOSER, value: parseEther("1") }, MARKET, input))).toMatchObject({
      code: "WINDOW_CLOSED",
      message: "Reveal is too early",
    });

    h.clock.set(T0 + MAX_REVEAL_DELAY + 1);
    expect(captureError(() => h.protocol.proposeResolution({ sender: PROPOSER, value: parseEther("1") }, MARKET, input))).toMatchObject({
      code: "WINDOW_CLOSED",
      message: "Reveal deadline has passed",
    });
  });

  it("rejects a reveal that does not match the commitment", () => {
    h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, MARKET, commitHash);
    h.clock.advance(300);
    expect(() =>
      h.protocol.proposeResolution({ sender: PROPOSER, value: parseEther("1") }, MARKET, {
        outcome: 0,
        evidenceUri: EVIDENCE_URI,
        evidenceHash: EVIDENCE_HASH,
        salt: SALT,
      })
    ).toThrow("Reveal does not match the commitment");
    expect(h.protocol.getRoundCount(MARKET)).toBe(0);
  });

  it("rejects a proposal stake below the minimum", () => {
    h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, MARKET, commitHash);
    h.clock.advance(300);
    expect(() =>
      h.protocol.proposeResolution({ sender: PROPOSER, value: parseEther("0.5") }, MARKET, {
        outcome: 1,
        evidenceUri: EVIDENCE_URI,
        evidenceHash: EVIDENCE_HASH,
        salt: SALT,
      })
    ).toThrow("Proposal stake 500000000000000000 is below the minimum 1000000000000000000");
  });

  it("blocks new commits while a resolution is live", () => {
    propose(h);
    const hash = resolutionCommitment(0, EVIDENCE_URI, EVIDENCE_HASH, SALT, SUPPORTER);
    expect(() => h.protocol.commitResolution({ sender: SUPPORTER, value: MIN_COMMIT_BOND }, MARKET, hash)).toThrow(
      "Market market-1 is not in settlement (state DISPUTE_WINDOW)"
    );
  });
});

describe("slashing unrevealed commits", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.protocol.commitResolution({ sender: PROPOSER, value: MIN_COMMIT_BOND }, MARKET, commitHash);
  });

  it("waits for the reveal deadline", () => {
    h.clock.set(T0 + MAX_REVEAL_DELAY);
    expect(() => h.protocol.slashUnrevealedCommit({ sender: OUTSIDER }, MARKET, PROPOSER)).toThrow(
      "Reveal deadline has not passed"
    );
  });

  it("pays the slasher a 10% bounty and keeps the rest as protocol fees", () => {
    h.clock.set(T0 + MAX_REVEAL_DELAY + 1);
    const bounty = h.protocol.slashUnrevealedCommit({ sender: OUTSIDER }, MARKET, PROPOSER);

    expect(bounty).toBe(parseEther("0.01"));
    expect(h.funds.balanceOf(OUTSIDER)).toBe(STARTING_BALANCE + parseEther("0.01"));
    expect(h.protocol.getTreasury()).toEqual({
      custodied: parseEther("0.09"),
      earmarked: 0n,
      protocolFees: parseEther("0.09"),
      unallocated: parseEther("0.09"),
    });
    expect(h.protocol.getMetrics()).toMatchObject({ commitsSlashed: 1, totalSlashed: parseEther("0.09") });
    expect(() => h.protocol.slashUnrevealedCommit({ sender: OUTSIDER }, MARKET, PROPOSER)).toThrow(
      "Commit was already slashed"
    );
  });

  it("reports a missing commit as not found", () => {
    expect(captureError(() => h.protocol.slashUnrevealedCommit({ sender: OUTSIDER }, MARKET, SUPPORTER))).toMatchObject({
      code: "NOT_FOUND",
    });
  });
});

describe("collaborator calls", () => {
  it("binds the market's price feed at proposal time", () => {
    const h = createHarness({ priceFeedId: "feed-eth" });
    h.priceOracle.pushPrice("feed-eth", { value: 3_000n, timestamp: T0, round: 7n });
    propose(h);

    expect(h.priceOracle.getRecordedPrice(MARKET)).toEqual({
      value: 3_000n,
      timestamp: T0,
      round: 7n,
      asset: "ETH/USD",
      recorded: true,
      stale: false,
    });
  });

  it("records a failed price binding without failing the proposal", () => {
    const h = createHarness({ priceFeedId: "feed-eth" });
    propose(h);

    expect(h.protocol.getRoundCount(MARKET)).toBe(1);
    expect(h.events.find((e) => e.type === "ExternalCallFailed")).toMatchObject({
      target: "priceOracle",
      action: "recordPrice",
      marketId: MARKET,
      error: "No price for feed feed-eth",
    });
    expect(h.logger.messages("warn")).toEqual(["External call failed; continuing"]);
  });

  it("keeps the proposal when the market refuses a state change", () => {
    class OfflineMarkets extends MarketRegistry {
      override advanceResolutionState(_marketId: string, _next: MarketResolutionState): void {
        throw new Error("market offline");
      }
    }
    const h = createHarness({ markets: new OfflineMarkets() });
    propose(h);

    expect(h.protocol.getResolution(MARKET).status).toBe("PENDING");
    expect(h.markets.getResolutionState(MARKET)).toBe("SETTLEMENT");
    expect(h.events.filter((e) => e.type === "ExternalCallFailed")).toEqual([
      {
        type: "ExternalCallFailed",
        at: T0 + 300,
        target: "market",
        action: "advance:PROPOSED",
        marketId: MARKET,
        error: "market offline",
      },
    ]);
  });
});
