import { describe, it, expect, beforeEach } from "vitest";
import { parseEther } from "viem";
import { DISPUTE_PERIOD, EVIDENCE_CHALLENGE_PERIOD } from "../../src/engine/resolution/constants.js";
import { SolvencyError } from "../../src/engine/index.js";
import {
  CHALLENGER,
  EVIDENCE_HASH,
  EVIDENCE_URI,
  LEGISLATOR_B,
  MANAGER,
  MARKET,
  OPPONENT,
  OUTSIDER,
  SALT,
  SECOND_CHALLENGER,
  STARTING_BALANCE,
  SUPPORTER,
  captureError,
  createHarness,
  propose,
  type Harness,
} from "../helpers/harness.js";

describe("evidence challenges", () => {
  let h: Harness;
  let proposedAt: number;

  beforeEach(() => {
    h = createHarness();
    proposedAt = propose(h).proposedAt;
  });

  it("rejects the round immediately when a challenge is upheld", () => {
    h.clock.advance(10);
    h.protocol.supportResolution({ sender: SUPPORTER, value: parseEther("2") }, MARKET);
    h.clock.advance(10);
    const challenge = h.protocol.challengeEvidence(
      { sender: CHALLENGER, value: parseEther("0.5") },
      MARKET,
      "Source does not say what the proposal claims"
    );
    expect(challenge).toMatchObject({ index: 0, stake: parseEther("0.5"), resolved: false });

    const payout = h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 0, true);
    expect(payout).toBe(parseEther("1"));
    expect(h.protocol.getResolution(MARKET)).toMatchObject({
      status: "REJECTED",
      rejectedByEvidence: true,
      evidencePenaltyPaid: parseEther("0.5"),
    });
    expect(h.markets.getResolutionState(MARKET)).toBe("SETTLEMENT");
    expect(h.events.find((e) => e.type === "ResolutionStatusChanged")).toMatchObject({
      status: "REJECTED",
      reason: "evidence-upheld",
    });

    const finalized = h.protocol.finalizeResolution({ sender: OUTSIDER }, MARKET);
    expect(finalized.settlement).toMatchObject({
      forfeited: parseEther("2.5"),
      protocolFee: parseEther("0.075"),
      slashedToTreasury: parseEther("2.425"),
    });
    expect(h.protocol.getTreasury()).toEqual({
      custodied: parseEther("2.5"),
      earmarked: 0n,
      protocolFees: parseEther("2.5"),
      unallocated: parseEther("2.5"),
    });
    expect(h.protocol.getMetrics().totalSlashed).toBe(parseEther("2.5"));
    expect(h.funds.balanceOf(CHALLENGER)).toBe(STARTING_BALANCE + parseEther("0.5"));
    expect(() => h.protocol.claimResolutionReward({ sender: SUPPORTER }, MARKET)).toThrow(
      "Supporters of a rejected resolution have nothing to claim"
    );
  });

  it("refunds the stake of a rejected challenge", () => {
    h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.5") }, MARKET, "Looks wrong");
    expect(h.protocol.resolveEvidenceChallenge({ sender: LEGISLATOR_B }, MARKET, 0, false)).toBe(parseEther("0.5"));

    expect(h.protocol.getResolution(MARKET).status).toBe("PENDING");
    expect(h.protocol.getEvidenceChallenges(MARKET)).toMatchObject([{ resolved: true, upheld: false }]);
    expect(h.funds.balanceOf(CHALLENGER)).toBe(STARTING_BALANCE);
    expect(() => h.protocol.resolveEvidenceChallenge({ sender: LEGISLATOR_B }, MARKET, 0, false)).toThrow(
      "Evidence challenge already resolved"
    );
  });

  it("only lets legislators and oracle managers adjudicate", () => {
    h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.5") }, MARKET, "Looks wrong");
    expect(captureError(() => h.protocol.resolveEvidenceChallenge({ sender: OUTSIDER }, MARKET, 0, true))).toMatchObject({
      code: "UNAUTHORIZED",
    });
    expect(captureError(() => h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 3, true))).toMatchObject({
      code: "NOT_FOUND",
      message: "Evidence challenge 3 not found",
    });
  });

  it("validates new challenges", () => {
    expect(() =>
      h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.5") }, MARKET, "   ")
    ).toThrow("Challenge reason is required");
    expect(() =>
      h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.4") }, MARKET, "Looks wrong")
    ).toThrow("Challenge stake 400000000000000000 is below the minimum 500000000000000000");

    h.clock.set(proposedAt + EVIDENCE_CHALLENGE_PERIOD);
    expect(
      captureError(() => h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.5") }, MARKET, "Late"))
    ).toMatchObject({ code: "WINDOW_CLOSED", message: "Evidence challenge window has closed" });
  });

  it("holds finalization until every challenge is resolved", () => {
    h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.5") }, MARKET, "Looks wrong");
    h.clock.set(proposedAt + DISPUTE_PERIOD);

    expect(() => h.protocol.finalizeResolution({ sender: OUTSIDER }, MARKET)).toThrow(
      "Evidence challenges are still unresolved"
    );
    expect(h.protocol.listFinalizable()).toEqual([]);

    h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 0, false);
    expect(h.protocol.finalizeResolution({ sender: OUTSIDER }, MARKET).status).toBe("APPROVED");
  });

  it("never pays challengers more than the forfeitable support", () => {
    h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("1") }, MARKET, "Wrong source");
    h.protocol.challengeEvidence({ sender: SECOND_CHALLENGER, value: parseEther("0.5") }, MARKET, "Wrong date");

    expect(h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 0, true)).toBe(parseEther("2"));
    expect(() => h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 1, true)).toThrow(SolvencyError);
    expect(h.protocol.getEvidenceChallenges(MARKET)[1]?.resolved).toBe(false);

    expect(h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 1, false)).toBe(parseEther("0.5"));
    expect(h.protocol.getEarmarked(MARKET)).toBe(0n);
  });

  it("settles every challenge on a rejected round before the market takes a new proposal", () => {
    h.protocol.opposeResolution({ sender: OPPONENT, value: parseEther("3") }, MARKET);
    h.protocol.challengeEvidence({ sender: CHALLENGER, value: parseEther("0.5") }, MARKET, "Wrong source");
    h.protocol.challengeEvidence({ sender: SECOND_CHALLENGER, value: parseEther("0.5") }, MARKET, "Wrong date");
    h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 0, true);
    expect(h.markets.getResolutionState(MARKET)).toBe("SETTLEMENT");

    expect(() => propose(h, { proposer: SUPPORTER })).toThrow(
      "Evidence challenges on the previous round are still unresolved"
    );
    expect(h.protocol.getRoundCount(MARKET)).toBe(1);

    expect(h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 1, false, 0)).toBe(parseEther("0.5"));
    const next = h.protocol.proposeResolution({ sender: SUPPORTER, value: parseEther("1") }, MARKET, {
      outcome: 1,
      evidenceUri: EVIDENCE_URI,
      evidenceHash: EVIDENCE_HASH,
      salt: SALT,
    });
    expect(next.round).toBe(1);

    expect(captureError(() => h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 1, true))).toMatchObject({
      code: "NOT_FOUND",
      message: "Evidence challenge 1 not found",
    });
    expect(() => h.protocol.resolveEvidenceChallenge({ sender: MANAGER }, MARKET, 1, true, 0)).toThrow(
      "Evidence challenge already resolved"
    );

    expect(h.protocol.finalizeResolution({ sender: OUTSIDER }, MARKET, 0).status).toBe("REJECTED");
    expect(h.protocol.claimOppositionReward({ sender: OPPONENT }, MARKET, 0)).toBe(3399999999999999999n);
    expect(h.funds.balanceOf(SECOND_CHALLENGER)).toBe(STARTING_BALANCE);
  });
});
