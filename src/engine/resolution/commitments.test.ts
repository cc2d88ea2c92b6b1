import { describe, it, expect } from "vitest";
import { encodePacked, keccak256, zeroHash, type Address, type Hex } from "viem";
import {
  isBytes32,
  legislatorVoteCommitment,
  requireAddress,
  requireEvidence,
  requireNonZeroBytes32,
  requireOutcome,
  resolutionCommitment,
} from "./commitments.js";
import { ValidationError } from "./errors.js";

const PROPOSER: Address = "0x1000000000000000000000000000000000000001";
const SALT: Hex = `0x${"ab".repeat(32)}`;
const EVIDENCE_HASH: Hex = `0x${"11".repeat(32)}`;

describe("resolutionCommitment", () => {
  it("hashes the packed outcome, evidence, salt and proposer", () => {
    const expected = keccak256(
      encodePacked(
        ["uint256", "string", "bytes32", "bytes32", "address"],
        [1n, "ipfs://evidence", EVIDENCE_HASH, SALT, PROPOSER]
      )
    );
    expect(resolutionCommitment(1, "ipfs://evidence", EVIDENCE_HASH, SALT, PROPOSER)).toBe(expected);
  });

  it("binds the commitment to the proposer and salt", () => {
    const base = resolutionCommitment(1, "ipfs://evidence", EVIDENCE_HASH, SALT, PROPOSER);
    expect(resolutionCommitment(1, "ipfs://evidence", EVIDENCE_HASH, SALT, "0x1000000000000000000000000000000000000002")).not.toBe(base);
    expect(resolutionCommitment(1, "ipfs://evidence", EVIDENCE_HASH, `0x${"cd".repeat(32)}`, PROPOSER)).not.toBe(base);
    expect(resolutionCommitment(0, "ipfs://evidence", EVIDENCE_HASH, SALT, PROPOSER)).not.toBe(base);
  });
});

describe("legislatorVoteCommitment", () => {
  it("differs by vote direction and round", () => {
    const yes = legislatorVoteCommitment("m1", 0, true, SALT, PROPOSER);
    expect(legislatorVoteCommitment("m1", 0, false, SALT, PROPOSER)).not.toBe(yes);
    expect(legislatorVoteCommitment("m1", 1, true, SALT, PROPOSER)).not.toBe(yes);
    expect(isBytes32(yes)).toBe(true);
  });
});

describe("input guards", () => {
  it("checksums addresses", () => {
    expect(requireAddress("0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed")).toBe(
      "0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed"
    );
    expect(() => requireAddress("0x1234", "challenger")).toThrow("Invalid challenger: 0x1234");
  });

  it("requires non-zero 32-byte hashes", () => {
    expect(() => requireNonZeroBytes32(zeroHash, "Commit hash")).toThrow("Commit hash must be non-zero");
    expect(() => requireNonZeroBytes32("0xabcd", "Commit hash")).toThrow("Commit hash must be a 32-byte hex string");
    expect(requireNonZeroBytes32(SALT, "Salt")).toBe(SALT);
  });

  it("validates evidence", () => {
    expect(requireEvidence("ipfs://x", EVIDENCE_HASH, 512)).toEqual({ uri: "ipfs://x", hash: EVIDENCE_HASH });
    expect(() => requireEvidence("   ", EVIDENCE_HASH, 512)).toThrow("Evidence URI is required");
    expect(() => requireEvidence("x".repeat(513), EVIDENCE_HASH, 512)).toThrow("Evidence URI exceeds 512 characters");
  });

  it("keeps outcomes in range", () => {
    expect(requireOutcome(1, 2)).toBe(1);
    expect(() => requireOutcome(2, 2)).toThrow("Outcome 2 is out of range [0, 2)");
    expect(() => requireOutcome(-1, 2)).toThrow(ValidationError);
  });
});
