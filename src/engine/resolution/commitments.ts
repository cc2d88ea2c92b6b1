/**
 * Commitment hashing for both commit-reveal layers.
 * Commitments are keccak256 over the packed ABI encoding EVM wallets produce, so a wallet can build them.
 */

import { encodePacked, getAddress, isAddress, isHex, keccak256, zeroHash, type Address, type Hex } from "viem";
import { ValidationError } from "./errors.js";
import type { EvidenceRef } from "../../types/resolution.js";

export function resolutionCommitment(
  outcome: number,
  evidenceUri: string,
  evidenceHash: Hex,
  salt: Hex,
  proposer: Address
): Hex {
  return keccak256(
    encodePacked(
      ["uint256", "string", "bytes32", "bytes32", "address"],
      [BigInt(outcome), evidenceUri, evidenceHash, salt, proposer]
    )
  );
}

export function legislatorVoteCommitment(
  marketId: string,
  round: number,
  support: boolean,
  salt: Hex,
  legislator: Address
): Hex {
  return keccak256(
    encodePacked(
      ["string", "uint256", "bool", "bytes32", "address"],
      [marketId, BigInt(round), support, salt, legislator]
    )
  );
}

export function isBytes32(value: string): value is Hex {
  return isHex(value, { strict: true }) && value.length === 66;
}

export function requireBytes32(value: string, label: string): Hex {
  if (!isBytes32(value)) throw new ValidationError(`${label} must be a 32-byte hex string`);
  return value;
}

export function requireNonZeroBytes32(value: string, label: string): Hex {
  const hex = requireBytes32(value, label);
  if (hex.toLowerCase() === zeroHash) throw new ValidationError(`${label} must be non-zero`);
  return hex;
}

export function requireAddress(value: string, label = "address"): Address {
  if (!isAddress(value)) throw new ValidationError(`Invalid ${label}: ${value}`);
  return getAddress(value);
}

export function requireEvidence(uri: string, hash: string, maxUriLength: number): EvidenceRef {
  if (uri.trim().length === 0) throw new ValidationError("Evidence URI is required");
  if (uri.length > maxUriLength) {
    throw new ValidationError(`Evidence URI exceeds ${maxUriLength} characters`);
  }
  return { uri, hash: requireNonZeroBytes32(hash, "Evidence hash") };
}

export function requireOutcome(outcome: number, outcomeCount: number): number {
  if (!Number.isInteger(outcome) || outcome < 0 || outcome >= outcomeCount) {
    throw new ValidationError(`Outcome ${outcome} is out of range [0, ${outcomeCount})`);
  }
  return outcome;
}
