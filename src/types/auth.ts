import type { Address } from "viem";

/** Participant authenticated by JWT; `sub` is their wallet address. */
export type AuthParticipant = {
  type: "participant";
  address: Address;
};

/** Operator authenticated by API key; acts as the configured operator address. */
export type AuthOperator = {
  type: "operator";
};

export type RequestAuth = AuthParticipant | AuthOperator | null;
