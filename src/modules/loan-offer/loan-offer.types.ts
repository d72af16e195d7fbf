import { ClaimMetadata } from "../claim-ledger";
import { InterestConfig } from "../interest/interest.types";

export const NO_CALLBACK_SELECTOR = "0x00000000";

export enum LoanOfferStatus {
  Open = "OPEN",
  Accepted = "ACCEPTED",
  Rejected = "REJECTED",
}

/** Terms as submitted; addresses not yet validated. */
export interface LoanOfferInput {
  termLength: number;
  interestConfig: InterestConfig;
  loanAmount: bigint;
  creditor: string;
  debtor: string;
  description: string;
  token: string;
  impairmentGracePeriod: number;
  /** Unix seconds; 0 or absent = never expires. */
  expiresAt?: number;
  callbackContract?: string;
  callbackSelector?: string;
}

/** Validated terms; addresses checksummed, optional fields filled in. */
export interface LoanOfferParams {
  termLength: number;
  interestConfig: InterestConfig;
  loanAmount: bigint;
  creditor: string;
  debtor: string;
  description: string;
  token: string;
  impairmentGracePeriod: number;
  expiresAt: number;
  callbackContract: string;
  callbackSelector: string;
}

export interface LoanOffer {
  offerId: string;
  offerer: string;
  nonce: number;
  requestedByCreditor: boolean;
  params: LoanOfferParams;
  metadata?: ClaimMetadata;
  status: LoanOfferStatus;
  createdAt: number;
  /** Set once accepted. */
  claimId?: string;
}
