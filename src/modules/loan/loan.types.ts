import {
  InterestComputationState,
  InterestConfig,
} from "../interest/interest.types";

/**
 * Pending → Repaying → Paid, with Pending/Repaying → Impaired → Paid.
 * Nothing leaves Paid.
 */
export enum LoanStatus {
  Pending = "PENDING",
  Repaying = "REPAYING",
  Paid = "PAID",
  Impaired = "IMPAIRED",
}

export interface Loan {
  claimId: string;
  offerId: string;
  creditor: string;
  debtor: string;
  token: string;
  /** Original principal. */
  claimAmount: bigint;
  /** Principal repaid so far; interest is tracked in interestComputationState. */
  paidAmount: bigint;
  status: LoanStatus;
  acceptedAt: number;
  dueBy: number;
  impairmentGracePeriod: number;
  interestConfig: InterestConfig;
  interestComputationState: InterestComputationState;
}

export interface AmountDue {
  remainingPrincipal: bigint;
  currentInterest: bigint;
}

export interface PaymentResult {
  claimId: string;
  interestPaid: bigint;
  principalPaid: bigint;
  /** Share of interestPaid kept by the protocol. */
  protocolFee: bigint;
  /** interestPaid - protocolFee + principalPaid. */
  creditorReceived: bigint;
  /** Part of the requested amount that was not owed and so never debited. */
  refunded: bigint;
  status: LoanStatus;
}
