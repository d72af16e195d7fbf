export enum ClaimStatus {
  Pending = "PENDING",
  Repaying = "REPAYING",
  Paid = "PAID",
  Impaired = "IMPAIRED",
}

export enum PermitAction {
  CreateClaim = "CREATE_CLAIM",
  PayClaim = "PAY_CLAIM",
  ImpairClaim = "IMPAIR_CLAIM",
  MarkAsPaid = "MARK_AS_PAID",
}

/** 2^64 - 1: a permit that is never used up. */
export const UNLIMITED_PERMIT_USES = 2n ** 64n - 1n;

/**
 * Delegated-approval capability: `grantor` lets `grantee` (a controller)
 * perform `action` on its behalf. Signature verification happens before the
 * capability reaches the ledger.
 */
export interface ControllerPermit {
  grantor: string;
  grantee: string;
  action: PermitAction;
  remainingUses: bigint;
  /** Unix seconds; 0 = no expiry. */
  expiresAt: number;
}

export interface ClaimMetadata {
  tokenURI: string;
  attachmentURI: string;
}

export interface CreateDebtRecordParams {
  creditor: string;
  debtor: string;
  claimAmount: bigint;
  token: string;
  description: string;
  dueBy: number;
  metadata?: ClaimMetadata;
}

export interface DebtRecord {
  claimId: string;
  status: ClaimStatus;
  claimAmount: bigint;
  paidAmount: bigint;
  token: string;
  creditor: string;
  debtor: string;
  /** Contract allowed to mutate the claim. */
  controller: string;
  description: string;
  dueBy: number;
  metadata?: ClaimMetadata;
}

/**
 * Claims ledger as seen by the lending engine. Every mutator names the
 * controller making the call and the user on whose behalf it acts; the
 * ledger consumes one matching permit per call.
 */
export abstract class ClaimLedger {
  abstract grantPermit(permit: ControllerPermit): Promise<void>;
  abstract getPermit(
    grantor: string,
    grantee: string,
    action: PermitAction,
  ): Promise<ControllerPermit | null>;

  abstract createDebtRecord(
    controller: string,
    onBehalfOf: string,
    params: CreateDebtRecordParams,
  ): Promise<string>;
  abstract getDebtRecord(claimId: string): Promise<DebtRecord>;
  /** Books `principal` against the claim; moves it to REPAYING or PAID. */
  abstract recordPayment(
    controller: string,
    onBehalfOf: string,
    claimId: string,
    principal: bigint,
  ): Promise<DebtRecord>;
  abstract transitionToImpaired(
    controller: string,
    onBehalfOf: string,
    claimId: string,
  ): Promise<void>;
  abstract transitionToPaid(
    controller: string,
    onBehalfOf: string,
    claimId: string,
  ): Promise<void>;
}
