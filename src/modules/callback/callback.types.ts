/** Payload delivered to a sink after an offer has become a loan. */
export interface LoanAcceptedNotification {
  /** 4-byte selector configured on the offer, e.g. "0x1a2b3c4d". */
  selector: string;
  offerId: string;
  claimId: string;
  creditor: string;
  debtor: string;
  token: string;
  loanAmount: bigint;
}

export type CallbackResult = { ok: true } | { ok: false; payload: string };

/**
 * A third party that wants to hear about accepted loans.
 * A `{ ok: false }` result or a thrown error aborts the acceptance.
 */
export interface LoanCallbackSink {
  notify(notification: LoanAcceptedNotification): Promise<CallbackResult>;
}
