import { ClaimMetadata } from "../claim-ledger";
import { LoanOfferInput } from "../loan-offer";
import { Loan, PaymentResult } from "../loan";
import { ErrorPayload } from "../../common/filters/all-exceptions.filter";

export const BATCH_METHODS = [
  "offerLoan",
  "rejectLoanOffer",
  "acceptLoan",
  "acceptLoanWithReceiver",
  "payLoan",
  "impairLoan",
  "markLoanAsPaid",
] as const;

export type BatchMethod = (typeof BATCH_METHODS)[number];

export type BatchCall =
  | {
      method: "offerLoan";
      args: { input: LoanOfferInput; metadata?: ClaimMetadata; attachedFee: bigint };
    }
  | { method: "rejectLoanOffer"; args: { offerId: string } }
  | { method: "acceptLoan"; args: { offerId: string } }
  | { method: "acceptLoanWithReceiver"; args: { offerId: string; receiver: string } }
  | { method: "payLoan"; args: { claimId: string; amount: bigint } }
  | { method: "impairLoan"; args: { claimId: string } }
  | { method: "markLoanAsPaid"; args: { claimId: string } };

/** offerId for offerLoan, the loan for accepts, the split for payLoan. */
export type BatchReturn = string | Loan | PaymentResult | null;

export type BatchCallResult =
  | { success: true; result: BatchReturn }
  | { success: false; error: ErrorPayload };
