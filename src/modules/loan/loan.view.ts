import { Loan, PaymentResult } from "./loan.types";

/** JSON-safe projections: bigint fields become decimal strings. */

export function toLoanView(loan: Loan) {
  const state = loan.interestComputationState;
  return {
    ...loan,
    claimAmount: loan.claimAmount.toString(),
    paidAmount: loan.paidAmount.toString(),
    interestComputationState: {
      ...state,
      accruedInterest: state.accruedInterest.toString(),
      totalGrossInterestPaid: state.totalGrossInterestPaid.toString(),
    },
  };
}

export function toPaymentView(result: PaymentResult) {
  return {
    ...result,
    interestPaid: result.interestPaid.toString(),
    principalPaid: result.principalPaid.toString(),
    protocolFee: result.protocolFee.toString(),
    creditorReceived: result.creditorReceived.toString(),
    refunded: result.refunded.toString(),
  };
}
