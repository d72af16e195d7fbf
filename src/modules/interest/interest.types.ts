export const BPS_DENOMINATOR = 10_000n;
export const SECONDS_PER_DAY = 86_400;
export const DAYS_PER_YEAR = 365;
export const SECONDS_PER_YEAR = DAYS_PER_YEAR * SECONDS_PER_DAY;
export const MAX_PERIODS_PER_YEAR = 365;

/** Fixed-point base for compounding factors (27 decimals). */
export const RAY = 10n ** 27n;

/** Immutable once a loan is accepted. */
export interface InterestConfig {
  /** Annual nominal rate in bps out of 10000. */
  interestRateBps: number;
  /** 0 = simple interest; 1..365 = compound with that many periods a year. */
  numberOfPeriodsPerYear: number;
}

export interface InterestComputationState {
  /** Unpaid interest folded in so far. */
  accruedInterest: bigint;
  /** Whole compounding periods past the due date already in accruedInterest (0 in simple mode). */
  latestPeriodNumber: number;
  /** Fee rate captured at acceptance; later admin changes do not reach it. */
  protocolFeeBps: number;
  /** Lifetime interest paid by the debtor, before the fee split. Never decreases. */
  totalGrossInterestPaid: bigint;
}

export function initialInterestState(
  protocolFeeBps: number,
): InterestComputationState {
  return {
    accruedInterest: 0n,
    latestPeriodNumber: 0,
    protocolFeeBps,
    totalGrossInterestPaid: 0n,
  };
}
