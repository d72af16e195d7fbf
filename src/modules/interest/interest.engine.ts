import { InvalidPeriodsPerYearException } from "../../common/errors/lending.errors";
import {
  BPS_DENOMINATOR,
  DAYS_PER_YEAR,
  InterestComputationState,
  InterestConfig,
  MAX_PERIODS_PER_YEAR,
  RAY,
  SECONDS_PER_DAY,
  SECONDS_PER_YEAR,
} from "./interest.types";

/**
 * Interest accrual engine.
 *
 * Pure functions, no clock and no storage: the caller passes `now` (unix
 * seconds) and the loan's prior state and gets back the refreshed state.
 * Interest only accrues on the overdue tail, i.e. for time after `dueBy`.
 *
 * Simple mode (numberOfPeriodsPerYear = 0)
 *   accrued = floor(principal * bps * wholeDaysPastDue / (365 * 10000))
 *   Recomputed from scratch on every call against the current remaining
 *   principal. The prior accrued value is replaced, not added to.
 *
 * Compound mode (numberOfPeriodsPerYear = n in 1..365)
 *   periodsPastDue = floor((now - dueBy) / floor(SECONDS_PER_YEAR / n))
 *   k              = periodsPastDue - prior.latestPeriodNumber
 *   accrued        = (principal + prior.accrued) * (1 + bps / (10000 n))^k - principal
 *   Incremental: only the k new periods are applied, and unpaid interest
 *   earns interest in every later period. The growth factor is computed in
 *   RAY (1e27) fixed point so a single period on a small principal does not
 *   round to zero.
 */

export function validateInterestConfig(config: InterestConfig): void {
  if (config.interestRateBps === 0) return;

  const n = config.numberOfPeriodsPerYear;
  if (!Number.isInteger(n) || n < 0 || n > MAX_PERIODS_PER_YEAR) {
    throw new InvalidPeriodsPerYearException(n);
  }
}

export function computeInterest(
  remainingPrincipal: bigint,
  dueBy: number,
  config: InterestConfig,
  prior: InterestComputationState,
  now: number,
): InterestComputationState {
  if (config.interestRateBps === 0) return prior;
  if (remainingPrincipal === 0n) return prior;
  if (now <= dueBy) return prior;

  const secondsPastDue = now - dueBy;

  if (config.numberOfPeriodsPerYear === 0) {
    return accrueSimple(remainingPrincipal, secondsPastDue, config, prior);
  }
  return accrueCompound(remainingPrincipal, secondsPastDue, config, prior);
}

/** Length of one compounding period in whole seconds. */
export function secondsPerPeriod(n: number): number {
  return Math.floor(SECONDS_PER_YEAR / n);
}

/** Whole periods of `n`-per-year that fit in `secondsPastDue`. */
export function periodsElapsed(secondsPastDue: number, n: number): number {
  return Math.floor(secondsPastDue / secondsPerPeriod(n));
}

/** RAY-scaled (1 + bps / (10000 n)). */
export function periodGrowthFactor(config: InterestConfig): bigint {
  const n = BigInt(config.numberOfPeriodsPerYear);
  return RAY + (RAY * BigInt(config.interestRateBps)) / (BPS_DENOMINATOR * n);
}

/** x^k in RAY fixed point, square-and-multiply, rounding down at each step. */
export function rpow(x: bigint, k: number): bigint {
  let result = RAY;
  let base = x;
  let remaining = k;
  while (remaining > 0) {
    if (remaining % 2 === 1) result = (result * base) / RAY;
    remaining = Math.floor(remaining / 2);
    if (remaining > 0) base = (base * base) / RAY;
  }
  return result;
}

function accrueSimple(
  principal: bigint,
  secondsPastDue: number,
  config: InterestConfig,
  prior: InterestComputationState,
): InterestComputationState {
  const days = Math.floor(secondsPastDue / SECONDS_PER_DAY);
  if (days === 0) return prior;

  return {
    ...prior,
    accruedInterest:
      (principal * BigInt(config.interestRateBps) * BigInt(days)) /
      (BigInt(DAYS_PER_YEAR) * BPS_DENOMINATOR),
    latestPeriodNumber: 0,
  };
}

function accrueCompound(
  principal: bigint,
  secondsPastDue: number,
  config: InterestConfig,
  prior: InterestComputationState,
): InterestComputationState {
  const total = periodsElapsed(secondsPastDue, config.numberOfPeriodsPerYear);
  const fresh = total - prior.latestPeriodNumber;
  if (fresh <= 0) return prior;

  const factor = rpow(periodGrowthFactor(config), fresh);
  const grown = ((principal + prior.accruedInterest) * factor) / RAY;

  return {
    ...prior,
    accruedInterest: grown - principal,
    latestPeriodNumber: total,
  };
}
