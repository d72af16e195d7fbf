import { parseEther } from "ethers";
import { InvalidPeriodsPerYearException } from "../../common/errors/lending.errors";
import {
  computeInterest,
  periodGrowthFactor,
  periodsElapsed,
  rpow,
  secondsPerPeriod,
  validateInterestConfig,
} from "./interest.engine";
import {
  InterestComputationState,
  InterestConfig,
  RAY,
  SECONDS_PER_DAY,
  initialInterestState,
} from "./interest.types";

const DUE_BY = 1_750_000_000;
const DAY = SECONDS_PER_DAY;
const MONTH_PERIOD = 2_628_000; // 365 days / 12
const ONE = parseEther("1");

const SIMPLE_10: InterestConfig = { interestRateBps: 1000, numberOfPeriodsPerYear: 0 };
const MONTHLY_10: InterestConfig = { interestRateBps: 1000, numberOfPeriodsPerYear: 12 };
const DAILY_10: InterestConfig = { interestRateBps: 1000, numberOfPeriodsPerYear: 365 };

const fresh = (): InterestComputationState => initialInterestState(0);

// ── VC. validateInterestConfig ─────────────────────────────────────────────────

describe("validateInterestConfig", () => {
  it("accepts simple mode (0) and the compound range bounds 1 and 365", () => {
    for (const n of [0, 1, 12, 365]) {
      expect(() => validateInterestConfig({ interestRateBps: 500, numberOfPeriodsPerYear: n })).not.toThrow();
    }
  });

  it("rejects 366 periods", () => {
    expect(() => validateInterestConfig({ interestRateBps: 500, numberOfPeriodsPerYear: 366 })).toThrow(
      InvalidPeriodsPerYearException,
    );
  });

  it("rejects negative and fractional period counts", () => {
    expect(() => validateInterestConfig({ interestRateBps: 500, numberOfPeriodsPerYear: -1 })).toThrow(
      InvalidPeriodsPerYearException,
    );
    expect(() => validateInterestConfig({ interestRateBps: 500, numberOfPeriodsPerYear: 1.5 })).toThrow(
      InvalidPeriodsPerYearException,
    );
  });

  it("a zero rate accepts any period count", () => {
    expect(() => validateInterestConfig({ interestRateBps: 0, numberOfPeriodsPerYear: 10_000 })).not.toThrow();
  });
});

// ── SC. short-circuits ─────────────────────────────────────────────────────────

describe("computeInterest short-circuits", () => {
  const prior: InterestComputationState = {
    accruedInterest: 123n,
    latestPeriodNumber: 4,
    protocolFeeBps: 50,
    totalGrossInterestPaid: 7n,
  };

  it("zero remaining principal returns the prior state", () => {
    expect(computeInterest(0n, DUE_BY, MONTHLY_10, prior, DUE_BY + 400 * DAY)).toBe(prior);
  });

  it("at or before dueBy nothing accrues", () => {
    expect(computeInterest(ONE, DUE_BY, MONTHLY_10, prior, DUE_BY)).toBe(prior);
    expect(computeInterest(ONE, DUE_BY, SIMPLE_10, prior, DUE_BY - DAY)).toBe(prior);
  });

  it("a zero rate never accrues", () => {
    const config = { interestRateBps: 0, numberOfPeriodsPerYear: 12 };
    expect(computeInterest(ONE, DUE_BY, config, prior, DUE_BY + 1000 * DAY)).toBe(prior);
  });

  it("simple mode ignores a partial day", () => {
    const state = fresh();
    expect(computeInterest(ONE, DUE_BY, SIMPLE_10, state, DUE_BY + DAY - 1)).toBe(state);
  });

  it("compound mode ignores a partial period", () => {
    const state = fresh();
    expect(computeInterest(ONE, DUE_BY, MONTHLY_10, state, DUE_BY + MONTH_PERIOD - 1)).toBe(state);
  });
});

// ── SI. simple interest ────────────────────────────────────────────────────────

describe("simple interest", () => {
  it("10% on 1 ether for exactly 365 days past due is exactly 0.1 ether", () => {
    const s = computeInterest(ONE, DUE_BY, SIMPLE_10, fresh(), DUE_BY + 365 * DAY);
    expect(s.accruedInterest).toBe(parseEther("0.1"));
    expect(s.latestPeriodNumber).toBe(0);
  });

  it("730 days is exactly 0.2 ether (linear, not compounding)", () => {
    const s = computeInterest(ONE, DUE_BY, SIMPLE_10, fresh(), DUE_BY + 730 * DAY);
    expect(s.accruedInterest).toBe(parseEther("0.2"));
  });

  it("recomputes from scratch rather than adding to the prior value", () => {
    const first = computeInterest(ONE, DUE_BY, SIMPLE_10, fresh(), DUE_BY + 365 * DAY);
    const second = computeInterest(ONE, DUE_BY, SIMPLE_10, first, DUE_BY + 730 * DAY);
    expect(second.accruedInterest).toBe(parseEther("0.2"));
  });

  it("uses the current remaining principal and replaces the prior value", () => {
    const prior: InterestComputationState = {
      ...fresh(),
      accruedInterest: 5n,
      totalGrossInterestPaid: parseEther("0.1"),
    };
    const s = computeInterest(parseEther("0.5"), DUE_BY, SIMPLE_10, prior, DUE_BY + 730 * DAY);
    expect(s.accruedInterest).toBe(parseEther("0.1"));
    expect(s.latestPeriodNumber).toBe(0);
  });

  it("one day on 1 ether at 10% rounds down to whole wei", () => {
    const s = computeInterest(ONE, DUE_BY, SIMPLE_10, fresh(), DUE_BY + DAY);
    // 1e18 * 1000 / 3_650_000
    expect(s.accruedInterest).toBe(273972602739726n);
  });

  it("carries the fee snapshot and paid total through untouched", () => {
    const prior: InterestComputationState = { ...fresh(), protocolFeeBps: 250, totalGrossInterestPaid: 1n };
    const s = computeInterest(ONE, DUE_BY, SIMPLE_10, prior, DUE_BY + 10 * DAY);
    expect(s.protocolFeeBps).toBe(250);
    expect(s.totalGrossInterestPaid).toBe(1n);
  });
});

// ── CI. compound interest ──────────────────────────────────────────────────────

describe("compound interest", () => {
  it("period boundaries follow 365 days / n", () => {
    expect(periodsElapsed(MONTH_PERIOD - 1, 12)).toBe(0);
    expect(periodsElapsed(MONTH_PERIOD, 12)).toBe(1);
    expect(periodsElapsed(38 * DAY, 12)).toBe(1);
    expect(periodsElapsed(68 * DAY, 12)).toBe(2);
    expect(periodsElapsed(365 * DAY, 365)).toBe(365);
  });

  it("a period is 365 days / n truncated to whole seconds", () => {
    expect(secondsPerPeriod(7)).toBe(4_505_142);
    expect(periodsElapsed(4_505_142 * 7 - 1, 7)).toBe(6);
    expect(periodsElapsed(4_505_142 * 7, 7)).toBe(7);

    const s = computeInterest(ONE, 0, { interestRateBps: 1000, numberOfPeriodsPerYear: 7 }, fresh(), 4_505_142 * 7);
    expect(s.latestPeriodNumber).toBe(7);
  });

  it("growth factor is RAY + RAY * bps / (10000 n), rounded down", () => {
    expect(periodGrowthFactor(MONTHLY_10)).toBe(1_008_333_333_333_333_333_333_333_333n);
  });

  it("rpow(x, 0) is one and rpow(x, 1) is x", () => {
    const x = periodGrowthFactor(MONTHLY_10);
    expect(rpow(x, 0)).toBe(RAY);
    expect(rpow(x, 1)).toBe(x);
  });

  it("one monthly period on 1 ether at 10% accrues 1/120 ether, rounded down", () => {
    const s = computeInterest(ONE, DUE_BY, MONTHLY_10, fresh(), DUE_BY + MONTH_PERIOD);
    expect(s.accruedInterest).toBe(8_333_333_333_333_333n);
    expect(s.latestPeriodNumber).toBe(1);
  });

  it("unpaid interest earns interest in the next period", () => {
    const p1 = computeInterest(ONE, DUE_BY, MONTHLY_10, fresh(), DUE_BY + MONTH_PERIOD);
    const p2 = computeInterest(ONE, DUE_BY, MONTHLY_10, p1, DUE_BY + 2 * MONTH_PERIOD);
    expect(p2.accruedInterest).toBe(16_736_111_111_111_110n);
    expect(p2.accruedInterest).toBeGreaterThan(2n * p1.accruedInterest);
    expect(p2.latestPeriodNumber).toBe(2);
  });

  it("catching up several periods in one call applies them all", () => {
    const s = computeInterest(ONE, DUE_BY, MONTHLY_10, fresh(), DUE_BY + 2 * MONTH_PERIOD);
    expect(s.accruedInterest).toBe(16_736_111_111_111_111n);
    expect(s.latestPeriodNumber).toBe(2);
  });

  it("daily compounding for a year beats simple 10%", () => {
    const s = computeInterest(ONE, DUE_BY, DAILY_10, fresh(), DUE_BY + 365 * DAY);
    expect(s.accruedInterest).toBe(105_155_781_616_264_373n);
    expect(s.latestPeriodNumber).toBe(365);
  });

  it("a tiny principal still accrues a non-zero amount over enough periods", () => {
    const s = computeInterest(1_000n, DUE_BY, MONTHLY_10, fresh(), DUE_BY + 12 * MONTH_PERIOD);
    expect(s.accruedInterest).toBeGreaterThan(0n);
  });
});

// ── PR. properties ─────────────────────────────────────────────────────────────

describe("accrual properties", () => {
  it("never decreases accrued interest or period count without payments", () => {
    for (const config of [SIMPLE_10, MONTHLY_10, DAILY_10]) {
      let state = fresh();
      let previous = state;
      for (let t = DUE_BY - 5 * DAY; t <= DUE_BY + 400 * DAY; t += 7 * DAY + 3_333) {
        state = computeInterest(ONE, DUE_BY, config, state, t);
        expect(state.accruedInterest).toBeGreaterThanOrEqual(previous.accruedInterest);
        expect(state.latestPeriodNumber).toBeGreaterThanOrEqual(previous.latestPeriodNumber);
        previous = state;
      }
    }
  });

  it("refreshing twice at the same timestamp is idempotent", () => {
    for (const config of [SIMPLE_10, MONTHLY_10]) {
      const now = DUE_BY + 100 * DAY;
      const once = computeInterest(ONE, DUE_BY, config, fresh(), now);
      const twice = computeInterest(ONE, DUE_BY, config, once, now);
      expect(twice).toEqual(once);
    }
  });

  it("a time warp backwards never reduces what has accrued", () => {
    const later = computeInterest(ONE, DUE_BY, MONTHLY_10, fresh(), DUE_BY + 90 * DAY);
    const earlier = computeInterest(ONE, DUE_BY, MONTHLY_10, later, DUE_BY + 40 * DAY);
    expect(earlier).toBe(later);
  });
});
