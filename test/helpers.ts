import { DynamicModule, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { getAddress, MaxUint256, parseEther } from "ethers";
import { Clock, ClockModule } from "../src/modules/clock";
import { ProtocolConfig } from "../src/modules/config";
import { UnitOfWork, UnitOfWorkModule } from "../src/modules/unit-of-work";
import { InMemoryTokenLedger, TokenModule } from "../src/modules/token";
import {
  ClaimLedgerModule,
  InMemoryClaimLedger,
  PermitAction,
  UNLIMITED_PERMIT_USES,
} from "../src/modules/claim-ledger";
import { CallbackModule, CallbackRegistry } from "../src/modules/callback";
import { FeesModule, ProtocolFeeService } from "../src/modules/fees";
import {
  LoanOfferInput,
  LoanOfferModule,
  LoanOfferService,
} from "../src/modules/loan-offer";
import { Loan, LoanModule, LoanService } from "../src/modules/loan";
import { BatchModule, BatchService } from "../src/modules/batch";
import { InterestConfig, SECONDS_PER_DAY } from "../src/modules/interest/interest.types";

// ─── Fixed identities ───

export const ADMIN = getAddress("0x00000000000000000000000000000000000ad111");
export const ENGINE = getAddress("0x000000000000000000000000000000000000e001");
export const CREDITOR = getAddress("0x000000000000000000000000000000000000c0de");
export const DEBTOR = getAddress("0x000000000000000000000000000000000000d0e5");
export const RECEIVER = getAddress("0x000000000000000000000000000000000000beef");
export const STRANGER = getAddress("0x0000000000000000000000000000000000005555");
export const TOKEN = getAddress("0x0000000000000000000000000000000000007070");
export const OTHER_TOKEN = getAddress("0x0000000000000000000000000000000000007171");
export const NATIVE = "0x0000000000000000000000000000000000000000";

export const T0 = 1_750_000_000;
export const DAY = SECONDS_PER_DAY;
export const TERM = 30 * DAY;

export const COMPOUND_MONTHLY_10: InterestConfig = {
  interestRateBps: 1000,
  numberOfPeriodsPerYear: 12,
};
export const SIMPLE_10: InterestConfig = {
  interestRateBps: 1000,
  numberOfPeriodsPerYear: 0,
};

// ─── Clock ───

export class ManualClock extends Clock {
  constructor(public current: number) {
    super();
  }

  now(): number {
    return this.current;
  }

  set(t: number): void {
    this.current = t;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

// ─── Module wiring ───

@Module({})
class TestProtocolModule {
  static register(protocolFeeBps: number, loanOfferFee: bigint): DynamicModule {
    return {
      module: TestProtocolModule,
      global: true,
      providers: [
        {
          provide: ProtocolConfig,
          useValue: {
            adminAddress: ADMIN,
            engineAddress: ENGINE,
            initialProtocolFeeBps: protocolFeeBps,
            initialLoanOfferFee: loanOfferFee,
          },
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({ ADMIN_API_KEY: "test-admin-key" }),
        },
      ],
      exports: [ProtocolConfig, ConfigService],
    };
  }
}

export interface Harness {
  clock: ManualClock;
  uow: UnitOfWork;
  tokens: InMemoryTokenLedger;
  claims: InMemoryClaimLedger;
  callbacks: CallbackRegistry;
  fees: ProtocolFeeService;
  offers: LoanOfferService;
  loans: LoanService;
  batches: BatchService;
}

export async function createHarness(
  opts: { protocolFeeBps?: number; loanOfferFee?: bigint } = {},
): Promise<Harness> {
  const clock = new ManualClock(T0);
  const moduleRef = await Test.createTestingModule({
    imports: [
      TestProtocolModule.register(opts.protocolFeeBps ?? 0, opts.loanOfferFee ?? 0n),
      ClockModule,
      UnitOfWorkModule,
      TokenModule,
      ClaimLedgerModule,
      CallbackModule,
      FeesModule,
      LoanOfferModule,
      LoanModule,
      BatchModule,
    ],
  })
    .overrideProvider(Clock)
    .useValue(clock)
    .compile();

  const h: Harness = {
    clock,
    uow: moduleRef.get(UnitOfWork),
    tokens: moduleRef.get(InMemoryTokenLedger),
    claims: moduleRef.get(InMemoryClaimLedger),
    callbacks: moduleRef.get(CallbackRegistry),
    fees: moduleRef.get(ProtocolFeeService),
    offers: moduleRef.get(LoanOfferService),
    loans: moduleRef.get(LoanService),
    batches: moduleRef.get(BatchService),
  };
  await fund(h);
  return h;
}

/**
 * Creditor holds 10 ether of TOKEN, debtor 1 ether (interest money) plus
 * 1 ether of native coin; both approve the engine without limit and grant
 * it every claim permit.
 */
async function fund(h: Harness): Promise<void> {
  await h.tokens.mint(TOKEN, CREDITOR, parseEther("10"));
  await h.tokens.mint(TOKEN, DEBTOR, parseEther("1"));
  await h.tokens.mint(NATIVE, CREDITOR, parseEther("1"));
  await h.tokens.mint(NATIVE, DEBTOR, parseEther("1"));

  for (const user of [CREDITOR, DEBTOR]) {
    await h.tokens.approve(TOKEN, user, ENGINE, MaxUint256);
    for (const action of Object.values(PermitAction)) {
      await h.claims.grantPermit({
        grantor: user,
        grantee: ENGINE,
        action,
        remainingUses: UNLIMITED_PERMIT_USES,
        expiresAt: 0,
      });
    }
  }
}

export function offerTerms(overrides: Partial<LoanOfferInput> = {}): LoanOfferInput {
  return {
    termLength: TERM,
    interestConfig: COMPOUND_MONTHLY_10,
    loanAmount: parseEther("1"),
    creditor: CREDITOR,
    debtor: DEBTOR,
    description: "test loan",
    token: TOKEN,
    impairmentGracePeriod: 7 * DAY,
    ...overrides,
  };
}

/** Creditor offers, debtor accepts at the current clock time. */
export async function openLoan(
  h: Harness,
  overrides: Partial<LoanOfferInput> = {},
): Promise<Loan> {
  const offerId = await h.offers.offerLoan(
    CREDITOR,
    offerTerms(overrides),
    h.fees.getLoanOfferFee(),
  );
  return h.loans.acceptLoan(DEBTOR, offerId);
}
