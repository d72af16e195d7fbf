import { Injectable, Logger } from "@nestjs/common";
import { Clock } from "../clock";
import { ProtocolConfig } from "../config";
import { ProtocolFeeService } from "../fees";
import { TokenLedger } from "../token";
import { ClaimLedger } from "../claim-ledger";
import { CallbackRegistry } from "../callback";
import { LoanOfferService } from "../loan-offer";
import { TransactionalStore, UnitOfWork } from "../unit-of-work";
import { computeInterest } from "../interest/interest.engine";
import {
  BPS_DENOMINATOR,
  initialInterestState,
} from "../interest/interest.types";
import {
  BatchLengthMismatchException,
  CannotAcceptOwnOfferException,
  ClaimNotPendingException,
  EmptyBatchException,
  ImpairmentGracePeriodNotElapsedException,
  InvalidReceiverException,
  LoanAlreadyPaidException,
  LoanNotFoundException,
  NotCreditorException,
  NotCreditorOrDebtorException,
  NothingOwedException,
  ZeroPaymentAmountException,
} from "../../common/errors/lending.errors";
import {
  isZeroAddress,
  normalizeAddress,
} from "../../common/utils/address.util";
import { AmountDue, Loan, LoanStatus, PaymentResult } from "./loan.types";

interface LoanBook {
  loans: Map<string, Loan>;
}

const min = (a: bigint, b: bigint): bigint => (a < b ? a : b);

/**
 * Loan lifecycle and payment processing.
 *
 * Every mutator runs inside one unit of work: the loan record, the claim
 * ledger, token balances and the fee accumulator change together or not at
 * all. Interest is refreshed through the accrual engine before anything
 * that depends on it.
 */
@Injectable()
export class LoanService implements TransactionalStore<LoanBook> {
  private readonly logger = new Logger(LoanService.name);
  private book: LoanBook = { loans: new Map() };

  constructor(
    private readonly clock: Clock,
    private readonly protocol: ProtocolConfig,
    private readonly offers: LoanOfferService,
    private readonly claims: ClaimLedger,
    private readonly tokens: TokenLedger,
    private readonly fees: ProtocolFeeService,
    private readonly callbacks: CallbackRegistry,
    private readonly uow: UnitOfWork,
  ) {
    uow.register(this);
  }

  snapshot(): LoanBook {
    return structuredClone(this.book);
  }

  restore(snapshot: LoanBook): void {
    this.book = snapshot;
  }

  // ──────────────────── Accept ────────────────────

  async acceptLoan(caller: string, offerId: string): Promise<Loan> {
    return this.uow.run(() => this.accept(caller, offerId, undefined));
  }

  async acceptLoanWithReceiver(
    caller: string,
    offerId: string,
    receiver: string,
  ): Promise<Loan> {
    return this.uow.run(() => this.accept(caller, offerId, receiver));
  }

  /** All-or-nothing: one failing offer leaves every other offer open. */
  async batchAcceptLoans(
    caller: string,
    offerIds: string[],
    receivers?: string[],
  ): Promise<Loan[]> {
    if (offerIds.length === 0) throw new EmptyBatchException();
    if (receivers && receivers.length !== offerIds.length) {
      throw new BatchLengthMismatchException(offerIds.length, receivers.length);
    }

    return this.uow.run(async () => {
      const loans: Loan[] = [];
      for (const [i, offerId] of offerIds.entries()) {
        loans.push(await this.accept(caller, offerId, receivers?.[i]));
      }
      return loans;
    });
  }

  private async accept(
    caller: string,
    offerId: string,
    receiver: string | undefined,
  ): Promise<Loan> {
    const now = this.clock.now();
    const engine = this.protocol.engineAddress;

    // 1. Offer must be open and unexpired
    const offer = this.offers.requireAcceptable(offerId, now);
    const { params } = offer;

    // 2. Only the counterparty of the offerer may accept
    if (caller === offer.offerer) {
      throw new CannotAcceptOwnOfferException(caller, offer.offerId);
    }
    if (caller !== params.creditor && caller !== params.debtor) {
      throw new NotCreditorOrDebtorException(caller);
    }

    // 3. Resolve where the principal goes
    const to =
      receiver === undefined
        ? params.debtor
        : normalizeAddress(receiver, "receiver");
    if (isZeroAddress(to)) throw new InvalidReceiverException();

    // 4. Mint the claim on behalf of the accepting party
    const dueBy = now + params.termLength;
    const claimId = await this.claims.createDebtRecord(engine, caller, {
      creditor: params.creditor,
      debtor: params.debtor,
      claimAmount: params.loanAmount,
      token: params.token,
      description: params.description,
      dueBy,
      metadata: offer.metadata,
    });

    // 5. Move principal creditor → receiver
    await this.tokens.transferFrom(
      params.token,
      engine,
      params.creditor,
      to,
      params.loanAmount,
    );

    // 6. Record the loan with the fee rate in force right now
    const loan: Loan = {
      claimId,
      offerId: offer.offerId,
      creditor: params.creditor,
      debtor: params.debtor,
      token: params.token,
      claimAmount: params.loanAmount,
      paidAmount: 0n,
      status: LoanStatus.Pending,
      acceptedAt: now,
      dueBy,
      impairmentGracePeriod: params.impairmentGracePeriod,
      interestConfig: { ...params.interestConfig },
      interestComputationState: initialInterestState(
        this.fees.getProtocolFee(),
      ),
    };
    this.book.loans.set(claimId, loan);
    this.offers.markAccepted(offer.offerId, claimId);

    // 7. Notify the offer's callback sink, if any; a failure undoes all of the above
    if (!isZeroAddress(params.callbackContract)) {
      await this.callbacks.dispatch(params.callbackContract, {
        selector: params.callbackSelector,
        offerId: offer.offerId,
        claimId,
        creditor: params.creditor,
        debtor: params.debtor,
        token: params.token,
        loanAmount: params.loanAmount,
      });
    }

    this.logger.log(
      `[loan_accepted] claim=${claimId} offer=${offer.offerId} by=${caller} receiver=${to} due=${dueBy}`,
    );
    return structuredClone(loan);
  }

  // ──────────────────── Pay ────────────────────

  /**
   * Interest first, then principal. Only what is owed is pulled from the
   * payer; the rest of `amount` is reported back as `refunded`.
   */
  async payLoan(
    caller: string,
    claimId: string,
    amount: bigint,
  ): Promise<PaymentResult> {
    return this.uow.run(async () => {
      if (amount <= 0n) throw new ZeroPaymentAmountException();

      const loan = this.find(claimId);
      if (loan.status === LoanStatus.Paid) {
        throw new LoanAlreadyPaidException(claimId);
      }

      // 1. Refresh interest to now
      const remaining = loan.claimAmount - loan.paidAmount;
      const state = computeInterest(
        remaining,
        loan.dueBy,
        loan.interestConfig,
        loan.interestComputationState,
        this.clock.now(),
      );

      // 2. Allocate
      const interestPaid = min(amount, state.accruedInterest);
      const principalPaid = min(amount - interestPaid, remaining);
      if (interestPaid + principalPaid === 0n) {
        throw new NothingOwedException(claimId);
      }
      const protocolFee =
        (interestPaid * BigInt(state.protocolFeeBps)) / BPS_DENOMINATOR;
      const creditorReceived = interestPaid - protocolFee + principalPaid;

      // 3. Move funds payer → creditor, payer → engine (fee)
      const engine = this.protocol.engineAddress;
      if (creditorReceived > 0n) {
        await this.tokens.transferFrom(
          loan.token,
          engine,
          caller,
          loan.creditor,
          creditorReceived,
        );
      }
      if (protocolFee > 0n) {
        await this.tokens.transferFrom(
          loan.token,
          engine,
          caller,
          engine,
          protocolFee,
        );
        this.fees.accrue(loan.token, protocolFee);
      }

      // 4. Book the principal on the claim
      await this.claims.recordPayment(engine, caller, claimId, principalPaid);

      // 5. Update the loan
      loan.interestComputationState = {
        ...state,
        accruedInterest: state.accruedInterest - interestPaid,
        totalGrossInterestPaid: state.totalGrossInterestPaid + interestPaid,
      };
      loan.paidAmount += principalPaid;
      if (loan.paidAmount === loan.claimAmount) {
        loan.status = LoanStatus.Paid;
      } else if (loan.paidAmount > 0n) {
        loan.status = LoanStatus.Repaying;
      }

      const result: PaymentResult = {
        claimId,
        interestPaid,
        principalPaid,
        protocolFee,
        creditorReceived,
        refunded: amount - interestPaid - principalPaid,
        status: loan.status,
      };
      this.logger.log(
        `[loan_paid] claim=${claimId} payer=${caller} interest=${interestPaid} principal=${principalPaid} fee=${protocolFee} status=${loan.status}`,
      );
      return result;
    });
  }

  // ──────────────────── Status transitions ────────────────────

  async impairLoan(caller: string, claimId: string): Promise<void> {
    return this.uow.run(async () => {
      const loan = this.find(claimId);
      await this.assertCreditor(caller, claimId);

      if (
        loan.status !== LoanStatus.Pending &&
        loan.status !== LoanStatus.Repaying
      ) {
        throw new ClaimNotPendingException(claimId, loan.status);
      }

      const now = this.clock.now();
      const impairableAfter = loan.dueBy + loan.impairmentGracePeriod;
      if (now <= impairableAfter) {
        throw new ImpairmentGracePeriodNotElapsedException(
          claimId,
          impairableAfter,
          now,
        );
      }

      await this.claims.transitionToImpaired(
        this.protocol.engineAddress,
        caller,
        claimId,
      );
      loan.status = LoanStatus.Impaired;
      this.logger.warn(`[loan_impaired] claim=${claimId} by=${caller}`);
    });
  }

  /** Write-off: no tokens move and paidAmount stays as it is. */
  async markLoanAsPaid(caller: string, claimId: string): Promise<void> {
    return this.uow.run(async () => {
      const loan = this.find(claimId);
      await this.assertCreditor(caller, claimId);

      if (loan.status === LoanStatus.Paid) {
        throw new LoanAlreadyPaidException(claimId);
      }

      await this.claims.transitionToPaid(
        this.protocol.engineAddress,
        caller,
        claimId,
      );
      loan.status = LoanStatus.Paid;
      this.logger.log(
        `[loan_marked_paid] claim=${claimId} by=${caller} paid=${loan.paidAmount}/${loan.claimAmount}`,
      );
    });
  }

  // ──────────────────── Read ────────────────────

  getLoan(claimId: string): Loan {
    return structuredClone(this.find(claimId));
  }

  /** Same refresh as payLoan, on a scratch copy. */
  getTotalAmountDue(claimId: string): AmountDue {
    const loan = this.find(claimId);
    if (loan.status === LoanStatus.Paid) {
      return { remainingPrincipal: 0n, currentInterest: 0n };
    }

    const remainingPrincipal = loan.claimAmount - loan.paidAmount;
    const state = computeInterest(
      remainingPrincipal,
      loan.dueBy,
      loan.interestConfig,
      loan.interestComputationState,
      this.clock.now(),
    );
    return { remainingPrincipal, currentInterest: state.accruedInterest };
  }

  private find(claimId: string): Loan {
    const loan = this.book.loans.get(claimId);
    if (!loan) throw new LoanNotFoundException(claimId);
    return loan;
  }

  private async assertCreditor(caller: string, claimId: string): Promise<void> {
    const record = await this.claims.getDebtRecord(claimId);
    if (record.creditor !== caller) {
      throw new NotCreditorException(caller, claimId);
    }
  }
}
