import { Injectable, Logger } from "@nestjs/common";
import { isHexString } from "ethers";
import { Clock } from "../clock";
import { ProtocolConfig } from "../config";
import { ProtocolFeeService } from "../fees";
import { TokenLedger } from "../token";
import { CallbackRegistry } from "../callback";
import { ClaimMetadata } from "../claim-ledger";
import { TransactionalStore, UnitOfWork } from "../unit-of-work";
import { validateInterestConfig } from "../interest/interest.engine";
import {
  IncorrectFeeException,
  InvalidCallbackException,
  InvalidExpiryException,
  InvalidLoanAmountException,
  InvalidTermLengthException,
  LoanOfferAlreadyResolvedException,
  LoanOfferExpiredException,
  LoanOfferNotFoundException,
  NativeTokenNotSupportedException,
  NotCreditorOrDebtorException,
} from "../../common/errors/lending.errors";
import {
  isZeroAddress,
  NATIVE_TOKEN,
  normalizeAddress,
} from "../../common/utils/address.util";
import { deriveOfferId } from "./offer-id";
import {
  LoanOffer,
  LoanOfferInput,
  LoanOfferParams,
  LoanOfferStatus,
  NO_CALLBACK_SELECTOR,
} from "./loan-offer.types";

interface OfferBook {
  offers: Map<string, LoanOffer>;
  /** Offers made so far, per offerer. */
  nonces: Map<string, number>;
}

@Injectable()
export class LoanOfferService implements TransactionalStore<OfferBook> {
  private readonly logger = new Logger(LoanOfferService.name);
  private book: OfferBook = { offers: new Map(), nonces: new Map() };

  constructor(
    private readonly clock: Clock,
    private readonly protocol: ProtocolConfig,
    private readonly fees: ProtocolFeeService,
    private readonly tokens: TokenLedger,
    private readonly callbacks: CallbackRegistry,
    private readonly uow: UnitOfWork,
  ) {
    uow.register(this);
  }

  snapshot(): OfferBook {
    return structuredClone(this.book);
  }

  restore(snapshot: OfferBook): void {
    this.book = snapshot;
  }

  async offerLoan(
    caller: string,
    input: LoanOfferInput,
    attachedFee: bigint,
  ): Promise<string> {
    return this.createOffer(caller, input, undefined, attachedFee);
  }

  async offerLoanWithMetadata(
    caller: string,
    input: LoanOfferInput,
    metadata: ClaimMetadata,
    attachedFee: bigint,
  ): Promise<string> {
    return this.createOffer(caller, input, metadata, attachedFee);
  }

  /** Offerer rescinds or counterparty declines; either way the offer is closed. */
  async rejectLoanOffer(caller: string, offerId: string): Promise<void> {
    return this.uow.run(async () => {
      const offer = this.find(offerId);
      const { creditor, debtor } = offer.params;
      if (caller !== creditor && caller !== debtor) {
        throw new NotCreditorOrDebtorException(caller);
      }
      if (offer.status !== LoanOfferStatus.Open) {
        throw new LoanOfferAlreadyResolvedException(offerId, offer.status);
      }
      offer.status = LoanOfferStatus.Rejected;
      this.logger.log(`[offer_rejected] ${offerId} by=${caller}`);
    });
  }

  getLoanOffer(offerId: string): LoanOffer {
    return structuredClone(this.find(offerId));
  }

  getNonce(offerer: string): number {
    return this.book.nonces.get(offerer) ?? 0;
  }

  // ── Used by LoanService inside its unit ───────────────────────────────────

  /** The live offer, provided it can still be accepted at `now`. */
  requireAcceptable(offerId: string, now: number): LoanOffer {
    const offer = this.find(offerId);
    if (offer.status !== LoanOfferStatus.Open) {
      throw new LoanOfferAlreadyResolvedException(offerId, offer.status);
    }
    const { expiresAt } = offer.params;
    if (expiresAt !== 0 && now > expiresAt) {
      throw new LoanOfferExpiredException(offerId, expiresAt);
    }
    return structuredClone(offer);
  }

  markAccepted(offerId: string, claimId: string): void {
    const offer = this.find(offerId);
    offer.status = LoanOfferStatus.Accepted;
    offer.claimId = claimId;
  }

  private find(offerId: string): LoanOffer {
    const offer = this.book.offers.get(offerId.toLowerCase());
    if (!offer) throw new LoanOfferNotFoundException(offerId);
    return offer;
  }

  private async createOffer(
    caller: string,
    input: LoanOfferInput,
    metadata: ClaimMetadata | undefined,
    attachedFee: bigint,
  ): Promise<string> {
    return this.uow.run(async () => {
      const now = this.clock.now();
      const params = this.validate(input, now);

      if (caller !== params.creditor && caller !== params.debtor) {
        throw new NotCreditorOrDebtorException(caller);
      }

      const expectedFee = this.fees.getLoanOfferFee();
      if (attachedFee !== expectedFee) {
        throw new IncorrectFeeException(expectedFee, attachedFee);
      }
      if (attachedFee > 0n) {
        await this.tokens.transfer(
          NATIVE_TOKEN,
          caller,
          this.protocol.engineAddress,
          attachedFee,
        );
        this.fees.accrueOfferFee(attachedFee);
      }

      const nonce = this.getNonce(caller);
      this.book.nonces.set(caller, nonce + 1);

      const offerId = deriveOfferId(caller, nonce, params);
      const offer: LoanOffer = {
        offerId,
        offerer: caller,
        nonce,
        requestedByCreditor: caller === params.creditor,
        params,
        status: LoanOfferStatus.Open,
        createdAt: now,
      };
      if (metadata) offer.metadata = { ...metadata };
      this.book.offers.set(offerId, offer);

      this.logger.log(
        `[offer_created] ${offerId} offerer=${caller} amount=${params.loanAmount} token=${params.token}`,
      );
      return offerId;
    });
  }

  /** Checks run in a fixed order so the first failing rule is reported. */
  private validate(input: LoanOfferInput, now: number): LoanOfferParams {
    const creditor = normalizeAddress(input.creditor, "creditor");
    const debtor = normalizeAddress(input.debtor, "debtor");
    const token = normalizeAddress(input.token, "token");
    const callbackContract = normalizeAddress(
      input.callbackContract ?? NATIVE_TOKEN,
      "callbackContract",
    );

    if (input.loanAmount <= 0n) {
      throw new InvalidLoanAmountException(input.loanAmount);
    }
    if (!Number.isInteger(input.termLength) || input.termLength <= 0) {
      throw new InvalidTermLengthException(input.termLength);
    }
    if (isZeroAddress(token)) {
      throw new NativeTokenNotSupportedException();
    }
    validateInterestConfig(input.interestConfig);

    const callbackSelector = (input.callbackSelector ?? NO_CALLBACK_SELECTOR).toLowerCase();
    if (!isHexString(callbackSelector, 4)) {
      throw new InvalidCallbackException(
        `callbackSelector must be 4 bytes, got ${callbackSelector}`,
      );
    }
    const hasContract = !isZeroAddress(callbackContract);
    const hasSelector = callbackSelector !== NO_CALLBACK_SELECTOR;
    if (hasContract !== hasSelector) {
      throw new InvalidCallbackException(
        "callbackContract and callbackSelector must be set together",
      );
    }
    if (hasContract && !this.callbacks.isRegistered(callbackContract)) {
      throw new InvalidCallbackException(
        `No sink registered at ${callbackContract}`,
      );
    }

    const expiresAt = input.expiresAt ?? 0;
    if (!Number.isInteger(expiresAt) || expiresAt < 0 || (expiresAt !== 0 && expiresAt <= now)) {
      throw new InvalidExpiryException(expiresAt, now);
    }

    return {
      termLength: input.termLength,
      interestConfig: { ...input.interestConfig },
      loanAmount: input.loanAmount,
      creditor,
      debtor,
      description: input.description,
      token,
      impairmentGracePeriod: input.impairmentGracePeriod,
      expiresAt,
      callbackContract,
      callbackSelector,
    };
  }
}
