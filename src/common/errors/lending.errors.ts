import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from "@nestjs/common";

/**
 * Lending error taxonomy.
 *
 * Every class carries a stable `code` (its name without the `Exception`
 * suffix). The HTTP body is `{ code, message }`, which AllExceptionsFilter
 * renders as-is.
 *
 *   Validation     → 400
 *   Authorization  → 403
 *   State          → 404 / 409
 *   Value/payment  → 400
 *   External call  → 502
 */

export interface LendingErrorBody {
  code: string;
  message: string;
}

const body = (code: string, message: string): LendingErrorBody => ({
  code,
  message,
});

// ── Validation ───────────────────────────────────────────────────────────────

export class InvalidPeriodsPerYearException extends BadRequestException {
  readonly code = "InvalidPeriodsPerYear";
  constructor(numberOfPeriodsPerYear: number) {
    super(
      body(
        "InvalidPeriodsPerYear",
        `numberOfPeriodsPerYear must be 0 or within [1, 365], got ${numberOfPeriodsPerYear}`,
      ),
    );
  }
}

export class InvalidTermLengthException extends BadRequestException {
  readonly code = "InvalidTermLength";
  constructor(termLength: number) {
    super(
      body(
        "InvalidTermLength",
        `termLength must be a positive whole number of seconds, got ${termLength}`,
      ),
    );
  }
}

export class InvalidLoanAmountException extends BadRequestException {
  readonly code = "InvalidLoanAmount";
  constructor(amount: bigint) {
    super(body("InvalidLoanAmount", `loanAmount must be > 0, got ${amount}`));
  }
}

export class NativeTokenNotSupportedException extends BadRequestException {
  readonly code = "NativeTokenNotSupported";
  constructor() {
    super(
      body(
        "NativeTokenNotSupported",
        "Loans must be denominated in a token, not the native coin",
      ),
    );
  }
}

export class InvalidAddressException extends BadRequestException {
  readonly code = "InvalidAddress";
  constructor(field: string, value: string) {
    super(body("InvalidAddress", `${field} is not a valid address: ${value}`));
  }
}

export class InvalidCallbackException extends BadRequestException {
  readonly code = "InvalidCallback";
  constructor(reason: string) {
    super(body("InvalidCallback", reason));
  }
}

export class InvalidExpiryException extends BadRequestException {
  readonly code = "InvalidExpiry";
  constructor(expiresAt: number, now: number) {
    super(
      body(
        "InvalidExpiry",
        `expiresAt ${expiresAt} is not in the future (now=${now})`,
      ),
    );
  }
}

export class BatchLengthMismatchException extends BadRequestException {
  readonly code = "BatchLengthMismatch";
  constructor(expected: number, got: number) {
    super(
      body(
        "BatchLengthMismatch",
        `expected ${expected} receivers, got ${got}`,
      ),
    );
  }
}

export class EmptyBatchException extends BadRequestException {
  readonly code = "EmptyBatch";
  constructor() {
    super(body("EmptyBatch", "Batch must contain at least one entry"));
  }
}

export class InvalidReceiverException extends BadRequestException {
  readonly code = "InvalidReceiver";
  constructor() {
    super(body("InvalidReceiver", "Receiver must not be the zero address"));
  }
}

export class InvalidProtocolFeeException extends BadRequestException {
  readonly code = "InvalidProtocolFee";
  constructor(bps: number) {
    super(
      body(
        "InvalidProtocolFee",
        `protocol fee must be an integer within [0, 10000] bps, got ${bps}`,
      ),
    );
  }
}

export class ZeroPaymentAmountException extends BadRequestException {
  readonly code = "ZeroPaymentAmount";
  constructor() {
    super(body("ZeroPaymentAmount", "Payment amount must be > 0"));
  }
}

export class InvalidPermitException extends BadRequestException {
  readonly code = "InvalidPermit";
  constructor(reason: string) {
    super(body("InvalidPermit", reason));
  }
}

// ── Authorization ────────────────────────────────────────────────────────────

export class NotCreditorOrDebtorException extends ForbiddenException {
  readonly code = "NotCreditorOrDebtor";
  constructor(caller: string) {
    super(
      body(
        "NotCreditorOrDebtor",
        `${caller} is neither the creditor nor the debtor`,
      ),
    );
  }
}

export class NotCreditorException extends ForbiddenException {
  readonly code = "NotCreditor";
  constructor(caller: string, claimId: string) {
    super(
      body("NotCreditor", `${caller} is not the creditor of claim ${claimId}`),
    );
  }
}

export class NotAdminException extends ForbiddenException {
  readonly code = "NotAdmin";
  constructor(caller: string) {
    super(body("NotAdmin", `${caller} is not the protocol admin`));
  }
}

export class CannotAcceptOwnOfferException extends ForbiddenException {
  readonly code = "CannotAcceptOwnOffer";
  constructor(caller: string, offerId: string) {
    super(
      body(
        "CannotAcceptOwnOffer",
        `${caller} may not accept offer ${offerId}`,
      ),
    );
  }
}

export class NotControllerException extends ForbiddenException {
  readonly code = "NotController";
  constructor(caller: string, claimId: string) {
    super(
      body(
        "NotController",
        `${caller} is not the controller of claim ${claimId}`,
      ),
    );
  }
}

export class PermitMissingException extends ForbiddenException {
  readonly code = "PermitMissing";
  constructor(grantor: string, grantee: string, action: string) {
    super(
      body(
        "PermitMissing",
        `${grantor} has not granted ${action} to ${grantee}`,
      ),
    );
  }
}

export class PermitExpiredException extends ForbiddenException {
  readonly code = "PermitExpired";
  constructor(grantor: string, action: string, expiresAt: number) {
    super(
      body(
        "PermitExpired",
        `${action} permit from ${grantor} expired at ${expiresAt}`,
      ),
    );
  }
}

export class PermitExhaustedException extends ForbiddenException {
  readonly code = "PermitExhausted";
  constructor(grantor: string, action: string) {
    super(
      body("PermitExhausted", `${action} permit from ${grantor} is used up`),
    );
  }
}

// ── State ────────────────────────────────────────────────────────────────────

export class LoanOfferNotFoundException extends NotFoundException {
  readonly code = "LoanOfferNotFound";
  constructor(offerId: string) {
    super(body("LoanOfferNotFound", `Loan offer ${offerId} not found`));
  }
}

export class LoanNotFoundException extends NotFoundException {
  readonly code = "LoanNotFound";
  constructor(claimId: string) {
    super(body("LoanNotFound", `Loan for claim ${claimId} not found`));
  }
}

export class ClaimNotFoundException extends NotFoundException {
  readonly code = "ClaimNotFound";
  constructor(claimId: string) {
    super(body("ClaimNotFound", `Claim ${claimId} not found`));
  }
}

export class LoanOfferAlreadyResolvedException extends ConflictException {
  readonly code = "LoanOfferAlreadyResolved";
  constructor(offerId: string, status: string) {
    super(
      body(
        "LoanOfferAlreadyResolved",
        `Loan offer ${offerId} is already ${status}`,
      ),
    );
  }
}

export class LoanOfferExpiredException extends ConflictException {
  readonly code = "LoanOfferExpired";
  constructor(offerId: string, expiresAt: number) {
    super(
      body("LoanOfferExpired", `Loan offer ${offerId} expired at ${expiresAt}`),
    );
  }
}

export class ClaimNotPendingException extends ConflictException {
  readonly code = "ClaimNotPending";
  constructor(claimId: string, status: string) {
    super(
      body(
        "ClaimNotPending",
        `Claim ${claimId} is ${status}; expected PENDING or REPAYING`,
      ),
    );
  }
}

export class ImpairmentGracePeriodNotElapsedException extends ConflictException {
  readonly code = "ImpairmentGracePeriodNotElapsed";
  constructor(claimId: string, impairableAfter: number, now: number) {
    super(
      body(
        "ImpairmentGracePeriodNotElapsed",
        `Claim ${claimId} cannot be impaired until after ${impairableAfter} (now=${now})`,
      ),
    );
  }
}

export class LoanAlreadyPaidException extends ConflictException {
  readonly code = "LoanAlreadyPaid";
  constructor(claimId: string) {
    super(body("LoanAlreadyPaid", `Loan for claim ${claimId} is already paid`));
  }
}

export class NothingOwedException extends ConflictException {
  readonly code = "NothingOwed";
  constructor(claimId: string) {
    super(body("NothingOwed", `Nothing is owed on claim ${claimId}`));
  }
}

// ── Value / payment ──────────────────────────────────────────────────────────

export class IncorrectFeeException extends BadRequestException {
  readonly code = "IncorrectFee";
  constructor(expected: bigint, attached: bigint) {
    super(
      body("IncorrectFee", `expected fee ${expected}, attached ${attached}`),
    );
  }
}

export class InsufficientBalanceException extends BadRequestException {
  readonly code = "InsufficientBalance";
  constructor(token: string, holder: string, needed: bigint, held: bigint) {
    super(
      body(
        "InsufficientBalance",
        `${holder} holds ${held} of ${token}, needs ${needed}`,
      ),
    );
  }
}

export class InsufficientAllowanceException extends BadRequestException {
  readonly code = "InsufficientAllowance";
  constructor(
    token: string,
    owner: string,
    spender: string,
    needed: bigint,
    allowed: bigint,
  ) {
    super(
      body(
        "InsufficientAllowance",
        `${owner} allows ${spender} ${allowed} of ${token}, needs ${needed}`,
      ),
    );
  }
}

// ── External call ────────────────────────────────────────────────────────────

export class CallbackFailedException extends BadGatewayException {
  readonly code = "CallbackFailed";
  constructor(
    readonly callbackContract: string,
    readonly payload: string,
  ) {
    super(
      body(
        "CallbackFailed",
        `Callback ${callbackContract} failed: ${payload}`,
      ),
    );
  }
}
