import { Injectable, Logger } from "@nestjs/common";
import { Clock } from "../clock";
import { TransactionalStore, UnitOfWork } from "../unit-of-work";
import {
  ClaimNotFoundException,
  ClaimNotPendingException,
  LoanAlreadyPaidException,
  NotControllerException,
  PermitExhaustedException,
  PermitExpiredException,
  PermitMissingException,
} from "../../common/errors/lending.errors";
import { normalizeAddress } from "../../common/utils/address.util";
import {
  ClaimLedger,
  ClaimStatus,
  ControllerPermit,
  CreateDebtRecordParams,
  DebtRecord,
  PermitAction,
  UNLIMITED_PERMIT_USES,
} from "./claim-ledger";

interface ClaimTables {
  claims: Map<string, DebtRecord>;
  permits: Map<string, ControllerPermit>;
  lastClaimId: number;
}

const permitKey = (grantor: string, grantee: string, action: PermitAction) =>
  `${grantor}:${grantee}:${action}`;

/**
 * In-process claims ledger. Claim ids are sequential ("1", "2", ...).
 */
@Injectable()
export class InMemoryClaimLedger
  extends ClaimLedger
  implements TransactionalStore<ClaimTables>
{
  private readonly logger = new Logger(InMemoryClaimLedger.name);
  private tables: ClaimTables = {
    claims: new Map(),
    permits: new Map(),
    lastClaimId: 0,
  };

  constructor(
    private readonly clock: Clock,
    uow: UnitOfWork,
  ) {
    super();
    uow.register(this);
  }

  snapshot(): ClaimTables {
    return structuredClone(this.tables);
  }

  restore(snapshot: ClaimTables): void {
    this.tables = snapshot;
  }

  // ── Permits ────────────────────────────────────────────────────────────────

  async grantPermit(permit: ControllerPermit): Promise<void> {
    const grantor = normalizeAddress(permit.grantor, "grantor");
    const grantee = normalizeAddress(permit.grantee, "grantee");
    this.tables.permits.set(permitKey(grantor, grantee, permit.action), {
      ...permit,
      grantor,
      grantee,
    });
    this.logger.debug(
      `[permit_granted] ${permit.action} ${grantor} → ${grantee} uses=${permit.remainingUses}`,
    );
  }

  async getPermit(
    grantor: string,
    grantee: string,
    action: PermitAction,
  ): Promise<ControllerPermit | null> {
    const permit = this.tables.permits.get(
      permitKey(
        normalizeAddress(grantor, "grantor"),
        normalizeAddress(grantee, "grantee"),
        action,
      ),
    );
    return permit ? { ...permit } : null;
  }

  // ── Claims ─────────────────────────────────────────────────────────────────

  async createDebtRecord(
    controller: string,
    onBehalfOf: string,
    params: CreateDebtRecordParams,
  ): Promise<string> {
    this.spendPermit(onBehalfOf, controller, PermitAction.CreateClaim);

    const claimId = String(++this.tables.lastClaimId);
    this.tables.claims.set(claimId, {
      claimId,
      status: ClaimStatus.Pending,
      claimAmount: params.claimAmount,
      paidAmount: 0n,
      token: params.token,
      creditor: params.creditor,
      debtor: params.debtor,
      controller,
      description: params.description,
      dueBy: params.dueBy,
      metadata: params.metadata,
    });

    this.logger.debug(
      `[claim_created] claim=${claimId} creditor=${params.creditor} debtor=${params.debtor} amount=${params.claimAmount}`,
    );
    return claimId;
  }

  async getDebtRecord(claimId: string): Promise<DebtRecord> {
    return { ...this.requireClaim(claimId) };
  }

  async recordPayment(
    controller: string,
    onBehalfOf: string,
    claimId: string,
    principal: bigint,
  ): Promise<DebtRecord> {
    const claim = this.requireControlled(controller, claimId);
    if (claim.status === ClaimStatus.Paid) {
      throw new LoanAlreadyPaidException(claimId);
    }
    this.spendPermit(onBehalfOf, controller, PermitAction.PayClaim);

    claim.paidAmount += principal;
    if (claim.paidAmount === claim.claimAmount) {
      claim.status = ClaimStatus.Paid;
    } else if (claim.paidAmount > 0n) {
      claim.status = ClaimStatus.Repaying;
    }
    return { ...claim };
  }

  async transitionToImpaired(
    controller: string,
    onBehalfOf: string,
    claimId: string,
  ): Promise<void> {
    const claim = this.requireControlled(controller, claimId);
    if (
      claim.status !== ClaimStatus.Pending &&
      claim.status !== ClaimStatus.Repaying
    ) {
      throw new ClaimNotPendingException(claimId, claim.status);
    }
    this.spendPermit(onBehalfOf, controller, PermitAction.ImpairClaim);
    claim.status = ClaimStatus.Impaired;
  }

  async transitionToPaid(
    controller: string,
    onBehalfOf: string,
    claimId: string,
  ): Promise<void> {
    const claim = this.requireControlled(controller, claimId);
    if (claim.status === ClaimStatus.Paid) {
      throw new LoanAlreadyPaidException(claimId);
    }
    this.spendPermit(onBehalfOf, controller, PermitAction.MarkAsPaid);
    claim.status = ClaimStatus.Paid;
  }

  // ── Private helpers ────────────────────────────────────────────────────────

  private requireClaim(claimId: string): DebtRecord {
    const claim = this.tables.claims.get(claimId);
    if (!claim) throw new ClaimNotFoundException(claimId);
    return claim;
  }

  private requireControlled(controller: string, claimId: string): DebtRecord {
    const claim = this.requireClaim(claimId);
    if (claim.controller !== controller) {
      throw new NotControllerException(controller, claimId);
    }
    return claim;
  }

  /** Verify and consume one use of grantor → grantee for `action`. */
  private spendPermit(grantor: string, grantee: string, action: PermitAction) {
    const permit = this.tables.permits.get(
      permitKey(
        normalizeAddress(grantor, "grantor"),
        normalizeAddress(grantee, "grantee"),
        action,
      ),
    );

    if (!permit) throw new PermitMissingException(grantor, grantee, action);
    if (permit.remainingUses === 0n) {
      throw new PermitExhaustedException(grantor, action);
    }
    const now = this.clock.now();
    if (permit.expiresAt !== 0 && permit.expiresAt < now) {
      throw new PermitExpiredException(grantor, action, permit.expiresAt);
    }
    if (permit.remainingUses !== UNLIMITED_PERMIT_USES) {
      permit.remainingUses -= 1n;
    }
  }
}
