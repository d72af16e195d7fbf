import { Injectable, Logger } from "@nestjs/common";
import { ProtocolConfig } from "../config";
import { TokenLedger } from "../token";
import { TransactionalStore, UnitOfWork } from "../unit-of-work";
import {
  InvalidProtocolFeeException,
  NotAdminException,
} from "../../common/errors/lending.errors";
import { NATIVE_TOKEN } from "../../common/utils/address.util";

export const MAX_PROTOCOL_FEE_BPS = 10_000;

export interface FeeWithdrawal {
  token: string;
  amount: bigint;
}

interface FeeState {
  protocolFeeBps: number;
  loanOfferFee: bigint;
  /** Accrued, unwithdrawn fees per token. */
  balances: Map<string, bigint>;
  /** Tokens in order of first accrual; the enumeration order of withdrawals. */
  tokens: string[];
}

/**
 * Protocol fee settings and the per-token fee accumulator.
 *
 * The accumulator is the one piece of state every loan's payments share:
 * additions are exact bigint sums and a withdrawal drains each bucket to
 * zero. Fees are held by the engine address until the admin withdraws.
 */
@Injectable()
export class ProtocolFeeService implements TransactionalStore<FeeState> {
  private readonly logger = new Logger(ProtocolFeeService.name);
  private state: FeeState;

  constructor(
    private readonly protocol: ProtocolConfig,
    private readonly tokens: TokenLedger,
    private readonly uow: UnitOfWork,
  ) {
    this.state = {
      protocolFeeBps: protocol.initialProtocolFeeBps,
      loanOfferFee: protocol.initialLoanOfferFee,
      balances: new Map(),
      tokens: [],
    };
    uow.register(this);
  }

  snapshot(): FeeState {
    return structuredClone(this.state);
  }

  restore(snapshot: FeeState): void {
    this.state = snapshot;
  }

  // ── Reads ──────────────────────────────────────────────────────────────────

  /** Current global rate. Loans copy it at acceptance; they never read it live. */
  getProtocolFee(): number {
    return this.state.protocolFeeBps;
  }

  getLoanOfferFee(): bigint {
    return this.state.loanOfferFee;
  }

  getProtocolFeesByToken(): FeeWithdrawal[] {
    return this.state.tokens.map((token) => ({
      token,
      amount: this.state.balances.get(token) ?? 0n,
    }));
  }

  // ── Admin ──────────────────────────────────────────────────────────────────

  async setProtocolFee(caller: string, bps: number): Promise<void> {
    return this.uow.run(async () => {
      this.assertAdmin(caller);
      if (!Number.isInteger(bps) || bps < 0 || bps > MAX_PROTOCOL_FEE_BPS) {
        throw new InvalidProtocolFeeException(bps);
      }
      const previous = this.state.protocolFeeBps;
      this.state.protocolFeeBps = bps;
      this.logger.log(`[protocol_fee_set] ${previous} → ${bps} bps`);
    });
  }

  async setLoanOfferFee(caller: string, fee: bigint): Promise<void> {
    return this.uow.run(async () => {
      this.assertAdmin(caller);
      this.state.loanOfferFee = fee;
      this.logger.log(`[offer_fee_set] ${fee}`);
    });
  }

  /**
   * Send every non-zero bucket to the admin, in order of first accrual,
   * and zero it. Returns what was sent.
   */
  async withdrawAllFees(caller: string): Promise<FeeWithdrawal[]> {
    return this.uow.run(async () => {
      this.assertAdmin(caller);

      const withdrawn: FeeWithdrawal[] = [];
      for (const token of this.state.tokens) {
        const amount = this.state.balances.get(token) ?? 0n;
        if (amount === 0n) continue;

        await this.tokens.transfer(
          token,
          this.protocol.engineAddress,
          this.protocol.adminAddress,
          amount,
        );
        this.state.balances.set(token, 0n);
        withdrawn.push({ token, amount });
      }

      this.logger.log(
        `[fees_withdrawn] ${withdrawn.map((w) => `${w.token}=${w.amount}`).join(" ") || "nothing"}`,
      );
      return withdrawn;
    });
  }

  // ── Accrual (called by the lending services, inside their unit) ───────────

  /** Book a protocol fee already transferred to the engine. */
  accrue(token: string, amount: bigint): void {
    if (amount === 0n) return;
    if (!this.state.balances.has(token)) {
      this.state.tokens.push(token);
    }
    this.state.balances.set(token, (this.state.balances.get(token) ?? 0n) + amount);
  }

  accrueOfferFee(amount: bigint): void {
    this.accrue(NATIVE_TOKEN, amount);
  }

  private assertAdmin(caller: string): void {
    if (caller !== this.protocol.adminAddress) {
      throw new NotAdminException(caller);
    }
  }
}
