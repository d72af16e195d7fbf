import { Injectable, Logger } from "@nestjs/common";
import { Clock } from "../clock";
import { TransactionalStore, UnitOfWork } from "../unit-of-work";
import {
  InsufficientAllowanceException,
  InsufficientBalanceException,
  InvalidPermitException,
} from "../../common/errors/lending.errors";
import { normalizeAddress } from "../../common/utils/address.util";
import { TokenLedger, TokenPermit, UNLIMITED_ALLOWANCE } from "./token-ledger";

interface TokenTables {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
}

const balanceKey = (token: string, holder: string) => `${token}:${holder}`;
const allowanceKey = (token: string, owner: string, spender: string) =>
  `${token}:${owner}:${spender}`;

/**
 * In-process token ledger. Takes part in the unit of work, so a transfer made
 * by an operation that later fails is undone with the rest of it.
 */
@Injectable()
export class InMemoryTokenLedger
  extends TokenLedger
  implements TransactionalStore<TokenTables>
{
  private readonly logger = new Logger(InMemoryTokenLedger.name);
  private tables: TokenTables = { balances: new Map(), allowances: new Map() };

  constructor(
    private readonly clock: Clock,
    uow: UnitOfWork,
  ) {
    super();
    uow.register(this);
  }

  snapshot(): TokenTables {
    return structuredClone(this.tables);
  }

  restore(snapshot: TokenTables): void {
    this.tables = snapshot;
  }

  /** Credit `amount` out of thin air. Setup and tests only. */
  async mint(token: string, to: string, amount: bigint): Promise<void> {
    const t = normalizeAddress(token, "token");
    const holder = normalizeAddress(to, "to");
    this.credit(t, holder, amount);
    this.logger.debug(`[mint] token=${t} to=${holder} amount=${amount}`);
  }

  async balanceOf(token: string, holder: string): Promise<bigint> {
    return this.tables.balances.get(
      balanceKey(normalizeAddress(token, "token"), normalizeAddress(holder, "holder")),
    ) ?? 0n;
  }

  async allowance(token: string, owner: string, spender: string): Promise<bigint> {
    return this.tables.allowances.get(
      allowanceKey(
        normalizeAddress(token, "token"),
        normalizeAddress(owner, "owner"),
        normalizeAddress(spender, "spender"),
      ),
    ) ?? 0n;
  }

  async approve(token: string, owner: string, spender: string, amount: bigint): Promise<void> {
    this.tables.allowances.set(
      allowanceKey(
        normalizeAddress(token, "token"),
        normalizeAddress(owner, "owner"),
        normalizeAddress(spender, "spender"),
      ),
      amount,
    );
  }

  async permit(token: string, permit: TokenPermit): Promise<void> {
    const now = this.clock.now();
    if (permit.deadline < now) {
      throw new InvalidPermitException(
        `token permit deadline ${permit.deadline} has passed (now=${now})`,
      );
    }
    await this.approve(token, permit.owner, permit.spender, permit.value);
  }

  async transfer(token: string, from: string, to: string, amount: bigint): Promise<void> {
    const t = normalizeAddress(token, "token");
    this.move(t, normalizeAddress(from, "from"), normalizeAddress(to, "to"), amount);
  }

  async transferFrom(
    token: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): Promise<void> {
    const t = normalizeAddress(token, "token");
    const owner = normalizeAddress(from, "from");
    const s = normalizeAddress(spender, "spender");
    const key = allowanceKey(t, owner, s);
    const allowed = this.tables.allowances.get(key) ?? 0n;

    if (allowed < amount) {
      throw new InsufficientAllowanceException(t, owner, s, amount, allowed);
    }

    this.move(t, owner, normalizeAddress(to, "to"), amount);

    if (allowed !== UNLIMITED_ALLOWANCE) {
      this.tables.allowances.set(key, allowed - amount);
    }
  }

  private move(token: string, from: string, to: string, amount: bigint): void {
    const held = this.tables.balances.get(balanceKey(token, from)) ?? 0n;
    if (held < amount) {
      throw new InsufficientBalanceException(token, from, amount, held);
    }
    this.tables.balances.set(balanceKey(token, from), held - amount);
    this.credit(token, to, amount);
  }

  private credit(token: string, holder: string, amount: bigint): void {
    const key = balanceKey(token, holder);
    this.tables.balances.set(key, (this.tables.balances.get(key) ?? 0n) + amount);
  }
}
