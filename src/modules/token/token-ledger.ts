import { MaxUint256 } from "ethers";

/** Allowance that transferFrom never decrements. */
export const UNLIMITED_ALLOWANCE = MaxUint256;

export interface TokenPermit {
  owner: string;
  spender: string;
  value: bigint;
  /** Unix seconds after which the permit is void. */
  deadline: number;
}

/**
 * ERC20-style token custody, keyed by (token, holder).
 * The zero address as `token` is the native coin.
 *
 * Implementations move value exactly or throw; a failed call leaves no
 * partial transfer behind.
 */
export abstract class TokenLedger {
  abstract balanceOf(token: string, holder: string): Promise<bigint>;
  abstract allowance(token: string, owner: string, spender: string): Promise<bigint>;
  abstract approve(token: string, owner: string, spender: string, amount: bigint): Promise<void>;
  /** EIP-2612-style gasless approval; signature checks happen upstream. */
  abstract permit(token: string, permit: TokenPermit): Promise<void>;
  abstract transfer(token: string, from: string, to: string, amount: bigint): Promise<void>;
  abstract transferFrom(
    token: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint,
  ): Promise<void>;
}
