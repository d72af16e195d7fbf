import { AbiCoder, keccak256 } from "ethers";
import { LoanOfferParams } from "./loan-offer.types";

const coder = AbiCoder.defaultAbiCoder();

/** keccak256 of the ABI-encoded terms, in declaration order. */
export function hashOfferParams(params: LoanOfferParams): string {
  return keccak256(
    coder.encode(
      [
        "uint256",
        "uint256",
        "uint256",
        "uint256",
        "address",
        "address",
        "string",
        "address",
        "uint256",
        "uint256",
        "address",
        "bytes4",
      ],
      [
        params.termLength,
        params.interestConfig.interestRateBps,
        params.interestConfig.numberOfPeriodsPerYear,
        params.loanAmount,
        params.creditor,
        params.debtor,
        params.description,
        params.token,
        params.impairmentGracePeriod,
        params.expiresAt,
        params.callbackContract,
        params.callbackSelector,
      ],
    ),
  );
}

/**
 * offerId = keccak256(abi.encode(offerer, nonce, hashOfferParams(params)))
 *
 * The per-offerer nonce makes ids unique even for identical terms; the terms
 * hash stops an id from being replayed against different terms.
 */
export function deriveOfferId(
  offerer: string,
  nonce: number,
  params: LoanOfferParams,
): string {
  return keccak256(
    coder.encode(
      ["address", "uint256", "bytes32"],
      [offerer, nonce, hashOfferParams(params)],
    ),
  );
}
