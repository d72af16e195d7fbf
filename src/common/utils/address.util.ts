import { getAddress, isAddress, ZeroAddress } from "ethers";
import { InvalidAddressException } from "../errors/lending.errors";

/** The native coin is keyed under the zero address, like ETH in fee ledgers. */
export const NATIVE_TOKEN = ZeroAddress;

/**
 * Validate and checksum an address.
 * All identities are stored checksummed so equality is a plain `===`.
 */
export function normalizeAddress(value: string, field: string): string {
  if (!isAddress(value)) {
    throw new InvalidAddressException(field, value);
  }
  return getAddress(value);
}

export function isZeroAddress(address: string): boolean {
  return address === ZeroAddress;
}
