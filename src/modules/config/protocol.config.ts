import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { normalizeAddress } from "../../common/utils/address.util";

/**
 * Typed view over the protocol-level settings.
 * Addresses are checksummed once here so services compare with `===`.
 */
@Injectable()
export class ProtocolConfig {
  readonly adminAddress: string;
  readonly engineAddress: string;
  readonly initialProtocolFeeBps: number;
  readonly initialLoanOfferFee: bigint;

  constructor(config: ConfigService) {
    this.adminAddress = normalizeAddress(
      config.getOrThrow<string>("ADMIN_ADDRESS"),
      "ADMIN_ADDRESS",
    );
    this.engineAddress = normalizeAddress(
      config.getOrThrow<string>("ENGINE_ADDRESS"),
      "ENGINE_ADDRESS",
    );
    this.initialProtocolFeeBps = config.get<number>("PROTOCOL_FEE_BPS", 0);
    this.initialLoanOfferFee = BigInt(config.get<string>("LOAN_OFFER_FEE", "0"));
  }
}
