import { Type } from "class-transformer";
import {
  IsEthereumAddress,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
  ValidateNested,
} from "class-validator";
import { LoanOfferInput } from "../loan-offer.types";

const UINT = /^\d+$/;

export class InterestConfigDto {
  @IsInt()
  @Min(0)
  interestRateBps!: number;

  /** 0 for simple interest. The upper bound is enforced by the engine. */
  @IsInt()
  @Min(0)
  numberOfPeriodsPerYear!: number;
}

export class ClaimMetadataDto {
  @IsString()
  @MaxLength(2048)
  tokenURI!: string;

  @IsString()
  @MaxLength(2048)
  attachmentURI!: string;
}

export class CreateLoanOfferDto {
  @IsInt()
  @Min(0)
  termLength!: number;

  @ValidateNested()
  @Type(() => InterestConfigDto)
  interestConfig!: InterestConfigDto;

  @IsString()
  @Matches(UINT)
  loanAmount!: string;

  @IsEthereumAddress()
  creditor!: string;

  @IsEthereumAddress()
  debtor!: string;

  @IsString()
  @MaxLength(1024)
  description!: string;

  @IsEthereumAddress()
  token!: string;

  @IsInt()
  @Min(0)
  impairmentGracePeriod!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  expiresAt?: number;

  @IsOptional()
  @IsEthereumAddress()
  callbackContract?: string;

  @IsOptional()
  @Matches(/^0x[0-9a-fA-F]{8}$/)
  callbackSelector?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => ClaimMetadataDto)
  metadata?: ClaimMetadataDto;

  /** Native-coin fee sent with the offer, in wei. Defaults to 0. */
  @IsOptional()
  @IsString()
  @Matches(UINT)
  attachedFee?: string;
}

export function toLoanOfferInput(dto: CreateLoanOfferDto): LoanOfferInput {
  return {
    termLength: dto.termLength,
    interestConfig: {
      interestRateBps: dto.interestConfig.interestRateBps,
      numberOfPeriodsPerYear: dto.interestConfig.numberOfPeriodsPerYear,
    },
    loanAmount: BigInt(dto.loanAmount),
    creditor: dto.creditor,
    debtor: dto.debtor,
    description: dto.description,
    token: dto.token,
    impairmentGracePeriod: dto.impairmentGracePeriod,
    expiresAt: dto.expiresAt,
    callbackContract: dto.callbackContract,
    callbackSelector: dto.callbackSelector,
  };
}
