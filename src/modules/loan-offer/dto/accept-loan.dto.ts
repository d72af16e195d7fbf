import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsEthereumAddress,
  IsOptional,
  Matches,
} from "class-validator";

const OFFER_ID = /^0x[0-9a-fA-F]{64}$/;

export class AcceptLoanDto {
  /** Where the principal goes; the debtor when omitted. */
  @IsOptional()
  @IsEthereumAddress()
  receiver?: string;
}

export class BatchAcceptLoansDto {
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(100)
  @Matches(OFFER_ID, { each: true })
  offerIds!: string[];

  @IsOptional()
  @IsArray()
  @IsEthereumAddress({ each: true })
  receivers?: string[];
}
