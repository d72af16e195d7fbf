import { IsString, Matches } from "class-validator";

export class SetLoanOfferFeeDto {
  /** Wei, as a decimal string. */
  @IsString()
  @Matches(/^\d+$/)
  loanOfferFee!: string;
}
