import { IsString, Matches } from "class-validator";

export class PayLoanDto {
  /** Token base units, as a decimal string. */
  @IsString()
  @Matches(/^\d+$/)
  amount!: string;
}
