import { Body, Controller, Param, Post } from "@nestjs/common";
import { CallerAddress } from "../../common/decorators/caller-address.decorator";
import { AcceptLoanDto, BatchAcceptLoansDto } from "../loan-offer/dto";
import { LoanService } from "./loan.service";
import { toLoanView } from "./loan.view";

/** Acceptance routes live under /loan-offers but create loans. */
@Controller("loan-offers")
export class OfferAcceptanceController {
  constructor(private readonly loans: LoanService) {}

  @Post("batch-accept")
  async batchAccept(
    @CallerAddress() caller: string,
    @Body() dto: BatchAcceptLoansDto,
  ) {
    const loans = await this.loans.batchAcceptLoans(
      caller,
      dto.offerIds,
      dto.receivers,
    );
    return loans.map(toLoanView);
  }

  @Post(":id/accept")
  async accept(
    @CallerAddress() caller: string,
    @Param("id") id: string,
    @Body() dto: AcceptLoanDto,
  ) {
    const loan = dto.receiver
      ? await this.loans.acceptLoanWithReceiver(caller, id, dto.receiver)
      : await this.loans.acceptLoan(caller, id);
    return toLoanView(loan);
  }
}
