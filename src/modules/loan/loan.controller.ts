import { Body, Controller, Get, Param, Post } from "@nestjs/common";
import { CallerAddress } from "../../common/decorators/caller-address.decorator";
import { PayLoanDto } from "./dto";
import { LoanService } from "./loan.service";
import { toLoanView, toPaymentView } from "./loan.view";

@Controller("loans")
export class LoanController {
  constructor(private readonly loans: LoanService) {}

  @Get(":claimId")
  findOne(@Param("claimId") claimId: string) {
    return toLoanView(this.loans.getLoan(claimId));
  }

  @Get(":claimId/amount-due")
  amountDue(@Param("claimId") claimId: string) {
    const due = this.loans.getTotalAmountDue(claimId);
    return {
      remainingPrincipal: due.remainingPrincipal.toString(),
      currentInterest: due.currentInterest.toString(),
      total: (due.remainingPrincipal + due.currentInterest).toString(),
    };
  }

  @Post(":claimId/pay")
  async pay(
    @CallerAddress() caller: string,
    @Param("claimId") claimId: string,
    @Body() dto: PayLoanDto,
  ) {
    return toPaymentView(
      await this.loans.payLoan(caller, claimId, BigInt(dto.amount)),
    );
  }

  @Post(":claimId/impair")
  async impair(
    @CallerAddress() caller: string,
    @Param("claimId") claimId: string,
  ) {
    await this.loans.impairLoan(caller, claimId);
    return toLoanView(this.loans.getLoan(claimId));
  }

  @Post(":claimId/mark-paid")
  async markPaid(
    @CallerAddress() caller: string,
    @Param("claimId") claimId: string,
  ) {
    await this.loans.markLoanAsPaid(caller, claimId);
    return toLoanView(this.loans.getLoan(claimId));
  }
}
