import { Body, Controller, Get, Post, UseGuards } from "@nestjs/common";
import { ApiKeyGuard } from "../../common/guards/api-key.guard";
import { CallerAddress } from "../../common/decorators/caller-address.decorator";
import { ProtocolFeeService } from "./protocol-fee.service";
import { SetLoanOfferFeeDto, SetProtocolFeeDto } from "./dto";

@UseGuards(ApiKeyGuard)
@Controller("admin/fees")
export class AdminFeeController {
  constructor(private readonly fees: ProtocolFeeService) {}

  @Get()
  summary() {
    return {
      protocolFeeBps: this.fees.getProtocolFee(),
      loanOfferFee: this.fees.getLoanOfferFee().toString(),
      accrued: this.fees.getProtocolFeesByToken().map((f) => ({
        token: f.token,
        amount: f.amount.toString(),
      })),
    };
  }

  @Post("protocol-fee")
  async setProtocolFee(
    @CallerAddress() caller: string,
    @Body() dto: SetProtocolFeeDto,
  ) {
    await this.fees.setProtocolFee(caller, dto.protocolFeeBps);
    return { protocolFeeBps: this.fees.getProtocolFee() };
  }

  @Post("offer-fee")
  async setLoanOfferFee(
    @CallerAddress() caller: string,
    @Body() dto: SetLoanOfferFeeDto,
  ) {
    await this.fees.setLoanOfferFee(caller, BigInt(dto.loanOfferFee));
    return { loanOfferFee: this.fees.getLoanOfferFee().toString() };
  }

  @Post("withdraw")
  async withdrawAll(@CallerAddress() caller: string) {
    const withdrawn = await this.fees.withdrawAllFees(caller);
    return withdrawn.map((w) => ({ token: w.token, amount: w.amount.toString() }));
  }
}
