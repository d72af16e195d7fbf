import { Body, Controller, Get, Param, Post } from "@nestjs/common";
import { CallerAddress } from "../../common/decorators/caller-address.decorator";
import { CreateLoanOfferDto, toLoanOfferInput } from "./dto";
import { LoanOfferService } from "./loan-offer.service";
import { LoanOffer } from "./loan-offer.types";

export function toLoanOfferView(offer: LoanOffer) {
  return {
    ...offer,
    params: { ...offer.params, loanAmount: offer.params.loanAmount.toString() },
  };
}

@Controller("loan-offers")
export class LoanOfferController {
  constructor(private readonly offers: LoanOfferService) {}

  @Post()
  async create(
    @CallerAddress() caller: string,
    @Body() dto: CreateLoanOfferDto,
  ) {
    const input = toLoanOfferInput(dto);
    const fee = BigInt(dto.attachedFee ?? "0");
    const offerId = dto.metadata
      ? await this.offers.offerLoanWithMetadata(caller, input, dto.metadata, fee)
      : await this.offers.offerLoan(caller, input, fee);
    return toLoanOfferView(this.offers.getLoanOffer(offerId));
  }

  @Get(":id")
  findOne(@Param("id") id: string) {
    return toLoanOfferView(this.offers.getLoanOffer(id));
  }

  @Post(":id/reject")
  async reject(@CallerAddress() caller: string, @Param("id") id: string) {
    await this.offers.rejectLoanOffer(caller, id);
    return toLoanOfferView(this.offers.getLoanOffer(id));
  }
}
