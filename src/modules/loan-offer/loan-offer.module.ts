import { Module } from "@nestjs/common";
import { FeesModule } from "../fees";
import { LoanOfferController } from "./loan-offer.controller";
import { LoanOfferService } from "./loan-offer.service";

@Module({
  imports: [FeesModule],
  controllers: [LoanOfferController],
  providers: [LoanOfferService],
  exports: [LoanOfferService],
})
export class LoanOfferModule {}
