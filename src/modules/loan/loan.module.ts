import { Module } from "@nestjs/common";
import { FeesModule } from "../fees";
import { LoanOfferModule } from "../loan-offer";
import { LoanController } from "./loan.controller";
import { OfferAcceptanceController } from "./offer-acceptance.controller";
import { LoanService } from "./loan.service";

@Module({
  imports: [FeesModule, LoanOfferModule],
  controllers: [LoanController, OfferAcceptanceController],
  providers: [LoanService],
  exports: [LoanService],
})
export class LoanModule {}
