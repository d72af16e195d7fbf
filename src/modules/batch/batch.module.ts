import { Module } from "@nestjs/common";
import { LoanOfferModule } from "../loan-offer";
import { LoanModule } from "../loan";
import { BatchController } from "./batch.controller";
import { BatchService } from "./batch.service";

@Module({
  imports: [LoanOfferModule, LoanModule],
  controllers: [BatchController],
  providers: [BatchService],
})
export class BatchModule {}
