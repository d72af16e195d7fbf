import { Module } from "@nestjs/common";
import { ProtocolFeeService } from "./protocol-fee.service";
import { AdminFeeController } from "./admin-fee.controller";

@Module({
  controllers: [AdminFeeController],
  providers: [ProtocolFeeService],
  exports: [ProtocolFeeService],
})
export class FeesModule {}
