import { Body, Controller, Post } from "@nestjs/common";
import { CallerAddress } from "../../common/decorators/caller-address.decorator";
import { toLoanView, toPaymentView } from "../loan";
import { BatchService } from "./batch.service";
import { BatchDto, toBatchCall } from "./dto";
import { BatchCallResult } from "./batch.types";

function toResultView(entry: BatchCallResult) {
  if (!entry.success) return entry;
  const { result } = entry;
  if (result === null || typeof result === "string") return entry;
  return {
    success: true,
    result: "interestPaid" in result ? toPaymentView(result) : toLoanView(result),
  };
}

@Controller("batch")
export class BatchController {
  constructor(private readonly batches: BatchService) {}

  @Post()
  async run(@CallerAddress() caller: string, @Body() dto: BatchDto) {
    const calls = dto.calls.map((call, i) => toBatchCall(call, i));
    const results = await this.batches.batch(caller, calls, dto.revertOnFail);
    return results.map(toResultView);
  }
}
