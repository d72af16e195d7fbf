import { HttpException, Injectable, Logger } from "@nestjs/common";
import { LoanOfferService } from "../loan-offer";
import { LoanService } from "../loan";
import { UnitOfWork } from "../unit-of-work";
import { EmptyBatchException } from "../../common/errors/lending.errors";
import { toErrorPayload } from "../../common/filters/all-exceptions.filter";
import { BatchCall, BatchCallResult, BatchReturn } from "./batch.types";

/**
 * Sequential multi-call.
 *
 * revertOnFail = true: the first failure propagates and the whole batch is
 * rolled back.
 * revertOnFail = false: each call is its own savepoint; lending errors are
 * recorded per call and the batch carries on. Anything that is not an
 * HttpException is a fault, not a business rejection, and still aborts.
 */
@Injectable()
export class BatchService {
  private readonly logger = new Logger(BatchService.name);

  constructor(
    private readonly offers: LoanOfferService,
    private readonly loans: LoanService,
    private readonly uow: UnitOfWork,
  ) {}

  async batch(
    caller: string,
    calls: BatchCall[],
    revertOnFail: boolean,
  ): Promise<BatchCallResult[]> {
    if (calls.length === 0) throw new EmptyBatchException();

    const results = await this.uow.run(async () => {
      const out: BatchCallResult[] = [];
      for (const call of calls) {
        if (revertOnFail) {
          out.push({ success: true, result: await this.execute(caller, call) });
          continue;
        }
        try {
          out.push({ success: true, result: await this.execute(caller, call) });
        } catch (err) {
          if (!(err instanceof HttpException)) throw err;
          out.push({
            success: false,
            error: toErrorPayload(err.getResponse(), err.message),
          });
        }
      }
      return out;
    });

    const failed = results.filter((r) => !r.success).length;
    this.logger.log(
      `[batch] caller=${caller} calls=${calls.length} failed=${failed} revertOnFail=${revertOnFail}`,
    );
    return results;
  }

  private async execute(caller: string, call: BatchCall): Promise<BatchReturn> {
    switch (call.method) {
      case "offerLoan": {
        const { input, metadata, attachedFee } = call.args;
        return metadata
          ? this.offers.offerLoanWithMetadata(caller, input, metadata, attachedFee)
          : this.offers.offerLoan(caller, input, attachedFee);
      }
      case "rejectLoanOffer":
        await this.offers.rejectLoanOffer(caller, call.args.offerId);
        return null;
      case "acceptLoan":
        return this.loans.acceptLoan(caller, call.args.offerId);
      case "acceptLoanWithReceiver":
        return this.loans.acceptLoanWithReceiver(
          caller,
          call.args.offerId,
          call.args.receiver,
        );
      case "payLoan":
        return this.loans.payLoan(caller, call.args.claimId, call.args.amount);
      case "impairLoan":
        await this.loans.impairLoan(caller, call.args.claimId);
        return null;
      case "markLoanAsPaid":
        await this.loans.markLoanAsPaid(caller, call.args.claimId);
        return null;
    }
  }
}
