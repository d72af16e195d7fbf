import { BadRequestException } from "@nestjs/common";
import { plainToInstance, Type } from "class-transformer";
import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsBoolean,
  IsEthereumAddress,
  IsIn,
  IsObject,
  IsString,
  Matches,
  ValidateNested,
  validateSync,
} from "class-validator";
import { CreateLoanOfferDto, toLoanOfferInput } from "../../loan-offer/dto";
import { BATCH_METHODS, BatchCall, BatchMethod } from "../batch.types";

const OFFER_ID = /^0x[0-9a-fA-F]{64}$/;

export class BatchCallDto {
  @IsIn(BATCH_METHODS)
  method!: BatchMethod;

  @IsObject()
  args!: Record<string, unknown>;
}

export class BatchDto {
  @ArrayNotEmpty()
  @ArrayMaxSize(50)
  @ValidateNested({ each: true })
  @Type(() => BatchCallDto)
  calls!: BatchCallDto[];

  @IsBoolean()
  revertOnFail!: boolean;
}

class OfferRefArgs {
  @Matches(OFFER_ID)
  offerId!: string;
}

class AcceptWithReceiverArgs extends OfferRefArgs {
  @IsEthereumAddress()
  receiver!: string;
}

class ClaimRefArgs {
  @IsString()
  claimId!: string;
}

class PayArgs extends ClaimRefArgs {
  @IsString()
  @Matches(/^\d+$/)
  amount!: string;
}

function parseArgs<T extends object>(
  cls: new () => T,
  args: Record<string, unknown>,
  index: number,
): T {
  const instance = plainToInstance(cls, args);
  const errors = validateSync(instance, { whitelist: true });
  if (errors.length > 0) {
    throw new BadRequestException(
      `calls[${index}].args: ${errors.map((e) => Object.values(e.constraints ?? {}).join(", ") || e.property).join("; ")}`,
    );
  }
  return instance;
}

/** Turn the loosely-typed wire form into a checked BatchCall. */
export function toBatchCall(dto: BatchCallDto, index: number): BatchCall {
  switch (dto.method) {
    case "offerLoan": {
      const args = parseArgs(CreateLoanOfferDto, dto.args, index);
      return {
        method: "offerLoan",
        args: {
          input: toLoanOfferInput(args),
          metadata: args.metadata,
          attachedFee: BigInt(args.attachedFee ?? "0"),
        },
      };
    }
    case "rejectLoanOffer":
    case "acceptLoan":
      return { method: dto.method, args: parseArgs(OfferRefArgs, dto.args, index) };
    case "acceptLoanWithReceiver": {
      const { offerId, receiver } = parseArgs(AcceptWithReceiverArgs, dto.args, index);
      return { method: "acceptLoanWithReceiver", args: { offerId, receiver } };
    }
    case "payLoan": {
      const { claimId, amount } = parseArgs(PayArgs, dto.args, index);
      return { method: "payLoan", args: { claimId, amount: BigInt(amount) } };
    }
    case "impairLoan":
    case "markLoanAsPaid":
      return { method: dto.method, args: parseArgs(ClaimRefArgs, dto.args, index) };
  }
}
