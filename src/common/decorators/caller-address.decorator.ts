import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from "@nestjs/common";
import { Request } from "express";
import { normalizeAddress } from "../utils/address.util";

export const CALLER_HEADER = "x-caller-address";

/**
 * Resolves the acting address of a request (the transaction sender).
 * Proving ownership of that address is the gateway's job, not ours.
 */
export const CallerAddress = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<Request>();
    const caller = req.header(CALLER_HEADER);
    if (!caller) {
      throw new UnauthorizedException(`Missing ${CALLER_HEADER} header`);
    }
    return normalizeAddress(caller, CALLER_HEADER);
  },
);
