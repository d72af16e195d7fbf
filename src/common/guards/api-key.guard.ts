import {
  CanActivate,
  ExecutionContext,
  Injectable,
  InternalServerErrorException,
  UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Request } from "express";
import { createHash, timingSafeEqual } from "crypto";

const digest = (value: string): Buffer =>
  createHash("sha256").update(value).digest();

/**
 * Admin API-key guard for /admin/*. Fails closed.
 * A missing ADMIN_API_KEY is a misconfiguration (500), never an open door.
 * ProtocolFeeService still requires caller === ADMIN_ADDRESS; this guard
 * only gates the route.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.get<string>("ADMIN_API_KEY");

    if (!expected) {
      throw new InternalServerErrorException(
        "Server misconfiguration: ADMIN_API_KEY is not set",
      );
    }

    const req = context.switchToHttp().getRequest<Request>();
    const provided = req.header("x-api-key");

    if (!provided || !timingSafeEqual(digest(provided), digest(expected))) {
      throw new UnauthorizedException("Invalid or missing admin API key");
    }

    return true;
  }
}
