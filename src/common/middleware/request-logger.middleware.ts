import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import { CALLER_HEADER } from "../decorators/caller-address.decorator";

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger("HTTP");

  use(req: Request, res: Response, next: NextFunction) {
    const { method, originalUrl } = req;
    const requestId = req.header("x-request-id") ?? randomUUID();
    const caller = req.header(CALLER_HEADER) ?? "-";

    req.headers["x-request-id"] = requestId;
    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    res.on("finish", () => {
      const duration = Date.now() - start;
      this.logger.log(
        `${method} ${originalUrl} ${res.statusCode} caller=${caller} ${duration}ms [${requestId}]`,
      );
    });

    next();
  }
}
