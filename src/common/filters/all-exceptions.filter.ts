import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Request, Response } from "express";

export interface ErrorPayload {
  code: string;
  message: string | string[];
}

/**
 * Renders every error as `{ statusCode, error, message, path, timestamp }`.
 * `error` is the lending error code when the exception carries one, otherwise
 * Nest's own label ("Bad Request", ...). Unknown errors become 500.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let payload: ErrorPayload = {
      code: "InternalServerError",
      message: "Internal server error",
    };

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      payload = toErrorPayload(exception.getResponse(), exception.message);
    } else {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(
        `[unhandled] ${req.method} ${req.originalUrl}: ${String(exception)}`,
        stack,
      );
    }

    res.status(status).json({
      statusCode: status,
      error: payload.code,
      message: payload.message,
      path: req.originalUrl,
      timestamp: new Date().toISOString(),
    });
  }
}

export function toErrorPayload(response: string | object, fallback: string): ErrorPayload {
  if (typeof response === "string") {
    return { code: fallback, message: response };
  }
  const record: Record<string, unknown> = { ...response };
  const code =
    typeof record.code === "string"
      ? record.code
      : typeof record.error === "string"
        ? record.error
        : fallback;
  const message = record.message;
  if (typeof message === "string") return { code, message };
  if (Array.isArray(message)) return { code, message: message.map(String) };
  return { code, message: fallback };
}
