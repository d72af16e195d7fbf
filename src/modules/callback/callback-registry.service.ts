import { Injectable, Logger } from "@nestjs/common";
import {
  CallbackFailedException,
  InvalidCallbackException,
} from "../../common/errors/lending.errors";
import { isZeroAddress, normalizeAddress } from "../../common/utils/address.util";
import {
  CallbackResult,
  LoanAcceptedNotification,
  LoanCallbackSink,
} from "./callback.types";

function isSink(value: unknown): value is LoanCallbackSink {
  return (
    typeof value === "object" &&
    value !== null &&
    "notify" in value &&
    typeof value.notify === "function"
  );
}

/**
 * Address → sink table, the in-process counterpart of "code at an address".
 * An offer may only name a callback address that is registered here.
 */
@Injectable()
export class CallbackRegistry {
  private readonly logger = new Logger(CallbackRegistry.name);
  private readonly sinks = new Map<string, LoanCallbackSink>();

  register(address: string, sink: unknown): string {
    const target = normalizeAddress(address, "callbackContract");
    if (isZeroAddress(target)) {
      throw new InvalidCallbackException("Cannot register a sink at the zero address");
    }
    if (!isSink(sink)) {
      throw new InvalidCallbackException(`Sink for ${target} has no notify()`);
    }
    this.sinks.set(target, sink);
    this.logger.log(`[callback_registered] ${target}`);
    return target;
  }

  unregister(address: string): void {
    this.sinks.delete(normalizeAddress(address, "callbackContract"));
  }

  isRegistered(address: string): boolean {
    return this.sinks.has(address);
  }

  /**
   * Deliver `notification` to the sink at `address`.
   * Failures surface as CallbackFailed carrying the sink's own reason.
   */
  async dispatch(
    address: string,
    notification: LoanAcceptedNotification,
  ): Promise<void> {
    const sink = this.sinks.get(address);
    if (!sink) {
      throw new InvalidCallbackException(`No sink registered at ${address}`);
    }

    let result: CallbackResult;
    try {
      result = await sink.notify(notification);
    } catch (err) {
      throw new CallbackFailedException(
        address,
        err instanceof Error ? err.message : String(err),
      );
    }

    if (!result.ok) {
      throw new CallbackFailedException(address, result.payload);
    }
    this.logger.debug(
      `[callback_ok] ${address} selector=${notification.selector} claim=${notification.claimId}`,
    );
  }
}
