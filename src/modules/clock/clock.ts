import { Injectable } from "@nestjs/common";

/**
 * Time source for every accrual and deadline check.
 * Unix seconds (integer), the resolution of a block timestamp.
 */
export abstract class Clock {
  abstract now(): number;
}

@Injectable()
export class SystemClock extends Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}
