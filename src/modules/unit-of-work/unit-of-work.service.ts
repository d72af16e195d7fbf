import { Injectable, Logger } from "@nestjs/common";
import { AsyncLocalStorage } from "async_hooks";

/**
 * A piece of in-process state that can be captured and put back.
 * `snapshot()` must return a value that later mutations cannot reach.
 */
export interface TransactionalStore<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

type Rollback = () => void;

/**
 * Serialised, all-or-nothing execution over every registered store.
 *
 * - `run()` at the top level waits for the previous unit to finish, so
 *   state-mutating calls never interleave (single writer, like the NonceManager
 *   mutex in the chain sender).
 * - `run()` inside another unit is a savepoint: its failure restores only
 *   what it changed and the error still propagates to the caller, who decides
 *   whether the outer unit fails too.
 * - Any error restores every store to the state captured on entry and is
 *   rethrown untouched.
 */
@Injectable()
export class UnitOfWork {
  private readonly logger = new Logger(UnitOfWork.name);
  private readonly captures: Array<() => Rollback> = [];
  private readonly scope = new AsyncLocalStorage<{ depth: number }>();
  private mutex: Promise<void> = Promise.resolve();

  register<S>(store: TransactionalStore<S>): void {
    this.captures.push(() => {
      const saved = store.snapshot();
      return () => store.restore(saved);
    });
  }

  /** True while executing inside a unit (used by tests and assertions). */
  get active(): boolean {
    return this.scope.getStore() !== undefined;
  }

  async run<T>(work: () => Promise<T>): Promise<T> {
    const current = this.scope.getStore();
    if (current) {
      return this.savepoint(work, current.depth + 1);
    }

    let unlock!: () => void;
    const prev = this.mutex;
    this.mutex = new Promise<void>((r) => {
      unlock = r;
    });

    try {
      await prev;
      return await this.savepoint(work, 0);
    } finally {
      unlock();
    }
  }

  private async savepoint<T>(work: () => Promise<T>, depth: number): Promise<T> {
    const rollbacks = this.captures.map((capture) => capture());
    try {
      return await this.scope.run({ depth }, work);
    } catch (err) {
      for (const rollback of rollbacks) rollback();
      this.logger.debug(
        `[rollback] depth=${depth} reason=${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }
  }
}
