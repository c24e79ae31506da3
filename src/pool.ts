import { ConfigurationError } from "./errors.js";
import { MAX_THREADS, MIN_THREADS } from "./config.js";

export type TaskState = "pending" | "running" | "settled";

export interface TaskContext {
  index: number;
  slot: number;
  signal: AbortSignal;
}

export type TaskSettlement<T, R> =
  | { state: "fulfilled"; item: T; index: number; value: R }
  | { state: "rejected"; item: T; index: number; reason: unknown }
  | { state: "cancelled"; item: T; index: number };

export interface PoolRunOptions<T, R> {
  /** Aborting stops dispatch; the signal is also handed to running tasks. */
  signal?: AbortSignal;
  onStart?: (item: T, context: TaskContext) => void;
  onSettled?: (settlement: TaskSettlement<T, R>, slot: number) => void;
}

/**
 * Fixed number of execution slots fed from a FIFO queue. A slot that
 * finishes a task immediately takes the next pending one, so at most `size`
 * tasks run at once and every item settles exactly once.
 *
 * Tasks run on the event loop, so the queue cursor and state table are only
 * touched between awaits and need no further locking.
 */
export class WorkerPool {
  readonly size: number;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < MIN_THREADS || size > MAX_THREADS) {
      throw new ConfigurationError(`pool size must be between ${MIN_THREADS} and ${MAX_THREADS}, got ${size}`);
    }
    this.size = size;
  }

  async run<T, R>(
    items: readonly T[],
    task: (item: T, context: TaskContext) => Promise<R>,
    options: PoolRunOptions<T, R> = {},
  ): Promise<TaskSettlement<T, R>[]> {
    const signal = options.signal ?? new AbortController().signal;
    const states: TaskState[] = items.map(() => "pending");
    const settlements: (TaskSettlement<T, R> | undefined)[] = new Array(items.length);
    let cursor = 0;

    const advance = (index: number, from: TaskState, to: TaskState): void => {
      if (states[index] !== from) {
        throw new Error(`Task ${index} cannot move from ${states[index]} to ${to}`);
      }
      states[index] = to;
    };

    const settle = (settlement: TaskSettlement<T, R>, slot: number): void => {
      advance(settlement.index, "running", "settled");
      settlements[settlement.index] = settlement;
      options.onSettled?.(settlement, slot);
    };

    const slotLoop = async (slot: number): Promise<void> => {
      while (!signal.aborted && cursor < items.length) {
        const index = cursor++;
        const item = items[index];
        advance(index, "pending", "running");

        const context: TaskContext = { index, slot, signal };
        options.onStart?.(item, context);

        let settlement: TaskSettlement<T, R>;
        try {
          const value = await task(item, context);
          settlement = { state: "fulfilled", item, index, value };
        } catch (reason) {
          settlement = { state: "rejected", item, index, reason };
        }
        settle(settlement, slot);
      }
    };

    const slotCount = Math.min(this.size, items.length);
    await Promise.all(Array.from({ length: slotCount }, (_, slot) => slotLoop(slot)));

    return items.map((item, index) => {
      const settled = settlements[index];
      if (settled) return settled;
      // Never dispatched: the run was aborted first.
      return { state: "cancelled", item, index };
    });
  }
}
