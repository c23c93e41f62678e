import { createLogger, type Logger } from "../internal/logging/logger.ts";

/** Counters describing the reallocations a manager has performed. */
export interface GrowthStats {
  /** Number of times storage was replaced. */
  readonly reallocations: number;
  /** Total bytes copied from old storage into new storage. */
  readonly bytesCopied: number;
}

let defaultLogger: Logger | undefined;

// Shared by every manager built without an explicit logger.
function capacityLogger(): Logger {
  defaultLogger ??= createLogger("capacity-manager");
  return defaultLogger;
}

/**
 * Growth policy for {@link TextBuffer} storage.
 *
 * When a write needs more room than the storage has, the storage is replaced
 * by one of `max(required, capacity * 2)` bytes with the live prefix copied
 * over. Doubling keeps the total copy cost of n appends at O(n).
 */
export class CapacityManager {
  #reallocations = 0;
  #bytesCopied = 0;
  readonly #logger: Logger;

  constructor(logger: Logger = capacityLogger()) {
    this.#logger = logger;
  }

  /** Capacity to grow to from `current` so that `required` bytes fit. */
  public static nextCapacity(current: number, required: number): number {
    return Math.max(required, current * 2);
  }

  /**
   * Returns storage that can hold `required` bytes, keeping the first
   * `length` bytes of `storage`. Returns `storage` itself when it is large
   * enough already.
   */
  public ensure(
    storage: Uint8Array,
    length: number,
    required: number,
  ): Uint8Array {
    if (required <= storage.length) {
      return storage;
    }
    return this.resize(
      storage,
      length,
      CapacityManager.nextCapacity(storage.length, required),
    );
  }

  /**
   * Moves the first `length` bytes of `storage` into new storage of exactly
   * `capacity` bytes.
   */
  public resize(
    storage: Uint8Array,
    length: number,
    capacity: number,
  ): Uint8Array {
    if (capacity < length) {
      throw new RangeError(
        `Capacity ${capacity} cannot hold length ${length}`,
      );
    }
    const next = new Uint8Array(capacity);
    next.set(storage.subarray(0, length));
    this.#reallocations++;
    this.#bytesCopied += length;
    this.#logger.debug(
      { from: storage.length, to: capacity, copied: length },
      "reallocated text storage",
    );
    return next;
  }

  public stats(): GrowthStats {
    return {
      reallocations: this.#reallocations,
      bytesCopied: this.#bytesCopied,
    };
  }
}
