import { StaleViewError } from "../text/text_errors.ts";

/**
 * Mutation counter shared between a buffer and the views it hands out.
 *
 * The owner bumps the counter on every mutation; a borrow records the value
 * it was taken at and refuses to be used once the two differ.
 */
export class Generation {
  #value = 0;

  /** The current generation. */
  public current(): number {
    return this.#value;
  }

  /** Marks a mutation, invalidating every outstanding borrow. */
  public bump(): void {
    this.#value++;
  }

  /** Records a borrow at the current generation. */
  public borrow(): Borrow {
    return new Borrow(this, this.#value);
  }
}

/** A borrow of a {@link Generation} at a fixed point in time. */
export class Borrow {
  readonly #source: Generation;
  readonly #takenAt: number;

  constructor(source: Generation, takenAt: number) {
    this.#source = source;
    this.#takenAt = takenAt;
  }

  public isLive(): boolean {
    return this.#source.current() === this.#takenAt;
  }

  /** @throws StaleViewError if the source has been mutated since. */
  public check(): void {
    const current = this.#source.current();
    if (current !== this.#takenAt) {
      throw new StaleViewError(this.#takenAt, current);
    }
  }
}
