/**
 * Typed failures raised by board generation.
 * Callers at the process boundary decide how to report them.
 */

/** Thrown when a placement asks for more tiles than the grid has empty cells */
export class CapacityError extends Error {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(`Cannot fill a board with ${available} empty spaces ${requested} times`);
    this.name = "CapacityError";
    this.requested = requested;
    this.available = available;
  }
}

/** Thrown when the word list cannot fill a board with unique words */
export class InsufficientWordsError extends Error {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(`Need at least ${required} unique words, but only ${available} were provided`);
    this.name = "InsufficientWordsError";
    this.required = required;
    this.available = available;
  }
}
