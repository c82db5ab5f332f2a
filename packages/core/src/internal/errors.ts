/**
 * Error taxonomy
 *
 * - ContractViolationError → builder misuse, raised before anything is written
 * - OutOfBoundsError       → index outside the buffer or the constrained span
 * - NotFoundError          → asked for a root past the available count
 */

export class GroveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GroveError';
  }
}

/**
 * Thrown when the construction surface is misused: a subtree sealed out of
 * depth-first order, a marker that is not open on this store, or record sizes
 * that do not partition the buffer. Indicates a programming error.
 */
export class ContractViolationError extends GroveError {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/**
 * Thrown when a node index falls outside [lo, hi) of the buffer or view it
 * was passed to. The caller may retry with a corrected index.
 */
export class OutOfBoundsError extends RangeError {
  constructor(
    readonly index: number,
    readonly lo: number,
    readonly hi: number
  ) {
    super(`Index ${index} is out of bounds [${lo}, ${hi})`);
    this.name = 'OutOfBoundsError';
  }
}

export class NotFoundError extends GroveError {
  constructor(
    readonly n: number,
    readonly count: number
  ) {
    super(`Root ${n} from the end does not exist (${count} roots)`);
    this.name = 'NotFoundError';
  }
}
