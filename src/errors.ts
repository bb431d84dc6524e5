/**
 * Error types surfaced to callers. Everything else is a plain Error.
 */

export class WardenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A persisted snapshot exists but cannot be read back.
 * A missing snapshot is not an error; callers start empty instead.
 */
export class SnapshotError extends WardenError {
  constructor(
    readonly path: string,
    reason: string
  ) {
    super(`Malformed snapshot at ${path}: ${reason}`);
  }
}

/**
 * A model backend answered with something that is not a usable decision.
 */
export class DecisionParseError extends WardenError {
  constructor(
    reason: string,
    readonly raw: string
  ) {
    super(`Could not parse model output: ${reason}`);
  }
}
