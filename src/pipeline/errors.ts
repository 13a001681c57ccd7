export class CancelledError extends Error {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

/** Missing credentials or invalid run setup; aborts a batch before any claim. */
export class FatalPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalPreconditionError";
  }
}
