/** Input rejected before anything is written. Maps to 400. */
export class ValidationError extends Error {
  override name = "ValidationError";
}

/** The backing database failed. The message is never sent to clients. */
export class StorageError extends Error {
  override name = "StorageError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** No free code was found within the retry ceiling. */
export class ExhaustedError extends Error {
  override name = "ExhaustedError";

  constructor(readonly attempts: number) {
    super(`no free short code after ${attempts} attempts`);
  }
}
