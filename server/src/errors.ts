/**
 * Error kinds raised by the server. Each carries the HTTP status and the
 * stable `code` the error middleware puts into the JSON body, so the front
 * end can tell a notice (`nothing_to_undo`) from a failure.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing startup configuration. Fatal: the process does not start. */
export class ConfigurationError extends AppError {
  readonly status = 500;
  readonly code = "configuration_error";
}

export class InvalidRating extends AppError {
  readonly status = 422;
  readonly code = "invalid_rating";

  constructor(
    readonly rating: unknown,
    readonly numClasses: number,
  ) {
    super(`Rating must be an integer between 1 and ${numClasses}, got ${String(rating)}`);
  }
}

export class NothingToUndo extends AppError {
  readonly status = 409;
  readonly code = "nothing_to_undo";

  constructor() {
    super("Nothing to undo");
  }
}

/** The datastore could not be read or written. The user may retry. */
export class StorageUnavailable extends AppError {
  readonly status = 503;
  readonly code = "storage_unavailable";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
