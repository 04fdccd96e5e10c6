export class InvalidScheduleError extends Error {
  constructor(
    public readonly schedule: string,
    reason: string,
  ) {
    super(`Invalid schedule "${schedule}": ${reason}`);
    this.name = "InvalidScheduleError";
  }
}

export class InvalidCommandError extends Error {
  constructor(
    public readonly command: string,
    reason: string,
  ) {
    super(`Invalid command "${command}": ${reason}`);
    this.name = "InvalidCommandError";
  }
}

/** The task store could not be read or written; the caller may try again later. */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}
