/**
 * Transport failure raised by a backend client while talking to the server.
 */
export class NetworkError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly code: number,
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

/** An operation was requested while its precondition does not hold */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}
