/**
 * Error surfaced to an HTTP caller. The route replies with `statusCode`
 * and `{ message, ...details }`.
 */
export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'HttpError';
  }

  toJSON(): Record<string, unknown> {
    return { message: this.message, ...this.details };
  }
}
