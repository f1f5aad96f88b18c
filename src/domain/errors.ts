/** Operator misconfiguration: unknown event service, missing url, invalid config file. */
export class EventBusConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EventBusConfigError';
  }
}

/** A job could not be handed to the event intake service. */
export class JobQueueError extends Error {
  constructor(message: string, readonly errors: readonly string[] = []) {
    super(message);
    this.name = 'JobQueueError';
  }
}
