/** The broker is unreachable, or the transport closed underneath an operation. */
export class ConnectionError extends Error {
  override name = 'ConnectionError';
}

/** A broker interaction did not complete within its bound. */
export class TimeoutError extends Error {
  override name = 'TimeoutError';
}

/** The broker rejected an operation, e.g. a subscription it refused to grant. */
export class ProtocolError extends Error {
  override name = 'ProtocolError';
}

/** Raised by a listener callback. Logged and dropped, never propagated. */
export class CallbackError extends Error {
  override name = 'CallbackError';

  constructor(readonly topic: string, cause: unknown) {
    super(`Listener for ${topic} failed: ${errorMessage(cause)}`, { cause });
  }
}

/** Abort reason for tasks cancelled through the scheduler. */
export class CancelledError extends Error {
  override name = 'CancelledError';
}

/**
 * Can be thrown from `prepare()` or `run()` of a repeatable
 * to permanently stop its repeater without error logs.
 */
export class RepeaterCancelled extends Error {
  override name = 'RepeaterCancelled';
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return `${error.name}(${error.message})`;
  return String(error);
};
