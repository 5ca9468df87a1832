/**
 * Error taxonomy for channel runs
 *
 * Every per-channel failure is one of these. The orchestrator catches them,
 * records the message on the channel's outcome and moves on; only ConfigError
 * stops the process, and it is raised before any channel is touched.
 */

export interface ErrorContext {
  channel?: string;
  itemId?: string;
  cause?: unknown;
}

abstract class ChannelRunError extends Error {
  public readonly channel?: string;
  public readonly itemId?: string;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.channel = context.channel;
    this.itemId = context.itemId;
  }
}

/** Missing or invalid configuration, detected at startup */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Listing or probing failed at the media provider */
export class ProviderError extends ChannelRunError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'ProviderError';
  }
}

/** Audio extraction failed; the item stays eligible for the next run */
export class DownloadError extends ChannelRunError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'DownloadError';
  }
}

/** Overflow upload or mail transport failed; the local artifact is kept */
export class DeliverySinkError extends ChannelRunError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'DeliverySinkError';
  }
}

/** History could not be read, parsed or written */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Render any thrown value as a single log-friendly line
 * Includes the error class name when it is one of ours
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}
