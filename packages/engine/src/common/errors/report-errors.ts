import { Logger } from '@nestjs/common';
import { ZodError } from 'zod';
import { NetworkError } from './engine-errors';

const logger = new Logger('ErrorReporter');

/** Anything that can display a single user-visible error message */
export interface ErrorSink {
  reportError(message: string): void;
}

/**
 * Log an error and turn it into a single-line message for the user
 */
export function describeError(error: unknown): string {
  let message: string;
  if (error instanceof NetworkError) {
    message = `${error.message} [url=${error.url}, code=${error.code}]`;
  } else if (error instanceof ZodError) {
    message = error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  logger.error(message, error instanceof Error ? error.stack : undefined);
  return message;
}

/**
 * Await `work` and route any failure into `sink`. Never rejects.
 */
export async function reportErrors<T>(sink: ErrorSink, work: Promise<T>): Promise<T | undefined> {
  try {
    return await work;
  } catch (err) {
    sink.reportError(describeError(err));
    return undefined;
  }
}
