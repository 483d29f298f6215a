/**
 * Error types surfaced at the coordinator boundary
 */

import { ErrorType } from './constants';

export class CoordinatorError extends Error {
  readonly type: ErrorType;

  constructor(type: ErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CoordinatorError';
    this.type = type;
  }
}

export function isCoordinatorError(err: unknown, type?: ErrorType): err is CoordinatorError {
  return err instanceof CoordinatorError && (type === undefined || err.type === type);
}

/**
 * Message of an unknown thrown value, for logging
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
