/**
 * Cooperative cancellation helpers.
 *
 * The pipeline threads an AbortSignal through every continuation. Behaviors
 * check it themselves; the chain never polls or preempts.
 */

import { CancellationError } from '../utils/errors.js';

/**
 * Throw a CancellationError if cancellation has been requested on the signal
 */
export function throwIfCancellationRequested(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancellationError('The operation was canceled', signal.reason);
  }
}

/**
 * Check if an error is a cooperative cancellation failure
 */
export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Signal that is never aborted, used when the caller passes none
 */
export const NONE: AbortSignal = new AbortController().signal;
