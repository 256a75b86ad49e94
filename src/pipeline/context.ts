/**
 * Context Shapes
 *
 * A context shape names the kind of context value a stage of the pipeline
 * operates over. Shapes are opaque identifiers compared by identity; the type
 * parameter is carried only at compile time so behaviors and compiled
 * pipelines stay typed.
 */

import { ContractMismatchError } from '../utils/errors.js';

declare const contextType: unique symbol;

/**
 * Marker type every pipeline context implements
 */
export type BehaviorContext = object;

export interface ContextShape<TContext = unknown> {
  /** Human readable name, used in logs and error messages */
  readonly name: string;
  /** True for the terminating marker produced by a terminator */
  readonly terminal: boolean;
  /** Terminating marker for this shape (absent on markers themselves) */
  readonly terminating?: ContextShape<TerminatingContext<TContext>>;
  /** Phantom field, never set at runtime */
  readonly [contextType]?: TContext;
}

/**
 * Context a terminator would hand to its next continuation.
 * Nothing ever receives one: terminators end the chain.
 */
export interface TerminatingContext<TContext> {
  readonly terminated: TContext;
}

/**
 * Create a new context shape together with its terminating marker
 */
export function defineContext<TContext extends BehaviorContext>(name: string): ContextShape<TContext> {
  const terminating: ContextShape<TerminatingContext<TContext>> = Object.freeze({
    name: `Terminating<${name}>`,
    terminal: true,
  });
  return Object.freeze({ name, terminal: false, terminating });
}

/**
 * Get the terminating marker for a shape
 */
export function terminatingContextOf<TContext>(
  shape: ContextShape<TContext>
): ContextShape<TerminatingContext<TContext>> {
  if (!shape.terminating) {
    throw new ContractMismatchError(`Context '${shape.name}' is a terminating marker and cannot be terminated again`);
  }
  return shape.terminating;
}
