/**
 * Behavior Contracts
 *
 * Every behavior class declares, once, which context shape it consumes, which
 * it produces, and whether it is an ordinary step, a stage connector or a
 * terminator. The pipeline model builder reads these contracts instead of
 * inspecting behavior types at runtime.
 */

import { ContractMismatchError } from '../utils/errors.js';
import { terminatingContextOf, type ContextShape, type TerminatingContext } from './context.js';

export type BehaviorKind = 'behavior' | 'connector' | 'terminator';

export interface BehaviorContract<TIn = unknown, TOut = unknown> {
  readonly kind: BehaviorKind;
  readonly input: ContextShape<TIn>;
  readonly output: ContextShape<TOut>;
}

/**
 * Contract of a behavior that does not change the context shape
 */
export function behaviorContract<TContext>(shape: ContextShape<TContext>): BehaviorContract<TContext, TContext> {
  if (shape.terminal) {
    throw new ContractMismatchError(`Behaviors cannot consume the terminating context '${shape.name}'`);
  }
  const contract: BehaviorContract<TContext, TContext> = { kind: 'behavior', input: shape, output: shape };
  return Object.freeze(contract);
}

/**
 * Contract of a stage connector moving from one context shape to another
 */
export function connectorContract<TFrom, TTo>(
  from: ContextShape<TFrom>,
  to: ContextShape<TTo>
): BehaviorContract<TFrom, TTo> {
  if (from.terminal || to.terminal) {
    throw new ContractMismatchError(
      `Stage connector from '${from.name}' to '${to.name}' cannot use a terminating context; use terminatorContract()`
    );
  }
  // Shapes are compared by identity; a connector must change the shape
  if (sameShape(from, to)) {
    throw new ContractMismatchError(`Stage connector must change the context shape, got '${from.name}' on both sides`);
  }
  const contract: BehaviorContract<TFrom, TTo> = { kind: 'connector', input: from, output: to };
  return Object.freeze(contract);
}

/**
 * Contract of a terminator ending the pipeline
 */
export function terminatorContract<TContext>(
  shape: ContextShape<TContext>
): BehaviorContract<TContext, TerminatingContext<TContext>> {
  const contract: BehaviorContract<TContext, TerminatingContext<TContext>> = {
    kind: 'terminator',
    input: shape,
    output: terminatingContextOf(shape),
  };
  return Object.freeze(contract);
}

/**
 * True for connectors and terminators (steps that end a stage)
 */
export function isStageConnector(contract: BehaviorContract): boolean {
  return contract.kind !== 'behavior';
}

/**
 * Check if two contracts declare the same kind and shapes
 */
export function contractsEqual(a: BehaviorContract, b: BehaviorContract): boolean {
  return a.kind === b.kind && sameShape(a.input, b.input) && sameShape(a.output, b.output);
}

function sameShape(a: ContextShape, b: ContextShape): boolean {
  return a === b;
}

/**
 * Describe a contract for logs and error messages
 */
export function describeContract(contract: BehaviorContract): string {
  return `${contract.kind}(${contract.input.name} -> ${contract.output.name})`;
}
