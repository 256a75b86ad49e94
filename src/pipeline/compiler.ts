/**
 * Chain Compiler
 *
 * Folds an ordered list of behavior instances right-to-left into a single
 * invoker: each behavior is called with a continuation that invokes the next
 * behavior, and the last continuation is a no-op.
 *
 * ```
 * (context, signal) => b1.invoke(context,
 *   (context1, signal1) => b2.invoke(context1,
 *     ...
 *       (contextN, signalN) => bN.invoke(contextN, done, signalN), ...), signal)
 * ```
 *
 * Pure-function module: no state, no side effects. The compiled invoker holds
 * only the behavior instances it was built from and keeps no per-call state,
 * so it can be executed any number of times, concurrently.
 */

import { ContractMismatchError } from '../utils/errors.js';
import type { AnyBehavior, NextFn } from './behavior.js';
import type { ContextShape } from './context.js';
import type { BehaviorContract } from './contract.js';

// ── Public API ───────────────────────────────────────────

export type PipelineInvoker<TRoot> = (context: TRoot, signal: AbortSignal) => Promise<void>;

/**
 * One resolved step: its id, declared contract and live behavior instance
 */
export interface CompilableStep {
  readonly stepId: string;
  readonly contract: BehaviorContract;
  readonly behavior: AnyBehavior;
}

type Continuation = NextFn<unknown>;

/**
 * Continuation after the last step (for a terminator: the never-invoked
 * continuation receiving its terminating context)
 */
const done: Continuation = () => Promise.resolve();

/**
 * Compose behaviors into one invoker without contract validation
 */
export function compileBehaviorChain<TRoot>(behaviors: readonly AnyBehavior[]): PipelineInvoker<TRoot> {
  let chain: Continuation = done;

  for (let i = behaviors.length - 1; i >= 0; i--) {
    const behavior = behaviors[i];
    if (typeof behavior?.invoke !== 'function') {
      throw new ContractMismatchError(`Behavior at position ${i} does not implement invoke(context, next, signal)`);
    }
    const nextFn = chain;
    chain = (context: unknown, signal: AbortSignal) => behavior.invoke(context, nextFn, signal);
  }

  return chain;
}

/**
 * Validate that resolved steps line up from the root context, then compose
 * them into one invoker
 *
 * @throws ContractMismatchError if a step does not consume the shape the
 *   previous step produces, or if anything follows a terminator
 */
export function compilePipeline<TRoot>(
  rootContext: ContextShape<TRoot>,
  steps: readonly CompilableStep[]
): PipelineInvoker<TRoot> {
  validateChain(rootContext, steps);
  return compileBehaviorChain<TRoot>(steps.map((step) => step.behavior));
}

function validateChain(rootContext: ContextShape, steps: readonly CompilableStep[]): void {
  let expected = rootContext;
  let previous: CompilableStep | undefined;

  for (const step of steps) {
    if (previous?.contract.kind === 'terminator') {
      throw new ContractMismatchError(
        `Step '${step.stepId}' cannot run after the terminator '${previous.stepId}'`
      );
    }

    if (step.contract.input !== expected) {
      const source = previous ? `step '${previous.stepId}' produces` : 'the pipeline root is';
      throw new ContractMismatchError(
        `Step '${step.stepId}' consumes '${step.contract.input.name}' but ${source} '${expected.name}'`
      );
    }

    expected = step.contract.output;
    previous = step;
  }
}
