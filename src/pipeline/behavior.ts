/**
 * Behavior Types
 *
 * A behavior is one pipeline step. It receives the current context, a `next`
 * continuation that runs the rest of the pipeline, and the cancellation
 * signal of the current execution.
 *
 * - Behavior<T>: ordinary step; the context shape does not change
 * - StageConnector<TFrom, TTo>: moves the pipeline into another stage
 * - PipelineTerminator<T>: ends the pipeline without calling `next`
 *
 * Concrete classes expose their contract as a static `contract` field:
 *
 * ```ts
 * class LogIncoming extends Behavior<IncomingContext> {
 *   static readonly contract = behaviorContract(Incoming);
 *
 *   async handle(context: IncomingContext, next: () => Promise<void>) {
 *     logger.info({ id: context.messageId }, 'Incoming');
 *     await next();
 *   }
 * }
 * ```
 */

import type { BehaviorContract } from './contract.js';
import type { TerminatingContext } from './context.js';

/**
 * Continuation running the remainder of the pipeline
 */
export type NextFn<TContext> = (context: TContext, signal: AbortSignal) => Promise<void>;

/**
 * General behavior form: may hand a different context to `next`
 */
export interface PipelineBehavior<TIn, TOut> {
  invoke(context: TIn, next: NextFn<TOut>, signal: AbortSignal): Promise<void>;
}

/**
 * Behavior with erased context types, as stored in a compiled chain
 */
export type AnyBehavior = PipelineBehavior<unknown, unknown>;

/**
 * A behavior class together with its declared contract
 */
export interface BehaviorType<TBehavior extends AnyBehavior = AnyBehavior> {
  new (...args: never[]): TBehavior;
  readonly name: string;
  readonly contract: BehaviorContract;
}

/**
 * Factory creating a behavior instance from the object builder
 */
export type BehaviorFactory<TBuilder> = (builder: TBuilder) => AnyBehavior;

/**
 * Ordinary step operating on a single context shape
 */
export abstract class Behavior<TContext> implements PipelineBehavior<TContext, TContext> {
  invoke(context: TContext, next: NextFn<TContext>, signal: AbortSignal): Promise<void> {
    return this.handle(context, () => next(context, signal), signal);
  }

  /**
   * Run this step. Call `next()` to continue the pipeline with the same
   * context and signal; not calling it short-circuits the remaining steps.
   */
  abstract handle(context: TContext, next: () => Promise<void>, signal: AbortSignal): Promise<void>;
}

/**
 * Step that turns one context shape into another, ending the current stage
 */
export abstract class StageConnector<TFrom, TTo> implements PipelineBehavior<TFrom, TTo> {
  abstract invoke(context: TFrom, next: NextFn<TTo>, signal: AbortSignal): Promise<void>;
}

/**
 * Final step of a pipeline. `invoke` never calls `next`; subclasses
 * implement `terminate` and must not override `invoke`.
 */
export abstract class PipelineTerminator<TContext> extends StageConnector<TContext, TerminatingContext<TContext>> {
  invoke(context: TContext, _next: NextFn<TerminatingContext<TContext>>, signal: AbortSignal): Promise<void> {
    return this.terminate(context, signal);
  }

  protected abstract terminate(context: TContext, signal: AbortSignal): Promise<void>;
}
