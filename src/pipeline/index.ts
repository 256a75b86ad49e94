/**
 * Pipeline Module
 *
 * Ordering and composition of pipeline behaviors.
 *
 * Usage:
 *
 * 1. Register steps:
 *    ```ts
 *    const modifications = new PipelineModifications();
 *    modifications.register('deserialize', Deserialize, 'Reads the message body');
 *    modifications.register('audit', Audit, 'Writes an audit entry').insertAfter('deserialize');
 *    modifications.register('dispatch', Dispatch, 'Hands the message to its handler');
 *    ```
 *
 * 2. Adjust registrations made elsewhere:
 *    ```ts
 *    modifications.replace('audit', QuietAudit);
 *    modifications.remove('metrics');
 *    ```
 *
 * 3. Build once, execute many times:
 *    ```ts
 *    const pipeline = Pipeline.build({ rootContext: Incoming, modifications, builder });
 *    await pipeline.execute(context, controller.signal);
 *    ```
 */

// Export types
export * from './context.js';
export * from './contract.js';
export * from './behavior.js';

// Export steps and configuration surface
export {
  Dependency,
  RegisterStep,
  RemoveStep,
  ReplaceStep,
  normalizeStepId,
  sameStepId,
  type DependencyDirection,
  type EnabledPredicate,
  type RegisterStepOptions,
} from './step.js';
export { PipelineModifications } from './modifications.js';

// Export ordering
export { StepRegistrationCoordinator } from './coordinator.js';
export { PipelineModelBuilder } from './model-builder.js';
export { sortStageSteps } from './graph.js';

// Export compilation and execution
export { compileBehaviorChain, compilePipeline, type CompilableStep, type PipelineInvoker } from './compiler.js';
export { Pipeline, type PipelineOptions, type PipelineStepInfo } from './pipeline.js';
export { throwIfCancellationRequested, isCancellationError, NONE } from './cancellation.js';

// Export builder
export { DefaultBuilder, type ObjectBuilder, type Constructor, type Factory } from './builder.js';
