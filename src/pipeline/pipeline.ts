/**
 * Pipeline
 *
 * Builds an executable pipeline from modifications: orders the registered
 * steps, creates one behavior instance per step through the object builder
 * and compiles them into a single invoker. Building is expensive and happens
 * once; execute() is cheap and may be called concurrently.
 */

import { getConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { SettingsHolder } from '../settings/holder.js';
import { DefaultBuilder, type ObjectBuilder } from './builder.js';
import { NONE } from './cancellation.js';
import { compilePipeline, type CompilableStep, type PipelineInvoker } from './compiler.js';
import type { ContextShape } from './context.js';
import type { BehaviorKind } from './contract.js';
import { StepRegistrationCoordinator } from './coordinator.js';
import type { PipelineModifications } from './modifications.js';

const logger = createChildLogger({ service: 'pipeline' });

export interface PipelineOptions<TRoot> {
  /** Context shape the pipeline is executed with */
  rootContext: ContextShape<TRoot>;
  /** Registered steps, removals and replacements */
  modifications: PipelineModifications;
  /** Creates behavior instances (default: DefaultBuilder) */
  builder?: ObjectBuilder;
  /** Settings passed to step enablement predicates; locked by the build */
  settings?: SettingsHolder;
}

/**
 * Resolved step, as exposed for inspection
 */
export interface PipelineStepInfo {
  stepId: string;
  description: string;
  behavior: string;
  kind: BehaviorKind;
}

export class Pipeline<TRoot> {
  private constructor(
    readonly rootContext: ContextShape<TRoot>,
    private readonly stepInfo: readonly PipelineStepInfo[],
    private readonly invoker: PipelineInvoker<TRoot>
  ) {}

  /**
   * Build a pipeline. Any configuration error aborts the build.
   */
  static build<TRoot>(options: PipelineOptions<TRoot>): Pipeline<TRoot> {
    const { rootContext, modifications, settings } = options;
    const builder = options.builder ?? new DefaultBuilder();

    modifications.lock();
    settings?.lock();

    const coordinator = new StepRegistrationCoordinator(modifications.removals, modifications.replacements);
    for (const step of modifications.additions) {
      coordinator.register(step);
    }

    const model = coordinator.buildPipelineModelFor(rootContext, settings);

    const resolved: CompilableStep[] = model.map((step) => ({
      stepId: step.stepId,
      contract: step.contract,
      behavior: step.createBehavior(builder),
    }));

    const invoker = compilePipeline(rootContext, resolved);

    const stepInfo = model.map((step) => ({
      stepId: step.stepId,
      description: step.description,
      behavior: step.behaviorType.name,
      kind: step.contract.kind,
    }));

    if (getConfig().pipeline.logModel) {
      logger.info(
        { rootContext: rootContext.name, stepCount: stepInfo.length, steps: stepInfo.map((s) => s.stepId) },
        'Pipeline built'
      );
      logger.debug({ steps: stepInfo }, 'Pipeline model');
    }

    return new Pipeline(rootContext, Object.freeze(stepInfo), invoker);
  }

  /**
   * Ordered steps of this pipeline
   */
  get steps(): readonly PipelineStepInfo[] {
    return this.stepInfo;
  }

  /**
   * Run the pipeline against a context.
   * Rejects with whatever a behavior throws, CancellationError included.
   */
  async execute(context: TRoot, signal: AbortSignal = NONE): Promise<void> {
    return this.invoker(context, signal);
  }

  /**
   * Human readable listing of the resolved steps
   */
  describe(): string {
    const lines = this.stepInfo.map(
      (step, index) =>
        `${String(index + 1).padStart(2)}. ${step.stepId} [${step.kind}] ${step.behavior}` +
        (step.description ? ` - ${step.description}` : '')
    );
    return [`Pipeline for ${this.rootContext.name}:`, ...lines].join('\n');
  }
}
