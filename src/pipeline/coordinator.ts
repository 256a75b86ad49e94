/**
 * Step Registration Coordinator
 *
 * Collects the steps a pipeline registers and builds its model, applying the
 * removals and replacements requested for it. A removal or replacement
 * naming a step that was never registered fails the build.
 */

import { createChildLogger } from '../utils/logger.js';
import type { ReadOnlySettings } from '../settings/types.js';
import type { BehaviorType } from './behavior.js';
import type { ContextShape } from './context.js';
import { PipelineModelBuilder } from './model-builder.js';
import {
  toRegisterStep,
  type RegisterStep,
  type RegisterStepOptions,
  type RemoveStep,
  type ReplaceStep,
} from './step.js';

const logger = createChildLogger({ service: 'step-coordinator' });

export class StepRegistrationCoordinator {
  private readonly additions: RegisterStep[] = [];

  constructor(
    private readonly removals: readonly RemoveStep[],
    private readonly replacements: readonly ReplaceStep[]
  ) {}

  /**
   * Register a step from an id, behavior type and description
   * @returns The created step, to add ordering constraints
   */
  register(stepId: string, behavior: BehaviorType, description: string, options?: RegisterStepOptions): RegisterStep;
  /**
   * Register a pre-built step
   */
  register(step: RegisterStep): RegisterStep;
  register(
    stepOrId: RegisterStep | string,
    behavior?: BehaviorType,
    description?: string,
    options?: RegisterStepOptions
  ): RegisterStep {
    const step = toRegisterStep(stepOrId, behavior, description, options);
    this.additions.push(step);
    return step;
  }

  /**
   * Build the ordered step list for a root context
   */
  buildPipelineModelFor(rootContext: ContextShape, settings?: ReadOnlySettings): RegisterStep[] {
    logger.debug(
      {
        rootContext: rootContext.name,
        additions: this.additions.length,
        removals: this.removals.length,
        replacements: this.replacements.length,
      },
      'Building pipeline model'
    );

    const modelBuilder = new PipelineModelBuilder(
      rootContext,
      this.additions,
      this.removals,
      this.replacements,
      settings
    );

    return modelBuilder.build();
  }
}
