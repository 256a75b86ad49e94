/**
 * Pipeline Modifications
 *
 * Configuration surface collecting step additions, removals and
 * replacements before a pipeline is built. Locked by the pipeline build;
 * later changes fail.
 */

import { SettingsLockedError } from '../utils/errors.js';
import type { BehaviorFactory, BehaviorType } from './behavior.js';
import type { ObjectBuilder } from './builder.js';
import { RemoveStep, ReplaceStep, toRegisterStep, type RegisterStep, type RegisterStepOptions } from './step.js';

export class PipelineModifications {
  private readonly additionList: RegisterStep[] = [];
  private readonly removalList: RemoveStep[] = [];
  private readonly replacementList: ReplaceStep[] = [];
  private locked = false;

  get additions(): readonly RegisterStep[] {
    return this.additionList;
  }

  get removals(): readonly RemoveStep[] {
    return this.removalList;
  }

  get replacements(): readonly ReplaceStep[] {
    return this.replacementList;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Register a new step
   * @returns The step, to chain insertBefore()/insertAfter() calls
   */
  register(stepId: string, behavior: BehaviorType, description: string, options?: RegisterStepOptions): RegisterStep;
  register(step: RegisterStep): RegisterStep;
  register(
    stepOrId: RegisterStep | string,
    behavior?: BehaviorType,
    description?: string,
    options?: RegisterStepOptions
  ): RegisterStep {
    this.ensureUnlocked(typeof stepOrId === 'string' ? stepOrId : stepOrId.stepId);
    const step = toRegisterStep(stepOrId, behavior, description, options);
    this.additionList.push(step);
    return step;
  }

  /**
   * Remove a registered step
   */
  remove(stepId: string): this {
    this.ensureUnlocked(stepId);
    this.removalList.push(new RemoveStep(stepId));
    return this;
  }

  /**
   * Replace the behavior of a registered step, keeping its id and constraints
   */
  replace(
    stepId: string,
    behavior: BehaviorType,
    description?: string,
    factory?: BehaviorFactory<ObjectBuilder>
  ): this {
    this.ensureUnlocked(stepId);
    this.replacementList.push(new ReplaceStep(stepId, behavior, description, factory));
    return this;
  }

  lock(): void {
    this.locked = true;
  }

  private ensureUnlocked(stepId: string): void {
    if (this.locked) {
      throw new SettingsLockedError(
        `Unable to modify step '${stepId}'. The pipeline has already been built; move any configuration code earlier`
      );
    }
  }
}
