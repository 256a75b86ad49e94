/**
 * Pipeline Model Builder
 *
 * Turns registrations, removals and replacements into the final, ordered
 * list of steps for a root context:
 *
 * 1. Validate that step ids are unique
 * 2. Apply replacements
 * 3. Validate and apply removals
 * 4. Drop steps disabled by the settings
 * 5. Group steps into stages by the context shape they consume, and walk the
 *    stages from the root context, sorting each stage and appending its
 *    connector
 */

import {
  DuplicateStepError,
  MissingRootStageError,
  StageConnectorError,
  StepDependencyError,
  UnknownStepError,
} from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { SettingsHolder } from '../settings/holder.js';
import type { ReadOnlySettings } from '../settings/types.js';
import type { ContextShape } from './context.js';
import { isStageConnector } from './contract.js';
import { sortStageSteps } from './graph.js';
import { normalizeStepId, type RegisterStep, type RemoveStep, type ReplaceStep } from './step.js';

const logger = createChildLogger({ service: 'pipeline-model' });

export class PipelineModelBuilder {
  constructor(
    private readonly rootContext: ContextShape,
    private readonly additions: readonly RegisterStep[],
    private readonly removals: readonly RemoveStep[],
    private readonly replacements: readonly ReplaceStep[],
    private readonly settings: ReadOnlySettings = new SettingsHolder()
  ) {}

  build(): RegisterStep[] {
    const registrations = this.validateAdditions();
    this.applyReplacements(registrations);
    this.applyRemovals(registrations);
    this.applyEnablement(registrations);

    if (registrations.size === 0) {
      return [];
    }

    return this.orderStages([...registrations.values()]);
  }

  // Step 1: validate that additions are unique
  private validateAdditions(): Map<string, RegisterStep> {
    const registrations = new Map<string, RegisterStep>();

    for (const step of this.additions) {
      const key = normalizeStepId(step.stepId);
      const existing = registrations.get(key);
      if (existing) {
        throw new DuplicateStepError(
          step.stepId,
          `Step registration with id '${step.stepId}' is already registered for '${existing.behaviorType.name}'; cannot register '${step.behaviorType.name}'.`
        );
      }
      registrations.set(key, step);
    }

    return registrations;
  }

  // Step 2: replacements
  private applyReplacements(registrations: Map<string, RegisterStep>): void {
    for (const replacement of this.replacements) {
      const step = registrations.get(normalizeStepId(replacement.replaceId));
      if (!step) {
        throw new UnknownStepError(
          replacement.replaceId,
          `You can only replace an existing step registration, '${replacement.replaceId}' registration does not exist.`
        );
      }

      step.replace(replacement);
      logger.debug(
        { stepId: step.stepId, behavior: replacement.behaviorType.name },
        'Replaced step behavior'
      );
    }
  }

  // Step 3: removals
  private applyRemovals(registrations: Map<string, RegisterStep>): void {
    const removeIds = new Map<string, string>();
    for (const removal of this.removals) {
      const key = normalizeStepId(removal.removeId);
      if (!removeIds.has(key)) {
        removeIds.set(key, removal.removeId);
      }
    }

    for (const [key, removeId] of removeIds) {
      if (!registrations.has(key)) {
        throw new UnknownStepError(
          removeId,
          `You cannot remove step registration with id '${removeId}', registration does not exist.`
        );
      }

      // Steps removed in the same pass no longer count as dependents
      const dependant = this.additions.find(
        (step) => !removeIds.has(normalizeStepId(step.stepId)) && step.dependsOn(removeId)
      );
      if (dependant) {
        throw new StepDependencyError(removeId, dependant.stepId);
      }
    }

    for (const [key, removeId] of removeIds) {
      registrations.delete(key);
      logger.debug({ stepId: removeId }, 'Removed step');
    }
  }

  // Step 4: enablement
  private applyEnablement(registrations: Map<string, RegisterStep>): void {
    for (const [key, step] of registrations) {
      if (!step.isEnabled(this.settings)) {
        registrations.delete(key);
        logger.debug({ stepId: step.stepId }, 'Step disabled by settings');
      }
    }
  }

  // Step 5: stages
  private orderStages(registrations: RegisterStep[]): RegisterStep[] {
    const stages = groupByInputContext(registrations);
    const finalOrder: RegisterStep[] = [];
    const visited = new Set<ContextShape>();

    let currentKey: ContextShape | undefined = this.rootContext;
    let currentStage = stages.get(this.rootContext);

    if (!currentStage) {
      throw new MissingRootStageError(this.rootContext.name);
    }

    let stageNumber = 1;

    while (currentStage && currentKey) {
      visited.add(currentKey);

      const stageSteps = currentStage.filter((step) => !isStageConnector(step.contract));
      finalOrder.push(...sortStageSteps(stageSteps));

      const stageConnectors = currentStage.filter((step) => isStageConnector(step.contract));

      if (stageConnectors.length > 1) {
        const connectors = `'${stageConnectors.map((sc) => sc.behaviorType.name).join("', '")}'`;
        throw new StageConnectorError(
          currentKey.name,
          `Multiple stage connectors found for stage '${currentKey.name}'. Remove one of: ${connectors}`
        );
      }

      const stageConnector = stageConnectors[0];

      if (!stageConnector) {
        if (stageNumber < stages.size) {
          throw new StageConnectorError(currentKey.name, `No stage connector found for stage ${currentKey.name}`);
        }
        currentKey = undefined;
        currentStage = undefined;
      } else {
        finalOrder.push(stageConnector);

        if (stageConnector.contract.kind === 'terminator') {
          currentKey = undefined;
          currentStage = undefined;
        } else {
          currentKey = stageConnector.contract.output;
          if (visited.has(currentKey)) {
            throw new StageConnectorError(
              currentKey.name,
              `Stage connector '${stageConnector.stepId}' leads back to stage '${currentKey.name}'`
            );
          }
          currentStage = stages.get(currentKey);
          if (!currentStage) {
            logger.debug(
              { connector: stageConnector.stepId, stage: currentKey.name },
              'No behaviors registered for the connector output stage'
            );
          }
        }
      }

      stageNumber++;
    }

    const unvisited = [...stages.keys()].filter((key) => !visited.has(key));
    if (unvisited.length > 0) {
      logger.warn(
        { stages: unvisited.map((key) => key.name) },
        'Stages not reachable from the root context were left out of the pipeline'
      );
    }

    return finalOrder;
  }
}

/**
 * Group steps by the context shape they consume, keeping first-seen order
 */
function groupByInputContext(steps: RegisterStep[]): Map<ContextShape, RegisterStep[]> {
  const stages = new Map<ContextShape, RegisterStep[]>();
  for (const step of steps) {
    const stage = stages.get(step.contract.input);
    if (stage) {
      stage.push(step);
    } else {
      stages.set(step.contract.input, [step]);
    }
  }
  return stages;
}
