/**
 * Step Registrations
 *
 * RegisterStep is the descriptor of one behavior in the pipeline: a stable id,
 * the behavior class (and optionally a factory), a description, ordering
 * constraints and an enablement predicate. RemoveStep and ReplaceStep are
 * requests applied to the registered steps before ordering.
 */

import { ContractMismatchError, ConfigurationError } from '../utils/errors.js';
import type { AnyBehavior, BehaviorFactory, BehaviorType } from './behavior.js';
import type { ObjectBuilder } from './builder.js';
import { contractsEqual, describeContract, type BehaviorContract } from './contract.js';
import type { ReadOnlySettings } from '../settings/types.js';

export type DependencyDirection = 'before' | 'after';

/**
 * Ordering constraint of one step against another
 */
export class Dependency {
  constructor(
    readonly dependantId: string,
    readonly dependsOnId: string,
    readonly direction: DependencyDirection,
    /** When false, a missing target is ignored instead of failing the build */
    readonly enforce: boolean
  ) {}
}

export type EnabledPredicate = (settings: ReadOnlySettings) => boolean;

export interface RegisterStepOptions {
  factory?: BehaviorFactory<ObjectBuilder>;
  isEnabled?: EnabledPredicate;
}

/**
 * Normalize a step id for case-insensitive comparison
 */
export function normalizeStepId(stepId: string): string {
  return stepId.toLowerCase();
}

/**
 * Case-insensitive step id equality
 */
export function sameStepId(a: string, b: string): boolean {
  return normalizeStepId(a) === normalizeStepId(b);
}

function assertStepId(stepId: string): void {
  if (stepId.trim().length === 0) {
    throw new ConfigurationError('Step id must be a non-empty string');
  }
}

/**
 * Request to drop a registered step before the pipeline is ordered
 */
export class RemoveStep {
  constructor(readonly removeId: string) {
    assertStepId(removeId);
  }
}

/**
 * Request to swap the behavior of a registered step, keeping its id and
 * ordering constraints
 */
export class ReplaceStep {
  constructor(
    readonly replaceId: string,
    readonly behaviorType: BehaviorType,
    readonly description?: string,
    readonly factory?: BehaviorFactory<ObjectBuilder>
  ) {
    assertStepId(replaceId);
  }
}

/**
 * RegisterStep - descriptor of one pipeline step
 *
 * Subclass it to override isEnabled(), or pass an `isEnabled` predicate.
 */
export class RegisterStep {
  readonly stepId: string;
  /** Declared shapes; taken from the behavior type once and never changed */
  readonly contract: BehaviorContract;

  private behavior: BehaviorType;
  private factory: BehaviorFactory<ObjectBuilder> | undefined;
  private stepDescription: string;
  private readonly enabledPredicate: EnabledPredicate | undefined;
  private readonly beforeList: Dependency[] = [];
  private readonly afterList: Dependency[] = [];

  constructor(stepId: string, behaviorType: BehaviorType, description: string, options: RegisterStepOptions = {}) {
    assertStepId(stepId);
    this.stepId = stepId;
    this.behavior = behaviorType;
    this.contract = behaviorType.contract;
    this.stepDescription = description;
    this.factory = options.factory;
    this.enabledPredicate = options.isEnabled;
  }

  get behaviorType(): BehaviorType {
    return this.behavior;
  }

  get description(): string {
    return this.stepDescription;
  }

  get befores(): readonly Dependency[] {
    return this.beforeList;
  }

  get afters(): readonly Dependency[] {
    return this.afterList;
  }

  get hasFactory(): boolean {
    return this.factory !== undefined;
  }

  /**
   * Check if this step takes part in the pipeline
   */
  isEnabled(settings: ReadOnlySettings): boolean {
    return this.enabledPredicate ? this.enabledPredicate(settings) : true;
  }

  /**
   * Run this step before the `id` one. Ignored if `id` is not registered.
   */
  insertBeforeIfExists(id: string): this {
    return this.addDependency(id, 'before', false);
  }

  /**
   * Run this step before the `id` one.
   */
  insertBefore(id: string): this {
    return this.addDependency(id, 'before', true);
  }

  /**
   * Run this step after the `id` one. Ignored if `id` is not registered.
   */
  insertAfterIfExists(id: string): this {
    return this.addDependency(id, 'after', false);
  }

  /**
   * Run this step after the `id` one.
   */
  insertAfter(id: string): this {
    return this.addDependency(id, 'after', true);
  }

  /**
   * Check if any of this step's constraints points at `id`
   */
  dependsOn(id: string): boolean {
    return [...this.beforeList, ...this.afterList].some((d) => sameStepId(d.dependsOnId, id));
  }

  /**
   * Apply a replacement: behavior and factory are overwritten, the
   * description only when a non-blank one is supplied.
   */
  replace(replacement: ReplaceStep): void {
    if (!sameStepId(this.stepId, replacement.replaceId)) {
      throw new ConfigurationError(
        `Cannot replace step '${this.stepId}' with '${replacement.replaceId}'. The ID of the replacement must match the replaced step.`
      );
    }

    if (!contractsEqual(this.contract, replacement.behaviorType.contract)) {
      throw new ContractMismatchError(
        `Cannot replace step '${this.stepId}': '${replacement.behaviorType.name}' declares ${describeContract(replacement.behaviorType.contract)} but the step declares ${describeContract(this.contract)}`
      );
    }

    this.behavior = replacement.behaviorType;
    this.factory = replacement.factory;

    if (replacement.description !== undefined && replacement.description.trim().length > 0) {
      this.stepDescription = replacement.description;
    }
  }

  /**
   * Create the behavior instance: the factory receives the builder when
   * present, otherwise the builder constructs the behavior type.
   */
  createBehavior(builder: ObjectBuilder): AnyBehavior {
    return this.factory ? this.factory(builder) : builder.build(this.behavior);
  }

  private addDependency(id: string, direction: DependencyDirection, enforce: boolean): this {
    assertStepId(id);
    if (sameStepId(id, this.stepId)) {
      throw new ConfigurationError(`Step '${this.stepId}' cannot be ordered ${direction} itself`);
    }
    const dependency = new Dependency(this.stepId, id, direction, enforce);
    if (direction === 'before') {
      this.beforeList.push(dependency);
    } else {
      this.afterList.push(dependency);
    }
    return this;
  }
}

/**
 * Resolve the arguments of a register(...) overload into a step
 */
export function toRegisterStep(
  stepOrId: RegisterStep | string,
  behavior: BehaviorType | undefined,
  description: string | undefined,
  options: RegisterStepOptions | undefined
): RegisterStep {
  if (typeof stepOrId !== 'string') {
    return stepOrId;
  }
  if (!behavior) {
    throw new ConfigurationError(`A behavior type is required to register step '${stepOrId}'`);
  }
  return new RegisterStep(stepOrId, behavior, description ?? '', options);
}
