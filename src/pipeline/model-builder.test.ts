/**
 * PipelineModelBuilder Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

// Mock logger before importing modules that use it
vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => mockLogger),
}));

import { PipelineModelBuilder } from './model-builder.js';
import { RegisterStep, RemoveStep, ReplaceStep } from './step.js';
import { Behavior, PipelineTerminator, StageConnector, type NextFn } from './behavior.js';
import { behaviorContract, connectorContract, terminatorContract } from './contract.js';
import { defineContext } from './context.js';
import { SettingsHolder } from '../settings/holder.js';
import { defineSetting } from '../settings/types.js';
import {
  ContractMismatchError,
  DependencyCycleError,
  DuplicateStepError,
  MissingRootStageError,
  StageConnectorError,
  StepDependencyError,
  UnknownStepError,
} from '../utils/errors.js';

interface IncomingContext {
  body: string;
}

interface LogicalContext {
  type: string;
}

interface OtherContext {
  value: number;
}

const Incoming = defineContext<IncomingContext>('Incoming');
const Logical = defineContext<LogicalContext>('Logical');
const Other = defineContext<OtherContext>('Other');

class IncomingA extends Behavior<IncomingContext> {
  static readonly contract = behaviorContract(Incoming);

  async handle(_context: IncomingContext, next: () => Promise<void>): Promise<void> {
    await next();
  }
}

class IncomingB extends Behavior<IncomingContext> {
  static readonly contract = behaviorContract(Incoming);

  async handle(_context: IncomingContext, next: () => Promise<void>): Promise<void> {
    await next();
  }
}

class LogicalA extends Behavior<LogicalContext> {
  static readonly contract = behaviorContract(Logical);

  async handle(_context: LogicalContext, next: () => Promise<void>): Promise<void> {
    await next();
  }
}

class OtherA extends Behavior<OtherContext> {
  static readonly contract = behaviorContract(Other);

  async handle(_context: OtherContext, next: () => Promise<void>): Promise<void> {
    await next();
  }
}

class IncomingToLogical extends StageConnector<IncomingContext, LogicalContext> {
  static readonly contract = connectorContract(Incoming, Logical);

  async invoke(context: IncomingContext, next: NextFn<LogicalContext>, signal: AbortSignal): Promise<void> {
    await next({ type: context.body }, signal);
  }
}

class IncomingToOther extends StageConnector<IncomingContext, OtherContext> {
  static readonly contract = connectorContract(Incoming, Other);

  async invoke(context: IncomingContext, next: NextFn<OtherContext>, signal: AbortSignal): Promise<void> {
    await next({ value: context.body.length }, signal);
  }
}

class LogicalToIncoming extends StageConnector<LogicalContext, IncomingContext> {
  static readonly contract = connectorContract(Logical, Incoming);

  async invoke(context: LogicalContext, next: NextFn<IncomingContext>, signal: AbortSignal): Promise<void> {
    await next({ body: context.type }, signal);
  }
}

class EndIncoming extends PipelineTerminator<IncomingContext> {
  static readonly contract = terminatorContract(Incoming);

  protected async terminate(): Promise<void> {}
}

class EndLogical extends PipelineTerminator<LogicalContext> {
  static readonly contract = terminatorContract(Logical);

  protected async terminate(): Promise<void> {}
}

function ids(steps: RegisterStep[]): string[] {
  return steps.map((s) => s.stepId);
}

function buildModel(
  additions: RegisterStep[],
  removals: RemoveStep[] = [],
  replacements: ReplaceStep[] = [],
  settings?: SettingsHolder
): RegisterStep[] {
  return new PipelineModelBuilder(Incoming, additions, removals, replacements, settings).build();
}

describe('PipelineModelBuilder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('stages', () => {
    it('should order each stage and append its connector', () => {
      const model = buildModel([
        new RegisterStep('logical-a', LogicalA, 'Logical step'),
        new RegisterStep('in-a', IncomingA, 'First incoming step'),
        new RegisterStep('to-logical', IncomingToLogical, 'Connector'),
        new RegisterStep('in-b', IncomingB, 'Second incoming step').insertBefore('in-a'),
        new RegisterStep('end', EndLogical, 'Terminator'),
      ]);

      expect(ids(model)).toEqual(['in-b', 'in-a', 'to-logical', 'logical-a', 'end']);
    });

    it('should build a single stage pipeline without a connector', () => {
      const model = buildModel([
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('in-b', IncomingB, 'B'),
      ]);

      expect(ids(model)).toEqual(['in-a', 'in-b']);
    });

    it('should return an empty model when nothing is registered', () => {
      expect(buildModel([])).toEqual([]);
    });

    it('should throw when no step consumes the root context', () => {
      const additions = [new RegisterStep('logical-a', LogicalA, 'Logical step')];

      expect(() => buildModel(additions)).toThrow(MissingRootStageError);
      expect(() => buildModel(additions)).toThrow(
        "Can't find any behaviors/connectors for the root context (Incoming)"
      );
    });

    it('should throw when a stage has more than one connector', () => {
      const additions = [
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('to-logical', IncomingToLogical, 'Connector'),
        new RegisterStep('to-other', IncomingToOther, 'Connector'),
      ];

      expect(() => buildModel(additions)).toThrow(StageConnectorError);
      expect(() => buildModel(additions)).toThrow(
        "Multiple stage connectors found for stage 'Incoming'. Remove one of: 'IncomingToLogical', 'IncomingToOther'"
      );
    });

    it('should throw when a non-final stage has no connector', () => {
      const additions = [
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('logical-a', LogicalA, 'Logical step'),
      ];

      expect(() => buildModel(additions)).toThrow('No stage connector found for stage Incoming');
    });

    it('should throw when a connector leads back to a visited stage', () => {
      const additions = [
        new RegisterStep('to-logical', IncomingToLogical, 'Connector'),
        new RegisterStep('back', LogicalToIncoming, 'Connector back'),
      ];

      expect(() => buildModel(additions)).toThrow(StageConnectorError);
      expect(() => buildModel(additions)).toThrow("Stage connector 'back' leads back to stage 'Incoming'");
    });

    it('should stop at a connector whose output stage has no steps', () => {
      const model = buildModel([
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('to-logical', IncomingToLogical, 'Connector'),
      ]);

      expect(ids(model)).toEqual(['in-a', 'to-logical']);
    });

    it('should stop at a terminator and warn about unreachable stages', () => {
      const model = buildModel([
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('end', EndIncoming, 'Terminator'),
        new RegisterStep('other-a', OtherA, 'Unreachable'),
      ]);

      expect(ids(model)).toEqual(['in-a', 'end']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { stages: ['Other'] },
        'Stages not reachable from the root context were left out of the pipeline'
      );
    });

    it('should sort constraints only within a stage', () => {
      const additions = [
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('to-logical', IncomingToLogical, 'Connector'),
        new RegisterStep('logical-a', LogicalA, 'Logical step').insertAfter('in-a'),
      ];

      expect(() => buildModel(additions)).toThrow(UnknownStepError);
    });

    it('should propagate ordering cycles', () => {
      const additions = [
        new RegisterStep('in-a', IncomingA, 'A').insertAfter('in-b'),
        new RegisterStep('in-b', IncomingB, 'B').insertAfter('in-a'),
      ];

      expect(() => buildModel(additions)).toThrow(DependencyCycleError);
    });
  });

  describe('additions', () => {
    it('should reject duplicate step ids case-insensitively', () => {
      const additions = [new RegisterStep('audit', IncomingA, 'A'), new RegisterStep('Audit', IncomingB, 'B')];

      expect(() => buildModel(additions)).toThrow(DuplicateStepError);
      expect(() => buildModel(additions)).toThrow(
        "Step registration with id 'Audit' is already registered for 'IncomingA'; cannot register 'IncomingB'."
      );
    });
  });

  describe('replacements', () => {
    it('should swap the behavior and keep the position', () => {
      const model = buildModel(
        [new RegisterStep('in-a', IncomingA, 'A'), new RegisterStep('in-b', IncomingB, 'B').insertBefore('in-a')],
        [],
        [new ReplaceStep('IN-A', IncomingB, 'Replaced')]
      );

      expect(ids(model)).toEqual(['in-b', 'in-a']);
      expect(model[1]?.behaviorType).toBe(IncomingB);
      expect(model[1]?.description).toBe('Replaced');
    });

    it('should keep the description when the replacement has none', () => {
      const model = buildModel([new RegisterStep('in-a', IncomingA, 'Audits messages')], [], [
        new ReplaceStep('in-a', IncomingB),
      ]);

      expect(model[0]?.description).toBe('Audits messages');
    });

    it('should throw when replacing an unknown step', () => {
      const build = () =>
        buildModel([new RegisterStep('in-a', IncomingA, 'A')], [], [new ReplaceStep('missing', IncomingB)]);

      expect(build).toThrow(UnknownStepError);
      expect(build).toThrow(
        "You can only replace an existing step registration, 'missing' registration does not exist."
      );
    });

    it('should throw when the replacement declares another contract', () => {
      const build = () =>
        buildModel([new RegisterStep('in-a', IncomingA, 'A')], [], [new ReplaceStep('in-a', LogicalA)]);

      expect(build).toThrow(ContractMismatchError);
    });
  });

  describe('removals', () => {
    it('should remove a step', () => {
      const model = buildModel(
        [new RegisterStep('in-a', IncomingA, 'A'), new RegisterStep('in-b', IncomingB, 'B')],
        [new RemoveStep('In-A')]
      );

      expect(ids(model)).toEqual(['in-b']);
    });

    it('should accept the same removal twice', () => {
      const model = buildModel(
        [new RegisterStep('in-a', IncomingA, 'A'), new RegisterStep('in-b', IncomingB, 'B')],
        [new RemoveStep('in-a'), new RemoveStep('IN-A')]
      );

      expect(ids(model)).toEqual(['in-b']);
    });

    it('should throw when removing an unknown step', () => {
      const build = () => buildModel([new RegisterStep('in-a', IncomingA, 'A')], [new RemoveStep('missing')]);

      expect(build).toThrow(UnknownStepError);
      expect(build).toThrow("You cannot remove step registration with id 'missing', registration does not exist.");
    });

    it('should throw when another step depends on the removed one', () => {
      const build = () =>
        buildModel(
          [new RegisterStep('in-a', IncomingA, 'A'), new RegisterStep('in-b', IncomingB, 'B').insertAfterIfExists('in-a')],
          [new RemoveStep('in-a')]
        );

      expect(build).toThrow(StepDependencyError);
      expect(build).toThrow(
        "You cannot remove step registration with id 'in-a', registration with id 'in-b' depends on it."
      );
    });

    it('should allow removing a step together with its dependants', () => {
      const model = buildModel(
        [
          new RegisterStep('in-a', IncomingA, 'A'),
          new RegisterStep('in-b', IncomingB, 'B').insertAfter('in-a'),
          new RegisterStep('end', EndIncoming, 'Terminator'),
        ],
        [new RemoveStep('in-a'), new RemoveStep('in-b')]
      );

      expect(ids(model)).toEqual(['end']);
    });

    it('should return an empty model when every step is removed', () => {
      const model = buildModel([new RegisterStep('in-a', IncomingA, 'A')], [new RemoveStep('in-a')]);

      expect(model).toEqual([]);
    });
  });

  describe('enablement', () => {
    const auditEnabled = defineSetting('Audit.Enabled', z.boolean());

    function auditSteps(): RegisterStep[] {
      return [
        new RegisterStep('in-a', IncomingA, 'A'),
        new RegisterStep('audit', IncomingB, 'Audit', {
          isEnabled: (settings) => settings.getOrDefault(auditEnabled, false),
        }).insertBeforeIfExists('in-a'),
      ];
    }

    it('should drop steps disabled by the settings', () => {
      expect(ids(buildModel(auditSteps()))).toEqual(['in-a']);
    });

    it('should keep steps enabled by the settings', () => {
      const settings = new SettingsHolder();
      settings.set(auditEnabled, true);

      expect(ids(buildModel(auditSteps(), [], [], settings))).toEqual(['audit', 'in-a']);
    });

    it('should fail enforced constraints on a disabled step', () => {
      const additions = [
        new RegisterStep('in-a', IncomingA, 'A', { isEnabled: () => false }),
        new RegisterStep('in-b', IncomingB, 'B').insertAfter('in-a'),
      ];

      expect(() => buildModel(additions)).toThrow(
        "Registration 'in-a' specified in the insertafter of the 'in-b' step does not exist. Current StepIds: 'in-b'"
      );
    });
  });
});
