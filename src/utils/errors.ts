/**
 * Base library error.
 *
 * `statusCode` is never read inside the library. Hosts map it the way they
 * map their own errors, e.g. an HTTP error handler replying with it.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Pipeline configuration mistake detected while building.
 *
 * Not operational: these indicate a programming error and must abort the
 * build, never be retried.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, code = 'CONFIGURATION_ERROR') {
    super(message, 500, code, false);
  }
}

/**
 * Two additions share the same step id
 */
export class DuplicateStepError extends ConfigurationError {
  public readonly stepId: string;

  constructor(stepId: string, message: string) {
    super(message, 'DUPLICATE_STEP');
    this.stepId = stepId;
  }
}

/**
 * Replacement, removal or enforced ordering constraint points at a step that
 * is not registered
 */
export class UnknownStepError extends ConfigurationError {
  public readonly stepId: string;

  constructor(stepId: string, message: string) {
    super(message, 'UNKNOWN_STEP');
    this.stepId = stepId;
  }
}

/**
 * A step cannot be removed while another step orders itself against it
 */
export class StepDependencyError extends ConfigurationError {
  public readonly stepId: string;
  public readonly dependantId: string;

  constructor(stepId: string, dependantId: string) {
    super(
      `You cannot remove step registration with id '${stepId}', registration with id '${dependantId}' depends on it.`,
      'STEP_DEPENDENCY'
    );
    this.stepId = stepId;
    this.dependantId = dependantId;
  }
}

/**
 * Stage has more than one connector, or a non-final stage has none
 */
export class StageConnectorError extends ConfigurationError {
  public readonly stage: string;

  constructor(stage: string, message: string) {
    super(message, 'STAGE_CONNECTOR');
    this.stage = stage;
  }
}

/**
 * No behavior consumes the pipeline's root context
 */
export class MissingRootStageError extends ConfigurationError {
  constructor(rootContext: string) {
    super(`Can't find any behaviors/connectors for the root context (${rootContext})`, 'MISSING_ROOT_STAGE');
  }
}

/**
 * Ordering constraints form a cycle
 */
export class DependencyCycleError extends ConfigurationError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Step ordering constraints form a cycle: ${cycle.join(' -> ')}`, 'DEPENDENCY_CYCLE');
    this.cycle = cycle;
  }
}

/**
 * Behavior contracts do not line up (invalid contract, replacement with a
 * different shape, or adjacent steps whose context shapes differ)
 */
export class ContractMismatchError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'CONTRACT_MISMATCH');
  }
}

/**
 * Write attempted after the owner locked the configuration
 */
export class SettingsLockedError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'SETTINGS_LOCKED');
  }
}

/**
 * Cooperative cancellation observed by a behavior
 */
export class CancellationError extends AppError {
  public readonly reason: unknown;

  constructor(message = 'The operation was canceled', reason?: unknown) {
    super(message, 499, 'CANCELLED');
    this.reason = reason;
  }
}

/**
 * Setting lookup for a key that has neither an override nor a default
 */
export class SettingNotFoundError extends AppError {
  public readonly key: string;

  constructor(key: string) {
    super(`The given key (${key}) was not present in the settings.`, 404, 'SETTING_NOT_FOUND');
    this.key = key;
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR');
    this.details = details;
  }
}
