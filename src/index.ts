export * from './pipeline/index.js';
export * from './settings/index.js';
export {
  AppError,
  ConfigurationError,
  DuplicateStepError,
  UnknownStepError,
  StepDependencyError,
  StageConnectorError,
  MissingRootStageError,
  DependencyCycleError,
  ContractMismatchError,
  SettingsLockedError,
  CancellationError,
  SettingNotFoundError,
  ValidationError,
} from './utils/errors.js';
export { isDisposable, type Disposable } from './utils/disposable.js';
