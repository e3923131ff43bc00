// Types
export * from './types/index.js';

// Core components
export { ConformanceTest, TestTimeoutError, orderStates } from './core/test.js';
export type { TestOptions, OrderedStates } from './core/test.js';
export { State, DEFAULT_ACTION_GRACE_MS } from './core/state.js';
export type { StateOptions, StateRunContext, ListenerFactory } from './core/state.js';
export { Validator, MissingRuleError } from './core/validator.js';
export type { ValidatorOptions, ValidatedCallback } from './core/validator.js';
export { TaskScope, describeReason } from './core/task-scope.js';
export type { TaskOutcome, JoinResult, TaskScopeOptions } from './core/task-scope.js';
export {
  Orchestrator,
  buildTests,
  findTestFiles,
  installSignalHandlers,
  DEFAULT_LISTENER_DIR,
  IN_MEMORY_TEST_NAME
} from './core/orchestrator.js';
export type { BuildOptions, BuildResult, RunSummary, TestFailure, OrchestratorOptions } from './core/orchestrator.js';

// Evaluation
export { buildRuleMap, compileRule, compileCondition, describeRule, requirementOf } from './evaluation/rule-compiler.js';
export type { CompileOptions } from './evaluation/rule-compiler.js';
export { CodeSandbox, DEFAULT_CODE_TIMEOUT_MS } from './evaluation/code-sandbox.js';

// DSL
export { parseCondition, resolveConditionKind, CONDITION_NAME_LIST } from './dsl/condition/condition-parser.js';
export { loadTestFromYAML, loadTestFromFile, YamlLoadError } from './dsl/yaml/loader.js';
export {
  validateTest,
  validateState,
  YamlValidationError,
  DEFAULT_TEST_TIMEOUT_MS,
  DEFAULT_STATE_TIMEOUT_MS
} from './dsl/yaml/schema.js';
export type { TestConfig, StateConfig } from './dsl/yaml/schema.js';
export { ProtocheckError, ConfigurationError, RuleParseError } from './dsl/helpers/errors.js';

// Actions
export { ActionRegistry, bindActions, hostTemplate, DEFAULT_HOST_TEMPLATE } from './actions/registry.js';
export type { BindOptions } from './actions/registry.js';
export { createDefaultRegistry, BUILTIN_ACTIONS, writeTrigger } from './actions/builtin.js';

// Listeners
export * from './listener/index.js';

// Logging
export {
  createLogger,
  rootLogger,
  silentLogger,
  setLogLevel,
  setNameFilter,
  addLogSink,
  setLogSinks,
  createFileSink,
  consoleSink,
  LOG_LEVELS
} from './logging/logger.js';
export type { Logger, LogLevel, LogEntry, LogSink } from './logging/logger.js';

// Utils
export { AsyncQueue, QueueAbortedError } from './utils/async-queue.js';
export { Deferred } from './utils/deferred.js';
export { generateSeed, seededShuffle } from './utils/random.js';
export { parseDuration, formatDuration } from './utils/duration-parser.js';
