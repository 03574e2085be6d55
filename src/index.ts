/**
 * Mindgate — gated multi-stage reasoning pipeline
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createPipeline, InMemoryLessonStore } from 'mindgate';
 *
 * const config = new ConfigManager().load();
 * const pipeline = createPipeline(config, { memory: new InMemoryLessonStore() });
 * const report = await pipeline.run('summarize the history of the printing press');
 * ```
 */

// Core
export { RunContext } from './core/context.js';
export { EventBus } from './core/events.js';
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export { createLogger, getLogger, setLogger, type Logger } from './core/logger.js';
export { AsyncMutex } from './core/mutex.js';
export {
  MindgateError,
  ConfigError,
  ProviderError,
  KnowledgeError,
  MemoryError,
  ExecutorError,
  GateViolationError,
  StageTimeoutError,
  RunCancelledError,
  toError,
  type ProviderFailureKind,
} from './core/errors.js';
export * from './core/types.js';

// Entropy
export * from './entropy/types.js';
export {
  CryptoEntropySource,
  ReplayEntropySource,
  SeededEntropySource,
  createEntropySource,
  mulberry32,
  parseBits,
} from './entropy/entropy-source.js';
export { ModeSelector, describeMode, type ModeProfile, type ModeSelectorOptions } from './entropy/mode-selector.js';

// Simulation
export * from './simulation/types.js';
export { ConsequenceSimulator, forecast, type RiskBreakdown } from './simulation/consequence-simulator.js';
export { checkSimulationGate, type GateCheck } from './simulation/gate.js';

// Stages, pipeline, reflection
export * from './stages/index.js';
export * from './pipeline/index.js';
export * from './reflection/index.js';

// Collaborators
export * from './memory/index.js';
export * from './providers/index.js';
export * from './knowledge/index.js';
export * from './execution/index.js';

export { VERSION, NAME } from './version.js';
