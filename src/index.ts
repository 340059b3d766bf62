/**
 * adaptive-container — per-user adaptive-learning container
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import {
 *   forUser,
 *   createInteractionEvent,
 *   EmitterDataSource,
 *   FrequencyLearningEngine,
 *   SqliteDataStorage,
 * } from 'adaptive-container';
 *
 * const source = new EmitterDataSource();
 * const container = forUser('user-1')
 *   .withLearningEngine(new FrequencyLearningEngine())
 *   .withDataStorage(new SqliteDataStorage('./data.db'))
 *   .withDataSource(source)
 *   .build();
 *
 * await container.initialize();
 * container.onPrediction((p) => console.log(p?.suggestion));
 * source.push(createInteractionEvent({ type: 'open_file', timestamp: Date.now(), userId: 'user-1' }));
 * ```
 */

// Container
export * from './container/index.js';

// Instructions
export * from './instructions/index.js';

// Reference capabilities
export * from './engines/index.js';
export * from './storage/index.js';
export * from './sources/index.js';

// Core
export { ConfigManager } from './core/config.js';
export { ContainerConfigSchema, type ContainerConfig } from './core/types.js';
export { ContainerEventBus, type ContainerEvents } from './core/events.js';
export { AsyncMutex } from './core/mutex.js';
export { TaskScope, type ConcurrencyScope } from './core/scope.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export {
  ContainerError,
  ConfigError,
  LifecycleError,
  InitializationError,
  StorageError,
  EngineError,
  ObservationError,
  InstructionParseError,
  type ErrorStage,
} from './core/errors.js';
export { RingQueue } from './utils/ring-queue.js';
export { NAME, VERSION } from './version.js';
