import type pino from 'pino';
import { ConfigError } from '../core/errors.js';
import { TaskScope, type ConcurrencyScope } from '../core/scope.js';
import type { ContainerConfig } from '../core/types.js';
import type { Instruction } from '../instructions/types.js';
import { AdaptiveContainer } from './adaptive-container.js';
import type { DataSource, DataStorage, LearningEngine } from './capabilities.js';

export const MAX_USER_ID_LENGTH = 255;

/**
 * Start configuring a container for one user.
 *
 * @example
 * ```typescript
 * const container = forUser('user-123')
 *   .withLearningEngine(new FrequencyLearningEngine())
 *   .withDataStorage(new SqliteDataStorage('./data.db'))
 *   .withDataSource(source)
 *   .build();
 *
 * await container.initialize();
 * ```
 */
export function forUser(userId: string): ContainerBuilder {
  if (userId.trim() === '') {
    throw new ConfigError('User ID cannot be blank');
  }
  if (userId.length > MAX_USER_ID_LENGTH) {
    throw new ConfigError(`User ID must be ${MAX_USER_ID_LENGTH} characters or less`);
  }
  return new ContainerBuilder(userId);
}

export class ContainerBuilder {
  private engine: LearningEngine | null = null;
  private storage: DataStorage | null = null;
  private source: DataSource | null = null;
  private scope: ConcurrencyScope | null = null;
  private instructions: readonly Instruction[] = [];
  private recentWindow?: number;
  private subscriberCapacity?: number;
  private logger?: pino.Logger;

  constructor(readonly userId: string) {}

  withLearningEngine(engine: LearningEngine): this {
    this.engine = engine;
    return this;
  }

  withDataStorage(storage: DataStorage): this {
    this.storage = storage;
    return this;
  }

  withDataSource(source: DataSource): this {
    this.source = source;
    return this;
  }

  /** Defaults to a fresh `TaskScope` owned by nobody but the container's caller */
  withScope(scope: ConcurrencyScope): this {
    this.scope = scope;
    return this;
  }

  withInstructions(instructions: readonly Instruction[]): this {
    this.instructions = instructions;
    return this;
  }

  /** Apply the prediction settings of a loaded configuration */
  withConfig(config: Pick<ContainerConfig, 'prediction'>): this {
    this.recentWindow = config.prediction.recentWindow;
    this.subscriberCapacity = config.prediction.subscriberCapacity;
    return this;
  }

  withLogger(logger: pino.Logger): this {
    this.logger = logger;
    return this;
  }

  build(): AdaptiveContainer {
    const missing: string[] = [];
    if (!this.engine) missing.push('learning engine');
    if (!this.storage) missing.push('data storage');
    if (!this.source) missing.push('data source');

    if (!this.engine || !this.storage || !this.source) {
      throw new ConfigError(`Cannot build container for ${this.userId}: missing ${missing.join(', ')}`);
    }

    return new AdaptiveContainer({
      userId: this.userId,
      engine: this.engine,
      storage: this.storage,
      source: this.source,
      scope: this.scope ?? new TaskScope(),
      instructions: this.instructions,
      recentWindow: this.recentWindow,
      subscriberCapacity: this.subscriberCapacity,
      logger: this.logger,
    });
  }
}
