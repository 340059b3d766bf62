/**
 * AdaptiveContainer — per-user orchestrator for a learning engine, an
 * interaction store and a live event source.
 *
 * Lifecycle:
 *
 *   uninitialized → initializing → ready ⇄ resetting
 *   (any non-terminal) → releasing → released
 *
 * `initialize`, `reset`, `saveState` and `release` are serialised by a single
 * lifecycle lock. The per-event pipeline runs outside that lock: each event
 * is processed on its own task scheduled through the caller's scope, so a
 * slow training step never stalls the observation of new events.
 */

import type pino from 'pino';
import { nanoid } from 'nanoid';
import {
  ContainerError,
  EngineError,
  InitializationError,
  LifecycleError,
  ObservationError,
  StorageError,
  toError,
  type ErrorStage,
} from '../core/errors.js';
import { ContainerEventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { AsyncMutex } from '../core/mutex.js';
import type { ConcurrencyScope } from '../core/scope.js';
import { InstructionSet } from '../instructions/instruction-set.js';
import type { Instruction } from '../instructions/types.js';
import type {
  DataSource,
  DataStorage,
  LearningEngine,
  ObservationHandle,
} from './capabilities.js';
import {
  DEFAULT_SUBSCRIBER_CAPACITY,
  PredictionBroadcast,
  type PredictionListener,
  type PredictionSubscription,
} from './prediction-broadcast.js';
import type {
  ContainerPhase,
  InteractionEvent,
  LearningInsights,
  LifecycleOperation,
  Prediction,
} from './types.js';

export const DEFAULT_RECENT_WINDOW = 10;

export interface ContainerOptions {
  userId: string;
  engine: LearningEngine;
  storage: DataStorage;
  source: DataSource;
  /** Caller-owned; the container launches tasks in it but never cancels it */
  scope: ConcurrencyScope;
  instructions?: readonly Instruction[];
  /** How many recent interactions feed a prediction */
  recentWindow?: number;
  /** Default queue size for `subscribePredictions()` */
  subscriberCapacity?: number;
  logger?: pino.Logger;
}

export class AdaptiveContainer {
  readonly userId: string;
  readonly events: ContainerEventBus;

  private readonly engine: LearningEngine;
  private readonly storage: DataStorage;
  private readonly source: DataSource;
  private readonly scope: ConcurrencyScope;
  private readonly instructions: InstructionSet;
  private readonly broadcast: PredictionBroadcast;
  private readonly lifecycleLock = new AsyncMutex();
  private readonly logger: pino.Logger;
  private readonly recentWindow: number;

  private currentPhase: ContainerPhase = 'uninitialized';
  private failure: Error | null = null;

  /** Running observation; only touched while holding the lifecycle lock */
  private observation: ObservationHandle | null = null;
  /** Bumped on every start/stop so callbacks from a cancelled observation are dropped */
  private generation = 0;
  /** Per-event tasks and issued training steps that have not settled */
  private inFlight = new Set<Promise<void>>();

  constructor(options: ContainerOptions) {
    this.userId = options.userId;
    this.engine = options.engine;
    this.storage = options.storage;
    this.source = options.source;
    this.scope = options.scope;
    this.instructions = new InstructionSet(options.instructions ?? []);
    this.recentWindow = options.recentWindow ?? DEFAULT_RECENT_WINDOW;
    this.logger = (options.logger ?? getLogger()).child({
      component: 'container',
      userId: options.userId,
    });
    this.events = new ContainerEventBus((event, err) => {
      this.logger.warn({ err, event }, 'Container event listener threw');
    });
    this.broadcast = new PredictionBroadcast(
      options.subscriberCapacity ?? DEFAULT_SUBSCRIBER_CAPACITY,
      (err) => this.logger.warn({ err }, 'Prediction listener threw'),
    );
  }

  // ─────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────

  get phase(): ContainerPhase {
    return this.currentPhase;
  }

  /** Error from the most recent failed `initialize`, cleared on the next attempt */
  get lastError(): Error | null {
    return this.failure;
  }

  /** Per-event work still running */
  get pendingTasks(): number {
    return this.inFlight.size;
  }

  // ─────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /**
   * Prepare storage, restore the engine from saved state and start
   * observing. Fails fast: on error the container returns to
   * `uninitialized` and the failure is available as `lastError`.
   */
  async initialize(): Promise<void> {
    await this.runExclusive('initialize', async () => {
      if (this.currentPhase !== 'uninitialized') {
        throw new LifecycleError('initialize', this.currentPhase, 'a container is initialized only once');
      }

      this.failure = null;
      this.transition('initializing');
      this.logger.info('Initializing');

      let storageOpened = false;
      let engineStarted = false;
      try {
        await this.callStorage('initialize', 'initialize', () => this.storage.initialize());
        storageOpened = true;

        const saved = await this.callStorage('loadState', 'initialize', () =>
          this.storage.loadState(this.userId),
        );
        if (saved) {
          this.logger.info(
            { bytes: saved.payload.length, version: saved.version },
            'Restoring saved state',
          );
        } else {
          this.logger.info('No saved state, engine starts fresh');
        }

        await this.callEngine('initialize', 'initialize', () =>
          this.engine.initialize(saved, this.scope),
        );
        engineStarted = true;
        this.startObservation();
      } catch (err) {
        await this.rollbackInitialize(storageOpened, engineStarted);
        const cause = toError(err);
        const error = new InitializationError(
          `Failed to initialize container for user ${this.userId}: ${cause.message}`,
          cause,
        );
        this.failure = error;
        this.transition('uninitialized');
        this.logger.error({ err: cause }, 'Initialization failed');
        throw error;
      }

      this.transition('ready');
      this.logger.info('Initialization complete');
    });
  }

  /**
   * Stop observing, wait for in-flight events, wipe the engine and the
   * user's stored data, then observe again. When the promise resolves the
   * engine is blank and storage is empty.
   */
  reset(): Promise<void> {
    return this.runExclusive('reset', async () => {
      this.assertPhase('reset', 'ready');
      this.transition('resetting');
      this.logger.info('Resetting');

      try {
        await this.stopObservation();
        await this.callEngine('reset', 'reset', () => this.engine.reset());
        await this.callStorage('deleteUserData', 'reset', () =>
          this.storage.deleteUserData(this.userId),
        );
      } catch (err) {
        this.logger.error({ err }, 'Reset failed, resuming observation');
        this.resumeAfterFailedReset();
        throw err;
      }

      this.startObservation();
      this.transition('ready');
      this.logger.info('Reset complete');
    });
  }

  /**
   * Snapshot the engine into storage. Observation keeps running.
   */
  saveState(): Promise<void> {
    return this.runExclusive('saveState', async () => {
      this.assertPhase('saveState', 'ready');

      const state = await this.callEngine('getCurrentState', 'save', () =>
        this.engine.getCurrentState(),
      );
      await this.callStorage('saveState', 'save', () => this.storage.saveState(this.userId, state));

      this.logger.info({ bytes: state.payload.length, version: state.version }, 'State saved');
    });
  }

  /**
   * Stop observing and release engine and storage. Idempotent. Every
   * release step is attempted; the first failure is rethrown once the
   * container has reached `released`.
   */
  async release(): Promise<void> {
    if (this.currentPhase === 'released') return;

    await this.runExclusive('release', async () => {
      if (this.currentPhase === 'released') return;

      this.transition('releasing');
      this.logger.info('Releasing resources');

      const errors: Error[] = [];
      const attempt = async (step: () => Promise<void>): Promise<void> => {
        try {
          await step();
        } catch (err) {
          errors.push(toError(err));
        }
      };

      await attempt(() => this.stopObservation());
      await attempt(() => this.callEngine('release', 'release', () => this.engine.release()));
      await attempt(() => this.callStorage('release', 'release', () => this.storage.release()));

      this.broadcast.close();
      this.transition('released');

      if (errors.length > 0) {
        this.logger.error({ err: errors[0], failures: errors.length }, 'Release completed with errors');
        throw errors[0];
      }
      this.logger.info('Resources released');
    });
  }

  // ─────────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────────

  /**
   * Predict from the recent interaction window. The result is also
   * published to prediction subscribers. Failures yield `null`.
   */
  async getPrediction(): Promise<Prediction | null> {
    this.assertPhase('getPrediction', 'ready');

    const prediction = await this.predictSafely(this.instructions.snapshot(), 'predict');
    this.publish(prediction);
    return prediction;
  }

  async getLearningInsights(): Promise<LearningInsights> {
    this.assertPhase('getLearningInsights', 'ready');

    const insights = this.engine.getLearningInsights;
    if (!insights) {
      return { interactionCount: 0, progressEstimate: 0, customMetrics: {} };
    }
    return this.callEngine('getLearningInsights', 'predict', () => insights.call(this.engine));
  }

  /**
   * Subscribe to predictions published from now on. When the consumer
   * falls behind by more than `capacity`, the oldest queued prediction is
   * dropped.
   */
  subscribePredictions(capacity?: number): PredictionSubscription {
    return this.broadcast.subscribe(capacity);
  }

  /** Callback form of `subscribePredictions`. Returns an unsubscribe function. */
  onPrediction(listener: PredictionListener): () => void {
    return this.broadcast.onPrediction(listener);
  }

  // ─────────────────────────────────────────────────────────────
  // INSTRUCTIONS
  // ─────────────────────────────────────────────────────────────

  /**
   * Swap the instruction list. Events dispatched from now on see the new
   * list; events already dispatched keep the snapshot they were given.
   */
  updateInstructions(instructions: readonly Instruction[]): void {
    if (this.currentPhase === 'released') {
      throw new LifecycleError('updateInstructions', this.currentPhase);
    }
    this.instructions.replace(instructions);
    this.logger.info({ count: instructions.length }, 'Instructions updated');
  }

  getInstructions(): readonly Instruction[] {
    return this.instructions.snapshot();
  }

  // ─────────────────────────────────────────────────────────────
  // OBSERVATION (lifecycle lock held)
  // ─────────────────────────────────────────────────────────────

  private startObservation(): void {
    const generation = ++this.generation;

    let handle: ObservationHandle;
    try {
      handle = this.source.observe((event) => this.dispatch(event, generation), this.scope);
    } catch (err) {
      throw new ObservationError('Failed to start observing interactions', toError(err));
    }
    this.observation = handle;

    void handle.completion.then(
      () => {
        this.logger.debug({ generation }, 'Observation ended');
      },
      (err: unknown) => {
        if (generation !== this.generation) return;
        const error = new ObservationError('Interaction stream failed', toError(err));
        this.logger.error({ err: error.cause }, 'Observation stopped after stream failure');
        this.events.emit('observation:failed', { error });
      },
    );

    this.logger.debug({ generation }, 'Observation started');
  }

  private async stopObservation(): Promise<void> {
    const handle = this.observation;
    this.observation = null;
    this.generation++;

    if (handle) {
      try {
        await handle.cancel();
      } catch (err) {
        throw new ObservationError('Failed to stop observing interactions', toError(err));
      }
    }

    await this.drainInFlight();
  }

  /**
   * Called when reset could not finish. Observation is restarted so the
   * container stays usable; a failure here is logged, not thrown, so that
   * the reset error reaches the caller.
   */
  private resumeAfterFailedReset(): void {
    if (!this.observation) {
      try {
        this.startObservation();
      } catch (err) {
        this.logger.error({ err }, 'Could not resume observation after failed reset');
      }
    }
    this.transition('ready');
  }

  private async drainInFlight(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // EVENT PIPELINE
  // ─────────────────────────────────────────────────────────────

  private dispatch(event: InteractionEvent, generation: number): void {
    if (generation !== this.generation) {
      this.logger.debug({ type: event.type }, 'Dropping event from stopped observation');
      return;
    }

    // Rules are fixed at dispatch time
    const instructions = this.instructions.snapshot();
    const taskId = nanoid(8);
    this.track(this.scope.launch(() => this.processEvent(event, instructions, taskId)));
  }

  private async processEvent(
    event: InteractionEvent,
    instructions: readonly Instruction[],
    taskId: string,
  ): Promise<void> {
    if (InstructionSet.shouldIgnore(instructions, event)) {
      this.logger.debug({ taskId, type: event.type }, 'Ignoring event by instruction');
      this.events.emit('event:ignored', { event });
      return;
    }

    try {
      await this.storage.saveInteraction(event);
    } catch (err) {
      this.reportEventFailure(
        event,
        new StorageError('Failed to store interaction', 'saveInteraction', 'process', toError(err)),
        taskId,
      );
      return;
    }
    this.events.emit('event:stored', { event });

    let training: Promise<void>;
    try {
      training = this.engine.trainStep(event);
    } catch (err) {
      this.reportEventFailure(
        event,
        new EngineError('Failed to issue training step', 'trainStep', 'process', toError(err)),
        taskId,
      );
      return;
    }
    // Not awaited: ingestion continues while the engine trains
    this.track(
      training.catch((err: unknown) => {
        this.reportEventFailure(
          event,
          new EngineError('Training step failed', 'trainStep', 'process', toError(err)),
          taskId,
        );
      }),
    );

    const prediction = await this.predictSafely(instructions, 'process');
    this.publish(prediction);
  }

  private async predictSafely(
    instructions: readonly Instruction[],
    stage: ErrorStage,
  ): Promise<Prediction | null> {
    let recent: InteractionEvent[];
    try {
      recent = await this.storage.loadRecent(this.userId, this.recentWindow);
    } catch (err) {
      this.logger.warn(
        { err: new StorageError('Failed to load recent interactions', 'loadRecent', stage, toError(err)) },
        'Prediction unavailable',
      );
      return null;
    }

    try {
      return await this.engine.predict(recent, instructions);
    } catch (err) {
      this.logger.warn(
        { err: new EngineError('Prediction failed', 'predict', stage, toError(err)) },
        'Prediction unavailable',
      );
      return null;
    }
  }

  private publish(prediction: Prediction | null): void {
    this.broadcast.publish(prediction);
    this.events.emit('prediction:published', { prediction });
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.then(
      () => {
        this.inFlight.delete(task);
      },
      (err: unknown) => {
        this.inFlight.delete(task);
        this.logger.error({ err }, 'Unexpected failure in event task');
      },
    );
  }

  private reportEventFailure(event: InteractionEvent, error: ContainerError, taskId: string): void {
    this.logger.warn({ err: error, taskId, type: event.type }, error.message);
    this.events.emit('event:failed', { event, error });
  }

  // ─────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────

  private async runExclusive<T>(operation: LifecycleOperation, fn: () => Promise<T>): Promise<T> {
    return this.lifecycleLock.withLock(async () => {
      this.events.emit('operation:started', { operation });
      let success = false;
      try {
        const result = await fn();
        success = true;
        return result;
      } finally {
        this.events.emit('operation:completed', { operation, success });
      }
    });
  }

  /** Release what a failed `initialize` had already set up. */
  private async rollbackInitialize(storageOpened: boolean, engineStarted: boolean): Promise<void> {
    if (engineStarted) {
      try {
        await this.engine.release();
      } catch (err) {
        this.logger.warn({ err: toError(err) }, 'Engine release after failed initialize failed');
      }
    }
    if (storageOpened) {
      try {
        await this.storage.release();
      } catch (err) {
        this.logger.warn({ err: toError(err) }, 'Storage release after failed initialize failed');
      }
    }
  }

  private assertPhase(operation: string, expected: ContainerPhase): void {
    if (this.currentPhase !== expected) {
      throw new LifecycleError(operation, this.currentPhase);
    }
  }

  private transition(to: ContainerPhase): void {
    const from = this.currentPhase;
    if (from === to) return;
    this.currentPhase = to;
    this.logger.debug({ from, to }, 'Phase changed');
    this.events.emit('phase:changed', { from, to });
  }

  private async callStorage<T>(operation: string, stage: ErrorStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ContainerError) throw err;
      const cause = toError(err);
      throw new StorageError(`Storage ${operation} failed: ${cause.message}`, operation, stage, cause);
    }
  }

  private async callEngine<T>(operation: string, stage: ErrorStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ContainerError) throw err;
      const cause = toError(err);
      throw new EngineError(`Engine ${operation} failed: ${cause.message}`, operation, stage, cause);
    }
  }
}
