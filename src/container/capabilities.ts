/**
 * Capability contracts the container consumes. Implementations live outside
 * the container (see `engines/`, `storage/` and `sources/` for reference ones).
 */

import type { ConcurrencyScope } from '../core/scope.js';
import type { Instruction } from '../instructions/types.js';
import type {
  ContainerState,
  InteractionEvent,
  LearningInsights,
  Prediction,
} from './types.js';

export interface LearningEngine {
  /** Human-readable model name, for diagnostics */
  readonly architecture?: string;

  initialize(savedState: ContainerState | null, scope: ConcurrencyScope): Promise<void>;

  /**
   * Issue one incremental training step. The returned promise settles when
   * training completes; callers are not required to wait for it.
   */
  trainStep(event: InteractionEvent): Promise<void>;

  /** `null` when there is no confident prediction */
  predict(
    recent: readonly InteractionEvent[],
    instructions: readonly Instruction[],
  ): Promise<Prediction | null>;

  getCurrentState(): Promise<ContainerState>;
  reset(): Promise<void>;
  release(): Promise<void>;

  getLearningInsights?(): Promise<LearningInsights>;
}

export interface DataStorage {
  initialize(): Promise<void>;
  saveState(userId: string, state: ContainerState): Promise<void>;
  loadState(userId: string): Promise<ContainerState | null>;
  saveInteraction(event: InteractionEvent): Promise<void>;
  /** Most recent interactions for a user, newest first */
  loadRecent(userId: string, limit: number, type?: string): Promise<InteractionEvent[]>;
  deleteUserData(userId: string): Promise<void>;
  release(): Promise<void>;
}

export type InteractionListener = (event: InteractionEvent) => void;

/**
 * Running observation. `completion` resolves once observation has stopped
 * after a cancel (or the stream ended), and rejects if the stream failed.
 */
export interface ObservationHandle {
  readonly completion: Promise<void>;
  /** Stop observing and wait until no further events will be delivered */
  cancel(): Promise<void>;
}

export interface DataSource {
  observe(onEvent: InteractionListener, scope: ConcurrencyScope): ObservationHandle;
}
