export {
  AdaptiveContainer,
  DEFAULT_RECENT_WINDOW,
  type ContainerOptions,
} from './adaptive-container.js';
export { ContainerBuilder, forUser, MAX_USER_ID_LENGTH } from './builder.js';
export {
  PredictionBroadcast,
  PredictionSubscription,
  DEFAULT_SUBSCRIBER_CAPACITY,
  type PredictionListener,
} from './prediction-broadcast.js';
export type {
  DataSource,
  DataStorage,
  InteractionListener,
  LearningEngine,
  ObservationHandle,
} from './capabilities.js';
export {
  InteractionEventSchema,
  createInteractionEvent,
  statesEqual,
  type ContainerPhase,
  type ContainerState,
  type InteractionEvent,
  type InteractionEventInput,
  type LearningInsights,
  type LifecycleOperation,
  type Prediction,
} from './types.js';
