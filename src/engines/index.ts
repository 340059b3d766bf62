export {
  FrequencyLearningEngine,
  FREQUENCY_STATE_VERSION,
  type FrequencyEngineOptions,
} from './frequency-engine.js';
