/**
 * FrequencyLearningEngine — next-action model built from transition counts.
 *
 * Every trained interaction records a transition from the previously
 * trained type to its own type. A prediction suggests the most frequent
 * successor of the newest interaction in the recent window, with
 * confidence equal to that successor's share of all observed successors.
 *
 * State is serialized as UTF-8 JSON (format version 1).
 */

import type pino from 'pino';
import { z } from 'zod';
import type { LearningEngine } from '../container/capabilities.js';
import type {
  ContainerState,
  InteractionEvent,
  LearningInsights,
  Prediction,
} from '../container/types.js';
import { EngineError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ConcurrencyScope } from '../core/scope.js';
import { InstructionSet } from '../instructions/instruction-set.js';
import type { Instruction } from '../instructions/types.js';

export const FREQUENCY_STATE_VERSION = 1;

/** Interactions after which progressEstimate reports 1 */
const PROGRESS_TARGET = 50;

const CountSchema = z.number().int().nonnegative();

/** Persisted form: maps as entry lists, so type names never become object keys */
const SerializedModelSchema = z.object({
  counts: z.array(z.tuple([z.string(), CountSchema])),
  transitions: z.array(z.tuple([z.string(), z.array(z.tuple([z.string(), CountSchema]))])),
  lastType: z.string().nullable(),
  interactionCount: CountSchema,
});

type SerializedModel = z.infer<typeof SerializedModelSchema>;

interface FrequencyModel {
  counts: Map<string, number>;
  /** previous type -> successor type -> count */
  transitions: Map<string, Map<string, number>>;
  lastType: string | null;
  interactionCount: number;
}

export interface FrequencyEngineOptions {
  /** Successor observations required before predicting (default 1) */
  minObservations?: number;
  logger?: pino.Logger;
}

function emptyModel(): FrequencyModel {
  return { counts: new Map(), transitions: new Map(), lastType: null, interactionCount: 0 };
}

function serialize(model: FrequencyModel): SerializedModel {
  return {
    counts: [...model.counts],
    transitions: [...model.transitions].map(
      ([type, successors]): [string, [string, number][]] => [type, [...successors]],
    ),
    lastType: model.lastType,
    interactionCount: model.interactionCount,
  };
}

function deserialize(data: SerializedModel): FrequencyModel {
  return {
    counts: new Map(data.counts),
    transitions: new Map(
      data.transitions.map(([type, successors]): [string, Map<string, number>] => [type, new Map(successors)]),
    ),
    lastType: data.lastType,
    interactionCount: data.interactionCount,
  };
}

export class FrequencyLearningEngine implements LearningEngine {
  readonly architecture = 'transition-frequency';

  private model: FrequencyModel = emptyModel();
  private scope: ConcurrencyScope | null = null;
  private readonly minObservations: number;
  private readonly logger: pino.Logger;

  constructor(options: FrequencyEngineOptions = {}) {
    this.minObservations = options.minObservations ?? 1;
    this.logger = (options.logger ?? getLogger()).child({ component: 'frequency-engine' });
  }

  get isInitialized(): boolean {
    return this.scope !== null;
  }

  async initialize(savedState: ContainerState | null, scope: ConcurrencyScope): Promise<void> {
    if (this.scope) {
      this.logger.debug('Already initialized');
      return;
    }

    this.model = savedState ? this.restore(savedState) : emptyModel();
    this.scope = scope;
    this.logger.info(
      { interactions: this.model.interactionCount, restored: savedState !== null },
      'Engine initialized',
    );
  }

  trainStep(event: InteractionEvent): Promise<void> {
    const scope = this.scope;
    if (!scope) {
      this.logger.warn('trainStep called before initialization');
      return Promise.resolve();
    }
    return scope.launch(async () => {
      this.learn(event);
    });
  }

  async predict(
    recent: readonly InteractionEvent[],
    instructions: readonly Instruction[],
  ): Promise<Prediction | null> {
    if (!this.scope) return null;

    const latest = recent[0];
    if (!latest) return null;

    const successors = this.model.transitions.get(latest.type);
    if (!successors) return null;

    const ignored = InstructionSet.ignoredTypes(instructions);
    let total = 0;
    let best: string | null = null;
    let bestCount = 0;

    for (const [type, count] of [...successors].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (ignored.has(type)) continue;
      total += count;
      if (count > bestCount) {
        best = type;
        bestCount = count;
      }
    }

    if (best === null || total < this.minObservations) return null;

    const confidence = bestCount / total;
    if (confidence < InstructionSet.confidenceFloor(instructions)) return null;

    return {
      suggestion: best,
      confidence,
      category: 'next_action',
      metadata: { after: latest.type, observations: total },
    };
  }

  async getCurrentState(): Promise<ContainerState> {
    if (!this.scope) {
      throw new EngineError('Engine not initialized', 'getCurrentState', 'save');
    }
    const payload = new TextEncoder().encode(JSON.stringify(serialize(this.model)));
    return { payload, version: FREQUENCY_STATE_VERSION };
  }

  async reset(): Promise<void> {
    this.model = emptyModel();
    this.logger.info('Engine reset');
  }

  async release(): Promise<void> {
    if (!this.scope) return;
    this.scope = null;
    this.logger.info('Engine released');
  }

  async getLearningInsights(): Promise<LearningInsights> {
    let transitions = 0;
    for (const successors of this.model.transitions.values()) {
      transitions += successors.size;
    }

    return {
      interactionCount: this.model.interactionCount,
      progressEstimate: Math.min(1, this.model.interactionCount / PROGRESS_TARGET),
      customMetrics: {
        distinctTypes: this.model.counts.size,
        transitions,
      },
    };
  }

  private learn(event: InteractionEvent): void {
    const model = this.model;
    model.counts.set(event.type, (model.counts.get(event.type) ?? 0) + 1);

    if (model.lastType !== null) {
      const successors = model.transitions.get(model.lastType) ?? new Map<string, number>();
      successors.set(event.type, (successors.get(event.type) ?? 0) + 1);
      model.transitions.set(model.lastType, successors);
    }

    model.lastType = event.type;
    model.interactionCount++;
  }

  /** Decode saved state; anything unreadable starts a fresh model */
  private restore(state: ContainerState): FrequencyModel {
    if (state.version !== FREQUENCY_STATE_VERSION) {
      this.logger.warn({ version: state.version }, 'Unsupported state version, starting fresh');
      return emptyModel();
    }

    try {
      const decoded: unknown = JSON.parse(new TextDecoder().decode(state.payload));
      const parsed = SerializedModelSchema.safeParse(decoded);
      if (parsed.success) return deserialize(parsed.data);
      this.logger.warn({ issues: parsed.error.issues.length }, 'Saved state failed validation, starting fresh');
    } catch (err) {
      this.logger.warn({ err }, 'Saved state is not valid JSON, starting fresh');
    }
    return emptyModel();
  }
}
