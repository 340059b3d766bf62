import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// INTERACTIONS
// ═══════════════════════════════════════════════════════════════

export interface InteractionEvent {
  /** Interaction kind, e.g. "git_command" or "button_click" */
  readonly type: string;
  /** Interaction details (metadata, never sensitive content) */
  readonly attributes: Readonly<Record<string, string>>;
  /** Unix timestamp (ms) of the interaction */
  readonly timestamp: number;
  readonly userId: string;
}

export const InteractionEventSchema = z.object({
  type: z.string().min(1),
  attributes: z.record(z.string()).default({}),
  timestamp: z.number().int().nonnegative(),
  userId: z.string().min(1),
});

export type InteractionEventInput = z.input<typeof InteractionEventSchema>;

/**
 * Validate raw input and return a frozen InteractionEvent.
 */
export function createInteractionEvent(input: InteractionEventInput): InteractionEvent {
  const parsed = InteractionEventSchema.parse(input);
  return Object.freeze({
    type: parsed.type,
    attributes: Object.freeze({ ...parsed.attributes }),
    timestamp: parsed.timestamp,
    userId: parsed.userId,
  });
}

// ═══════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════

/**
 * Serialized engine knowledge. The container moves it between engine and
 * storage and never looks inside `payload`.
 */
export interface ContainerState {
  readonly payload: Uint8Array;
  readonly version: number;
}

export function statesEqual(a: ContainerState, b: ContainerState): boolean {
  if (a.version !== b.version) return false;
  if (a.payload.length !== b.payload.length) return false;
  for (let i = 0; i < a.payload.length; i++) {
    if (a.payload[i] !== b.payload[i]) return false;
  }
  return true;
}

// ═══════════════════════════════════════════════════════════════
// PREDICTIONS
// ═══════════════════════════════════════════════════════════════

export interface Prediction {
  suggestion: string;
  /** 0..1 */
  confidence: number;
  /** Prediction kind, e.g. "next_action" */
  category: string;
  metadata?: Record<string, string | number | boolean>;
}

export interface LearningInsights {
  interactionCount: number;
  /** Rough 0..1 estimate of how much the engine has learned */
  progressEstimate: number;
  customMetrics: Record<string, number>;
}

// ═══════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════

export type ContainerPhase =
  | 'uninitialized'
  | 'initializing'
  | 'ready'
  | 'resetting'
  | 'releasing'
  | 'released';

export type LifecycleOperation = 'initialize' | 'reset' | 'saveState' | 'release';
