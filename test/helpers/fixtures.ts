import { createInteractionEvent, type InteractionEvent } from '../../src/container/types.js';

let clock = 1_000;

/** Interaction with a strictly increasing timestamp */
export function interaction(
  type: string,
  userId = 'user-1',
  attributes: Record<string, string> = {},
): InteractionEvent {
  clock += 1;
  return createInteractionEvent({ type, attributes, timestamp: clock, userId });
}

