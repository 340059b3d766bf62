import { z } from 'zod';

export interface IgnoreEventTypeInstruction {
  kind: 'ignore-event-type';
  type: string;
}

export interface MinConfidenceInstruction {
  kind: 'min-confidence';
  /** 0..1 */
  threshold: number;
}

export type Instruction = IgnoreEventTypeInstruction | MinConfidenceInstruction;

export const InstructionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ignore-event-type'), type: z.string().min(1) }),
  z.object({ kind: z.literal('min-confidence'), threshold: z.number().min(0).max(1) }),
]);

export function ignoreEventType(type: string): IgnoreEventTypeInstruction {
  return { kind: 'ignore-event-type', type };
}

export function minConfidence(threshold: number): MinConfidenceInstruction {
  return { kind: 'min-confidence', threshold };
}

/**
 * Turns raw user input (a DSL string, a config block, ...) into instructions.
 */
export interface InstructionParser {
  parse(rawInput: string): Instruction[];
}
