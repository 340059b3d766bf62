import type { InteractionEvent } from '../container/types.js';
import { InstructionParseError } from '../core/errors.js';
import { InstructionSchema, type Instruction } from './types.js';

/**
 * Atomically replaceable list of behavioural rules.
 *
 * Readers take a snapshot; writers swap the whole list in one assignment.
 * A snapshot never changes after it is taken, so an event keeps the rules
 * that were current when it was dispatched.
 */
export class InstructionSet {
  private current: readonly Instruction[];

  constructor(initial: readonly Instruction[] = []) {
    this.current = InstructionSet.freeze(initial);
  }

  snapshot(): readonly Instruction[] {
    return this.current;
  }

  replace(next: readonly Instruction[]): void {
    this.current = InstructionSet.freeze(next);
  }

  get size(): number {
    return this.current.length;
  }

  /** Whether any ignore rule in `snapshot` matches the event's type */
  static shouldIgnore(snapshot: readonly Instruction[], event: InteractionEvent): boolean {
    return snapshot.some((rule) => rule.kind === 'ignore-event-type' && rule.type === event.type);
  }

  /** Highest min-confidence threshold in `snapshot`, or 0 */
  static confidenceFloor(snapshot: readonly Instruction[]): number {
    let floor = 0;
    for (const rule of snapshot) {
      if (rule.kind === 'min-confidence' && rule.threshold > floor) {
        floor = rule.threshold;
      }
    }
    return floor;
  }

  static ignoredTypes(snapshot: readonly Instruction[]): Set<string> {
    const types = new Set<string>();
    for (const rule of snapshot) {
      if (rule.kind === 'ignore-event-type') types.add(rule.type);
    }
    return types;
  }

  /**
   * Validate and deep-freeze. Rejects the whole list if any rule is invalid,
   * reporting the 1-based position of the first bad rule.
   */
  private static freeze(list: readonly Instruction[]): readonly Instruction[] {
    return Object.freeze(
      list.map((rule, index) => {
        const parsed = InstructionSchema.safeParse(rule);
        if (!parsed.success) {
          throw new InstructionParseError(
            `Invalid instruction: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
            index + 1,
          );
        }
        return Object.freeze(parsed.data);
      }),
    );
  }
}
