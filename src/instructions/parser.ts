import { InstructionParseError } from '../core/errors.js';
import type { Instruction, InstructionParser } from './types.js';

/**
 * Line-oriented instruction DSL.
 *
 * ```text
 * # comments and blank lines are skipped
 * ignore noise
 * ignore "window focus"
 * min-confidence 0.6
 * ```
 */
export class DslInstructionParser implements InstructionParser {
  parse(rawInput: string): Instruction[] {
    const instructions: Instruction[] = [];
    const lines = rawInput.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === '' || line.startsWith('#')) continue;
      instructions.push(this.parseLine(line, i + 1));
    }

    return instructions;
  }

  private parseLine(line: string, lineNumber: number): Instruction {
    const match = /^(\S+)\s*(.*)$/.exec(line);
    const keyword = match?.[1].toLowerCase() ?? '';
    const argument = (match?.[2] ?? '').trim();

    switch (keyword) {
      case 'ignore': {
        const type = this.unquote(argument);
        if (type === '') {
          throw new InstructionParseError('"ignore" needs an event type', lineNumber);
        }
        return { kind: 'ignore-event-type', type };
      }

      case 'min-confidence': {
        const threshold = Number(argument);
        if (argument === '' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
          throw new InstructionParseError(
            `"min-confidence" needs a number between 0 and 1, got "${argument}"`,
            lineNumber,
          );
        }
        return { kind: 'min-confidence', threshold };
      }

      default:
        throw new InstructionParseError(`Unknown instruction "${keyword}"`, lineNumber);
    }
  }

  private unquote(value: string): string {
    const quoted = /^"(.*)"$/.exec(value) ?? /^'(.*)'$/.exec(value);
    return quoted ? quoted[1] : value;
  }
}
