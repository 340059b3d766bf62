import { describe, it, expect } from 'vitest';
import { DslInstructionParser } from '../../../src/instructions/parser.js';
import { InstructionParseError } from '../../../src/core/errors.js';

describe('DslInstructionParser', () => {
  const parser = new DslInstructionParser();

  it('should parse ignore and min-confidence lines', () => {
    const result = parser.parse([
      'ignore noise',
      'min-confidence 0.6',
    ].join('\n'));

    expect(result).toEqual([
      { kind: 'ignore-event-type', type: 'noise' },
      { kind: 'min-confidence', threshold: 0.6 },
    ]);
  });

  it('should skip comments and blank lines', () => {
    const result = parser.parse('# rules\n\n   \nignore heartbeat\r\n');
    expect(result).toEqual([{ kind: 'ignore-event-type', type: 'heartbeat' }]);
  });

  it('should unquote event types containing spaces', () => {
    expect(parser.parse('ignore "window focus"')).toEqual([
      { kind: 'ignore-event-type', type: 'window focus' },
    ]);
    expect(parser.parse("ignore 'tab switch'")).toEqual([
      { kind: 'ignore-event-type', type: 'tab switch' },
    ]);
  });

  it('should accept keywords in any case', () => {
    expect(parser.parse('IGNORE noise')).toEqual([{ kind: 'ignore-event-type', type: 'noise' }]);
  });

  it('should return an empty list for empty input', () => {
    expect(parser.parse('')).toEqual([]);
  });

  // ── Errors ──

  it('should reject ignore without a type', () => {
    expect(() => parser.parse('ignore')).toThrow('Line 1: "ignore" needs an event type');
  });

  it('should reject thresholds outside 0..1', () => {
    expect(() => parser.parse('min-confidence 1.5'))
      .toThrow('Line 1: "min-confidence" needs a number between 0 and 1, got "1.5"');
    expect(() => parser.parse('min-confidence high'))
      .toThrow('"min-confidence" needs a number between 0 and 1, got "high"');
    expect(() => parser.parse('min-confidence'))
      .toThrow('got ""');
  });

  it('should report unknown keywords with their line number', () => {
    try {
      parser.parse('ignore noise\n\nSkip clicks');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InstructionParseError);
      if (err instanceof InstructionParseError) {
        expect(err.line).toBe(3);
        expect(err.message).toBe('Line 3: Unknown instruction "skip"');
      }
    }
  });
});
