import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseInteractionLine, readInteractions } from '../../../src/sources/jsonl.js';
import type { InteractionEvent } from '../../../src/container/types.js';

describe('parseInteractionLine', () => {
  it('should parse a complete record', () => {
    const event = parseInteractionLine(
      '{"type":"git_command","attributes":{"cmd":"status"},"timestamp":42,"userId":"alice"}',
      'fallback',
    );

    expect(event).toEqual({
      type: 'git_command',
      attributes: { cmd: 'status' },
      timestamp: 42,
      userId: 'alice',
    });
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('should fill in user, timestamp and attributes', () => {
    expect(parseInteractionLine('{"type":"click"}', 'bob', 1000)).toEqual({
      type: 'click',
      attributes: {},
      timestamp: 1000,
      userId: 'bob',
    });
  });

  it('should reject malformed JSON', () => {
    expect(() => parseInteractionLine('{type', 'bob')).toThrow('Interaction record is not valid JSON');
  });

  it('should reject records without a type', () => {
    expect(() => parseInteractionLine('{"attributes":{}}', 'bob')).toThrow(/^Invalid interaction record: type:/);
  });

  it('should reject non-string attribute values', () => {
    expect(() => parseInteractionLine('{"type":"x","attributes":{"n":1}}', 'bob'))
      .toThrow(/attributes\.n/);
  });
});

describe('readInteractions', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'adaptive-jsonl-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function collect(path: string): Promise<InteractionEvent[]> {
    const events: InteractionEvent[] = [];
    for await (const event of readInteractions(path, 'carol')) {
      events.push(event);
    }
    return events;
  }

  it('should stream records and skip blanks and comments', async () => {
    const path = join(dir, 'events.jsonl');
    writeFileSync(path, [
      '# session 1',
      '{"type":"open","timestamp":1}',
      '',
      '{"type":"edit","timestamp":2,"userId":"dave"}',
    ].join('\n'));

    const events = await collect(path);

    expect(events).toEqual([
      { type: 'open', attributes: {}, timestamp: 1, userId: 'carol' },
      { type: 'edit', attributes: {}, timestamp: 2, userId: 'dave' },
    ]);
  });

  it('should report the file and line of a bad record', async () => {
    const path = join(dir, 'bad.jsonl');
    writeFileSync(path, '{"type":"ok","timestamp":1}\n\nnot json\n');

    await expect(collect(path)).rejects.toThrow(`${path}:3: Interaction record is not valid JSON`);
  });
});
