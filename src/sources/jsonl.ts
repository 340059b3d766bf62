import { createReadStream } from 'fs';
import { createInterface } from 'readline';
import { InteractionEventSchema, createInteractionEvent, type InteractionEvent } from '../container/types.js';
import { ContainerError, toError } from '../core/errors.js';

/** A recorded line may omit the user and the timestamp */
const RecordedInteractionSchema = InteractionEventSchema.extend({
  userId: InteractionEventSchema.shape.userId.optional(),
  timestamp: InteractionEventSchema.shape.timestamp.optional(),
});

/**
 * Parse one JSONL record. Missing `userId` falls back to `defaultUserId`;
 * missing `timestamp` to `now`.
 */
export function parseInteractionLine(
  line: string,
  defaultUserId: string,
  now: number = Date.now(),
): InteractionEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new ContainerError('Interaction record is not valid JSON', 'INVALID_INTERACTION', 'observe', toError(err));
  }

  const parsed = RecordedInteractionSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ContainerError(`Invalid interaction record: ${detail}`, 'INVALID_INTERACTION', 'observe', parsed.error);
  }

  return createInteractionEvent({
    type: parsed.data.type,
    attributes: parsed.data.attributes,
    timestamp: parsed.data.timestamp ?? now,
    userId: parsed.data.userId ?? defaultUserId,
  });
}

/**
 * Stream interactions from a JSON-lines file. Blank lines and lines
 * starting with `#` are skipped.
 */
export async function* readInteractions(
  path: string,
  defaultUserId: string,
): AsyncGenerator<InteractionEvent> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      const trimmed = line.trim();
      if (trimmed === '' || trimmed.startsWith('#')) continue;

      try {
        yield parseInteractionLine(trimmed, defaultUserId);
      } catch (err) {
        const cause = toError(err);
        throw new ContainerError(`${path}:${lineNumber}: ${cause.message}`, 'INVALID_INTERACTION', 'observe', cause);
      }
    }
  } finally {
    lines.close();
  }
}
