import { describe, it, expect, vi } from 'vitest';
import { EmitterDataSource } from '../../../src/sources/emitter-source.js';
import { TaskScope } from '../../../src/core/scope.js';
import type { InteractionEvent } from '../../../src/container/types.js';
import { interaction } from '../../helpers/fixtures.js';

describe('EmitterDataSource', () => {
  it('should deliver pushed events to the observer', () => {
    const source = new EmitterDataSource();
    const seen: InteractionEvent[] = [];

    source.observe((event) => seen.push(event), new TaskScope());
    const event = interaction('click');
    source.push(event);

    expect(seen).toEqual([event]);
    expect(source.observerCount).toBe(1);
  });

  it('should stop delivering after cancel', async () => {
    const source = new EmitterDataSource();
    const onEvent = vi.fn();

    const handle = source.observe(onEvent, new TaskScope());
    await handle.cancel();
    source.push(interaction('late'));

    expect(onEvent).not.toHaveBeenCalled();
    expect(source.observerCount).toBe(0);
    await expect(handle.completion).resolves.toBeUndefined();
  });

  it('should reject completion when the source fails', async () => {
    const source = new EmitterDataSource();
    const handle = source.observe(vi.fn(), new TaskScope());

    source.fail(new Error('upstream closed'));

    await expect(handle.completion).rejects.toThrow('upstream closed');
    expect(source.observerCount).toBe(0);
    await expect(handle.cancel()).resolves.toBeUndefined();
  });

  it('should end when the scope is cancelled', async () => {
    const source = new EmitterDataSource();
    const scope = new TaskScope();
    const handle = source.observe(vi.fn(), scope);

    scope.cancel();

    await expect(handle.completion).resolves.toBeUndefined();
    expect(source.observerCount).toBe(0);
  });

  it('should not register under an already cancelled scope', async () => {
    const source = new EmitterDataSource();
    const scope = new TaskScope();
    scope.cancel();

    const handle = source.observe(vi.fn(), scope);

    await expect(handle.completion).resolves.toBeUndefined();
    expect(source.observerCount).toBe(0);
  });
});
