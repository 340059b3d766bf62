import { describe, it, expect, vi } from 'vitest';
import { ContainerEventBus } from '../../../src/core/events.js';

describe('ContainerEventBus', () => {
  it('should deliver typed payloads to listeners', () => {
    const bus = new ContainerEventBus();
    const listener = vi.fn();

    bus.on('phase:changed', listener);
    bus.emit('phase:changed', { from: 'uninitialized', to: 'initializing' });

    expect(listener).toHaveBeenCalledWith({ from: 'uninitialized', to: 'initializing' });
  });

  it('should stop delivering after off', () => {
    const bus = new ContainerEventBus();
    const listener = vi.fn();

    bus.on('operation:started', listener);
    bus.off('operation:started', listener);
    bus.emit('operation:started', { operation: 'reset' });

    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount('operation:started')).toBe(0);
  });

  it('should deliver once listeners a single time', () => {
    const bus = new ContainerEventBus();
    const listener = vi.fn();

    bus.once('prediction:published', listener);
    bus.emit('prediction:published', { prediction: null });
    expect(bus.listenerCount('prediction:published')).toBe(0);

    bus.emit('prediction:published', { prediction: null });
    bus.emit('prediction:published', { prediction: null });

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should isolate a throwing once listener and still remove it', () => {
    const onError = vi.fn();
    const bus = new ContainerEventBus(onError);

    bus.once('event:stored', () => {
      throw new Error('once broke');
    });
    bus.emit('event:stored', { event: { type: 'a', attributes: {}, timestamp: 1, userId: 'u' } });
    bus.emit('event:stored', { event: { type: 'b', attributes: {}, timestamp: 2, userId: 'u' } });

    expect(onError).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount('event:stored')).toBe(0);
  });

  it('should remove a once listener with off before it fires', () => {
    const bus = new ContainerEventBus();
    const listener = vi.fn();

    bus.once('observation:failed', listener);
    bus.off('observation:failed', listener);

    expect(bus.listenerCount('observation:failed')).toBe(0);
  });

  it('should report a throwing listener and keep delivering', () => {
    const onError = vi.fn();
    const bus = new ContainerEventBus(onError);
    const after = vi.fn();

    bus.on('operation:completed', () => {
      throw new Error('listener broke');
    });
    bus.on('operation:completed', after);
    bus.emit('operation:completed', { operation: 'saveState', success: true });

    expect(after).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0]).toBe('operation:completed');
  });

  it('should remove every listener', () => {
    const bus = new ContainerEventBus();
    bus.on('event:stored', vi.fn());
    bus.on('event:ignored', vi.fn());

    bus.removeAllListeners();

    expect(bus.listenerCount('event:stored')).toBe(0);
    expect(bus.listenerCount('event:ignored')).toBe(0);
  });
});
