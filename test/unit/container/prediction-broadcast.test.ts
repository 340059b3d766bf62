import { describe, it, expect, vi } from 'vitest';
import { PredictionBroadcast } from '../../../src/container/prediction-broadcast.js';
import type { Prediction } from '../../../src/container/types.js';

function prediction(suggestion: string): Prediction {
  return { suggestion, confidence: 0.5, category: 'test' };
}

describe('PredictionBroadcast', () => {
  it('should not replay values published before subscribing', async () => {
    const broadcast = new PredictionBroadcast();
    broadcast.publish(prediction('early'));

    const sub = broadcast.subscribe();
    broadcast.publish(prediction('late'));

    expect(sub.buffered).toBe(1);
    expect(await sub.next()).toEqual({ value: prediction('late'), done: false });
  });

  it('should deliver null predictions', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe();

    broadcast.publish(null);

    expect(await sub.next()).toEqual({ value: null, done: false });
  });

  it('should resolve a waiting consumer immediately', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe();

    const pending = sub.next();
    broadcast.publish(prediction('now'));

    expect(await pending).toEqual({ value: prediction('now'), done: false });
    expect(sub.buffered).toBe(0);
  });

  it('should drop the oldest value for a slow consumer', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe(2);

    broadcast.publish(prediction('1'));
    broadcast.publish(prediction('2'));
    broadcast.publish(prediction('3'));

    expect(sub.dropped).toBe(1);
    expect((await sub.next()).value).toEqual(prediction('2'));
    expect((await sub.next()).value).toEqual(prediction('3'));
  });

  it('should reject concurrent next calls', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe();

    const first = sub.next();
    await expect(sub.next()).rejects.toThrow('does not support concurrent next()');

    sub.close();
    expect(await first).toEqual({ value: undefined, done: true });
  });

  it('should iterate with for await until the broadcast closes', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe();

    broadcast.publish(prediction('a'));
    broadcast.publish(prediction('b'));
    broadcast.close();

    const seen: (string | undefined)[] = [];
    for await (const value of sub) {
      seen.push(value?.suggestion);
    }
    expect(seen).toEqual(['a', 'b']);
  });

  it('should detach on close and discard buffered values', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe();
    broadcast.publish(prediction('a'));

    sub.close();
    broadcast.publish(prediction('b'));

    expect(sub.isClosed).toBe(true);
    expect(broadcast.subscriberCount).toBe(0);
    expect(await sub.next()).toEqual({ value: undefined, done: true });
  });

  it('should close the subscription when iteration breaks early', async () => {
    const broadcast = new PredictionBroadcast();
    const sub = broadcast.subscribe();
    broadcast.publish(prediction('a'));
    broadcast.publish(prediction('b'));

    for await (const value of sub) {
      expect(value?.suggestion).toBe('a');
      break;
    }

    expect(sub.isClosed).toBe(true);
    expect(broadcast.subscriberCount).toBe(0);
  });

  // ── Listeners ──

  it('should push to callback listeners until unsubscribed', () => {
    const broadcast = new PredictionBroadcast();
    const listener = vi.fn();

    const unsubscribe = broadcast.onPrediction(listener);
    broadcast.publish(prediction('a'));
    unsubscribe();
    broadcast.publish(prediction('b'));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(prediction('a'));
  });

  it('should report throwing listeners without stopping delivery', () => {
    const onError = vi.fn();
    const broadcast = new PredictionBroadcast(8, onError);
    const healthy = vi.fn();

    broadcast.onPrediction(() => {
      throw new Error('bad listener');
    });
    broadcast.onPrediction(healthy);
    broadcast.publish(null);

    expect(healthy).toHaveBeenCalledWith(null);
    expect(onError).toHaveBeenCalledTimes(1);
  });

  // ── Close ──

  it('should ignore publishes after close', () => {
    const broadcast = new PredictionBroadcast();
    const listener = vi.fn();
    broadcast.onPrediction(listener);
    broadcast.publish(null);

    broadcast.close();
    broadcast.close();
    broadcast.publish(null);

    expect(broadcast.isClosed).toBe(true);
    expect(broadcast.published).toBe(1);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should hand out finished subscriptions after close', async () => {
    const broadcast = new PredictionBroadcast();
    broadcast.close();

    const sub = broadcast.subscribe();

    expect(sub.isClosed).toBe(true);
    expect(await sub.next()).toEqual({ value: undefined, done: true });
    expect(broadcast.onPrediction(vi.fn())).toBeTypeOf('function');
    expect(broadcast.subscriberCount).toBe(0);
  });
});
