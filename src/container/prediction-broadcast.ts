/**
 * PredictionBroadcast — fan-out of `Prediction | null` values.
 *
 * No history is replayed: a subscriber only sees values published after it
 * subscribed. Publishing never waits on a subscriber. Each subscription has
 * its own bounded queue, and when a consumer falls behind the oldest queued
 * prediction is dropped.
 */

import { nanoid } from 'nanoid';
import { RingQueue } from '../utils/ring-queue.js';
import type { Prediction } from './types.js';

export type PredictionListener = (prediction: Prediction | null) => void;

export const DEFAULT_SUBSCRIBER_CAPACITY = 32;

export class PredictionSubscription implements AsyncIterable<Prediction | null> {
  readonly id = `sub_${nanoid(8)}`;
  private readonly queue: RingQueue<Prediction | null>;
  private waiter: ((result: IteratorResult<Prediction | null>) => void) | null = null;
  private closed = false;
  private ended = false;
  private droppedCount = 0;

  constructor(
    capacity: number,
    private readonly detach: (subscription: PredictionSubscription) => void,
  ) {
    this.queue = new RingQueue(capacity);
  }

  /** Predictions discarded because this consumer fell behind */
  get dropped(): number {
    return this.droppedCount;
  }

  /** Predictions queued and not yet consumed */
  get buffered(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed || this.ended;
  }

  /** @internal called by the broadcast */
  deliver(prediction: Prediction | null): void {
    if (this.isClosed) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: prediction, done: false });
      return;
    }

    const result = this.queue.push(prediction);
    if (result.evicted) this.droppedCount++;
  }

  /**
   * @internal the broadcast shut down. Already-buffered predictions can
   * still be read, then iteration finishes.
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.settleWaiter();
  }

  /** Stop receiving. Buffered predictions are discarded. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.clear();
    this.detach(this);
    this.settleWaiter();
  }

  next(): Promise<IteratorResult<Prediction | null>> {
    const head = this.queue.shift();
    if (!head.done) {
      return Promise.resolve({ value: head.item, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('PredictionSubscription does not support concurrent next() calls'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Prediction | null> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private settleWaiter(): void {
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }
}

export class PredictionBroadcast {
  private subscriptions = new Set<PredictionSubscription>();
  private listeners = new Set<PredictionListener>();
  private closed = false;
  private publishedCount = 0;

  constructor(
    private readonly defaultCapacity: number = DEFAULT_SUBSCRIBER_CAPACITY,
    private readonly onListenerError?: (error: unknown) => void,
  ) {}

  /**
   * Open a pull-style subscription. On a closed broadcast the subscription
   * is already finished.
   */
  subscribe(capacity: number = this.defaultCapacity): PredictionSubscription {
    const subscription = new PredictionSubscription(capacity, (sub) => {
      this.subscriptions.delete(sub);
    });

    if (this.closed) {
      subscription.end();
    } else {
      this.subscriptions.add(subscription);
    }
    return subscription;
  }

  /**
   * Register a push-style listener. Returns an unsubscribe function.
   */
  onPrediction(listener: PredictionListener): () => void {
    if (this.closed) return () => undefined;
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(prediction: Prediction | null): void {
    if (this.closed) return;
    this.publishedCount++;

    for (const subscription of this.subscriptions) {
      subscription.deliver(prediction);
    }

    for (const listener of this.listeners) {
      try {
        listener(prediction);
      } catch (err) {
        this.onListenerError?.(err);
      }
    }
  }

  /** End every subscription and drop all listeners. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const subscription of this.subscriptions) {
      subscription.end();
    }
    this.subscriptions.clear();
    this.listeners.clear();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get subscriberCount(): number {
    return this.subscriptions.size + this.listeners.size;
  }

  get published(): number {
    return this.publishedCount;
  }
}
