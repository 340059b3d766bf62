import type {
  DataSource,
  InteractionListener,
  ObservationHandle,
} from '../container/capabilities.js';
import type { InteractionEvent } from '../container/types.js';
import type { ConcurrencyScope } from '../core/scope.js';

export type InteractionStreamFactory = () => AsyncIterable<InteractionEvent>;

const STOPPED = Symbol('stopped');

/**
 * Pull-based DataSource: each observation opens a fresh stream from the
 * factory and drains it on a long-lived task until the stream ends, the
 * observation is cancelled, or the scope is cancelled.
 */
export class IterableDataSource implements DataSource {
  constructor(private readonly open: InteractionStreamFactory) {}

  observe(onEvent: InteractionListener, scope: ConcurrencyScope): ObservationHandle {
    const controller = new AbortController();
    const onScopeAbort = (): void => controller.abort();
    scope.signal.addEventListener('abort', onScopeAbort, { once: true });

    const stopped = new Promise<typeof STOPPED>((resolve) => {
      if (controller.signal.aborted) resolve(STOPPED);
      controller.signal.addEventListener('abort', () => resolve(STOPPED), { once: true });
    });

    const drain = async (): Promise<void> => {
      const iterator = this.open()[Symbol.asyncIterator]();
      try {
        while (!controller.signal.aborted) {
          const result = await Promise.race([iterator.next(), stopped]);
          if (result === STOPPED || result.done) break;
          onEvent(result.value);
        }
      } finally {
        scope.signal.removeEventListener('abort', onScopeAbort);
        if (controller.signal.aborted) {
          // Don't wait: a pending next() may never settle
          void iterator.return?.()?.catch(() => undefined);
        }
      }
    };

    if (scope.signal.aborted) controller.abort();
    const completion = drain();

    return {
      completion,
      cancel: async () => {
        controller.abort();
        await completion.catch(() => undefined);
      },
    };
  }
}
