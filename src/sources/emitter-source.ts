import { EventEmitter } from 'node:events';
import type {
  DataSource,
  InteractionListener,
  ObservationHandle,
} from '../container/capabilities.js';
import type { InteractionEvent } from '../container/types.js';
import type { ConcurrencyScope } from '../core/scope.js';

/**
 * Push-based DataSource: the host application calls `push()` whenever the
 * user does something, and every active observation receives the event
 * synchronously. `fail()` ends all observations with an error, the way a
 * broken upstream stream would.
 */
export class EmitterDataSource implements DataSource {
  private emitter = new EventEmitter();

  observe(onEvent: InteractionListener, scope: ConcurrencyScope): ObservationHandle {
    let resolveCompletion: () => void = () => undefined;
    let rejectCompletion: (error: Error) => void = () => undefined;
    const completion = new Promise<void>((resolve, reject) => {
      resolveCompletion = resolve;
      rejectCompletion = reject;
    });

    let active = true;
    const stop = (error?: Error): void => {
      if (!active) return;
      active = false;
      this.emitter.off('interaction', onEvent);
      this.emitter.off('failure', onFailure);
      scope.signal.removeEventListener('abort', onAbort);
      if (error) rejectCompletion(error);
      else resolveCompletion();
    };
    const onFailure = (error: Error): void => stop(error);
    const onAbort = (): void => stop();

    this.emitter.on('interaction', onEvent);
    this.emitter.on('failure', onFailure);

    if (scope.signal.aborted) {
      stop();
    } else {
      scope.signal.addEventListener('abort', onAbort, { once: true });
    }

    return {
      completion,
      cancel: async () => {
        stop();
        await completion.catch(() => undefined);
      },
    };
  }

  push(event: InteractionEvent): void {
    this.emitter.emit('interaction', event);
  }

  /** Fail every active observation */
  fail(error: Error): void {
    this.emitter.emit('failure', error);
  }

  get observerCount(): number {
    return this.emitter.listenerCount('interaction');
  }
}
