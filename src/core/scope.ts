/**
 * Caller-owned concurrency scope.
 *
 * The container schedules its observation and per-event work through a scope
 * it is handed, and never cancels the scope itself. Only the owner (the code
 * that created the scope) may call `cancel()`.
 */

export interface ConcurrencyScope {
  /** Aborted when the owner cancels the scope */
  readonly signal: AbortSignal;
  /**
   * Schedule `task` as an independent unit of work on a later macrotask.
   * The returned promise settles with the task. A cancelled scope resolves
   * immediately without running the task.
   */
  launch(task: () => Promise<void>): Promise<void>;
}

export class TaskScope implements ConcurrencyScope {
  private readonly controller = new AbortController();
  private readonly active = new Set<Promise<void>>();

  constructor(parent?: AbortSignal) {
    if (parent) {
      if (parent.aborted) {
        this.controller.abort(parent.reason);
      } else {
        parent.addEventListener('abort', () => this.cancel(parent.reason), { once: true });
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Number of launched tasks that have not settled yet */
  get pending(): number {
    return this.active.size;
  }

  launch(task: () => Promise<void>): Promise<void> {
    if (this.isCancelled) return Promise.resolve();

    const run = new Promise<void>((resolve) => setImmediate(resolve)).then(() => {
      if (this.isCancelled) return;
      return task();
    });

    this.active.add(run);
    const forget = (): void => {
      this.active.delete(run);
    };
    run.then(forget, forget);
    return run;
  }

  /** Wait until every task launched so far has settled. */
  async idle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.allSettled([...this.active]);
    }
  }

  cancel(reason?: unknown): void {
    if (!this.isCancelled) {
      this.controller.abort(reason);
    }
  }
}
