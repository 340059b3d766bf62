import type { DataStorage } from '../container/capabilities.js';
import type { ContainerState, InteractionEvent } from '../container/types.js';
import { StorageError } from '../core/errors.js';

/**
 * Process-local DataStorage. Nothing survives the process; intended for
 * tests, demos and short-lived sessions.
 */
export class InMemoryDataStorage implements DataStorage {
  private states = new Map<string, ContainerState>();
  private interactions = new Map<string, InteractionEvent[]>();
  private open = false;

  async initialize(): Promise<void> {
    this.open = true;
  }

  async saveState(userId: string, state: ContainerState): Promise<void> {
    this.ensureOpen('saveState');
    this.states.set(userId, { payload: new Uint8Array(state.payload), version: state.version });
  }

  async loadState(userId: string): Promise<ContainerState | null> {
    this.ensureOpen('loadState');
    const state = this.states.get(userId);
    return state ? { payload: new Uint8Array(state.payload), version: state.version } : null;
  }

  async saveInteraction(event: InteractionEvent): Promise<void> {
    this.ensureOpen('saveInteraction');
    const history = this.interactions.get(event.userId) ?? [];
    history.push(event);
    this.interactions.set(event.userId, history);
  }

  async loadRecent(userId: string, limit: number, type?: string): Promise<InteractionEvent[]> {
    this.ensureOpen('loadRecent');
    const history = this.interactions.get(userId) ?? [];

    // Newest first; equal timestamps keep reverse insertion order
    return history
      .map((event, index) => ({ event, index }))
      .filter(({ event }) => type === undefined || event.type === type)
      .sort((a, b) => b.event.timestamp - a.event.timestamp || b.index - a.index)
      .slice(0, Math.max(0, limit))
      .map(({ event }) => event);
  }

  async deleteUserData(userId: string): Promise<void> {
    this.ensureOpen('deleteUserData');
    this.states.delete(userId);
    this.interactions.delete(userId);
  }

  async release(): Promise<void> {
    this.open = false;
  }

  /** Stored interaction count for a user */
  interactionCount(userId: string): number {
    return this.interactions.get(userId)?.length ?? 0;
  }

  get isOpen(): boolean {
    return this.open;
  }

  private ensureOpen(operation: string): void {
    if (!this.open) {
      throw new StorageError('Storage is not initialized', operation);
    }
  }
}
