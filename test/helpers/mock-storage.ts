/**
 * InMemoryDataStorage with call recording and failure injection
 */

import type { ContainerState, InteractionEvent } from '../../src/container/types.js';
import { InMemoryDataStorage } from '../../src/storage/memory-storage.js';

export type StorageMethod =
  | 'initialize'
  | 'saveState'
  | 'loadState'
  | 'saveInteraction'
  | 'loadRecent'
  | 'deleteUserData'
  | 'release';

export class RecordingStorage extends InMemoryDataStorage {
  calls: StorageMethod[] = [];
  failOn = new Set<StorageMethod>();

  async initialize(): Promise<void> {
    this.record('initialize');
    return super.initialize();
  }

  async saveState(userId: string, state: ContainerState): Promise<void> {
    this.record('saveState');
    return super.saveState(userId, state);
  }

  async loadState(userId: string): Promise<ContainerState | null> {
    this.record('loadState');
    return super.loadState(userId);
  }

  async saveInteraction(event: InteractionEvent): Promise<void> {
    this.record('saveInteraction');
    return super.saveInteraction(event);
  }

  async loadRecent(userId: string, limit: number, type?: string): Promise<InteractionEvent[]> {
    this.record('loadRecent');
    return super.loadRecent(userId, limit, type);
  }

  async deleteUserData(userId: string): Promise<void> {
    this.record('deleteUserData');
    return super.deleteUserData(userId);
  }

  async release(): Promise<void> {
    this.record('release');
    return super.release();
  }

  count(method: StorageMethod): number {
    return this.calls.filter((c) => c === method).length;
  }

  private record(method: StorageMethod): void {
    this.calls.push(method);
    if (this.failOn.has(method)) {
      throw new Error(`${method} boom`);
    }
  }
}
