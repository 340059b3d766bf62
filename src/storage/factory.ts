import { isAbsolute, resolve } from 'path';
import type { DataStorage } from '../container/capabilities.js';
import type { ContainerConfig } from '../core/types.js';
import { InMemoryDataStorage } from './memory-storage.js';
import { SqliteDataStorage } from './sqlite-storage.js';

/**
 * Build the storage named by the configuration. Relative SQLite paths are
 * resolved against `projectDir`.
 */
export function createStorage(config: Pick<ContainerConfig, 'storage'>, projectDir: string): DataStorage {
  switch (config.storage.driver) {
    case 'memory':
      return new InMemoryDataStorage();
    case 'sqlite': {
      const path = config.storage.path;
      if (path === ':memory:' || isAbsolute(path)) {
        return new SqliteDataStorage(path);
      }
      return new SqliteDataStorage(resolve(projectDir, path));
    }
  }
}
