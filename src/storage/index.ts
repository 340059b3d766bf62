export { InMemoryDataStorage } from './memory-storage.js';
export { SqliteDataStorage } from './sqlite-storage.js';
export { createStorage } from './factory.js';
