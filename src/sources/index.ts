export { EmitterDataSource } from './emitter-source.js';
export { IterableDataSource, type InteractionStreamFactory } from './iterable-source.js';
export { parseInteractionLine, readInteractions } from './jsonl.js';
