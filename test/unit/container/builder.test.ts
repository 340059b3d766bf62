import { describe, it, expect } from 'vitest';
import { forUser, MAX_USER_ID_LENGTH } from '../../../src/container/builder.js';
import { AdaptiveContainer } from '../../../src/container/adaptive-container.js';
import { ConfigError } from '../../../src/core/errors.js';
import { TaskScope } from '../../../src/core/scope.js';
import { EmitterDataSource } from '../../../src/sources/emitter-source.js';
import { ignoreEventType } from '../../../src/instructions/types.js';
import { MockEngine } from '../../helpers/mock-engine.js';
import { RecordingStorage } from '../../helpers/mock-storage.js';

describe('forUser', () => {
  it('should reject blank user ids', () => {
    expect(() => forUser('')).toThrow(ConfigError);
    expect(() => forUser('   ')).toThrow('User ID cannot be blank');
  });

  it('should reject user ids over the length limit', () => {
    expect(() => forUser('u'.repeat(MAX_USER_ID_LENGTH + 1)))
      .toThrow(`User ID must be ${MAX_USER_ID_LENGTH} characters or less`);
    expect(forUser('u'.repeat(MAX_USER_ID_LENGTH)).userId).toHaveLength(MAX_USER_ID_LENGTH);
  });
});

describe('ContainerBuilder', () => {
  it('should build an uninitialized container', () => {
    const container = forUser('user-1')
      .withLearningEngine(new MockEngine())
      .withDataStorage(new RecordingStorage())
      .withDataSource(new EmitterDataSource())
      .withScope(new TaskScope())
      .withInstructions([ignoreEventType('noise')])
      .build();

    expect(container).toBeInstanceOf(AdaptiveContainer);
    expect(container.userId).toBe('user-1');
    expect(container.phase).toBe('uninitialized');
    expect(container.getInstructions()).toEqual([{ kind: 'ignore-event-type', type: 'noise' }]);
  });

  it('should name every missing capability', () => {
    expect(() => forUser('user-1').build())
      .toThrow('Cannot build container for user-1: missing learning engine, data storage, data source');

    expect(() => forUser('user-1').withLearningEngine(new MockEngine()).build())
      .toThrow('missing data storage, data source');
  });

  it('should apply prediction settings from config', async () => {
    const storage = new RecordingStorage();
    const container = forUser('user-1')
      .withLearningEngine(new MockEngine())
      .withDataStorage(storage)
      .withDataSource(new EmitterDataSource())
      .withConfig({ prediction: { recentWindow: 3, subscriberCapacity: 1 } })
      .build();

    await container.initialize();
    const sub = container.subscribePredictions();
    await container.getPrediction();
    await container.getPrediction();

    expect(sub.dropped).toBe(1);
    await container.release();
  });
});
