import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ClassificationDataSource } from '../classification.datasource.js';
import { MemoryEventStore } from '../../events/events.store.js';
import type { EventProperties } from '../../events/events.types.js';

const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('ClassificationDataSource', () => {
  let store: MemoryEventStore;
  let minute = 0;

  async function setUser(entityId: string, properties: EventProperties, appName = 'App1') {
    await store.insert(appName, {
      event: '$set',
      entityType: 'user',
      entityId,
      properties,
      eventTime: new Date(Date.UTC(2024, 0, 1, 0, ++minute)),
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MemoryEventStore();
    minute = 0;
  });

  it('builds labeled points from users with a plan and all attributes', async () => {
    await setUser('u1', { plan: 0, attr0: 2, attr1: 0, attr2: 0 });
    await setUser('u2', { plan: 1, attr0: 0 });
    await setUser('u2', { attr1: 3, attr2: 1 });
    await setUser('u3', { plan: 1, attr0: 1, attr1: 1 });
    await setUser('u4', { plan: 0, attr0: 9, attr1: 9, attr2: 9 }, 'OtherApp');

    const ds = new ClassificationDataSource({ appName: 'App1' }, store, logger);
    const td = await ds.readTraining();

    expect(td.labeledPoints).toEqual([
      { label: 0, features: [2, 0, 0] },
      { label: 1, features: [0, 3, 1] },
    ]);
  });

  it('logs the entity and rethrows when a property is not numeric', async () => {
    await setUser('u1', { plan: 0, attr0: 2, attr1: 0, attr2: 0 });
    await setUser('u2', { plan: 'premium', attr0: 1, attr1: 1, attr2: 1 });

    const ds = new ClassificationDataSource({ appName: 'App1' }, store, logger);

    await expect(ds.readTraining()).rejects.toThrow('Property plan is not a number: "premium"');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ entityId: 'u2' }),
      'Failed to get properties {"plan":"premium","attr0":1,"attr1":1,"attr2":1} of u2'
    );
  });

  it('splits evaluation folds by position', async () => {
    await setUser('u1', { plan: 0, attr0: 1, attr1: 0, attr2: 0 });
    await setUser('u2', { plan: 1, attr0: 0, attr1: 1, attr2: 0 });
    await setUser('u3', { plan: 0, attr0: 2, attr1: 0, attr2: 0 });
    await setUser('u4', { plan: 1, attr0: 0, attr1: 2, attr2: 0 });

    const ds = new ClassificationDataSource({ appName: 'App1', evalK: 2 }, store, logger);
    const folds = await ds.readEval();

    expect(folds).toHaveLength(2);
    expect(folds[0].trainingData.labeledPoints).toEqual([
      { label: 1, features: [0, 1, 0] },
      { label: 1, features: [0, 2, 0] },
    ]);
    expect(folds[0].qa).toEqual([
      [{ features: [1, 0, 0] }, { label: 0 }],
      [{ features: [2, 0, 0] }, { label: 0 }],
    ]);
    expect(folds[1].qa.map(([, actual]) => actual.label)).toEqual([1, 1]);
  });

  it('needs evalK to read evaluation data', async () => {
    const ds = new ClassificationDataSource({ appName: 'App1' }, store, logger);

    await expect(ds.readEval()).rejects.toThrow('datasource.params.evalK must be set to read evaluation data');
  });
});
