/**
 * Events in, labels out: the classification engine trained from the
 * event store and queried over HTTP
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { MemoryEventStore } from '../../events/events.store.js';
import { MemoryEngineInstanceStore } from '../../engine/engine.storage.js';
import { EngineService } from '../../engine/engine.service.js';
import { EngineHost } from '../../engine/engine.host.js';
import { parseEngineParams } from '../../engine/engine.params.js';
import { evaluateEngine } from '../../engine/engine.evaluation.js';
import { TrainingError, ValidationError } from '../../../common/errors.js';
import { classificationEngine } from '../classification.engine.js';
import { AccuracyMetric, buildEngineParamsList, parseLambdaList } from '../classification.evaluation.js';
import { NaiveBayesAlgorithm } from '../classification.algorithm.js';
import { ClassificationServing } from '../classification.serving.js';
import type { EngineContext } from '../../engine/engine.contracts.js';

const params = parseEngineParams({
  engineFactory: 'classification',
  datasource: { params: { appName: 'App1' } },
  algorithms: [{ name: 'naive', params: { lambda: 1 } }],
});

const USERS: Array<[string, number, number[]]> = [
  ['u1', 0, [2, 0, 0]],
  ['u2', 0, [1, 0, 0]],
  ['u3', 1, [0, 3, 1]],
];

describe('classification engine', () => {
  let eventStore: MemoryEventStore;
  let ctx: EngineContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    eventStore = new MemoryEventStore();
    ctx = { eventStore, logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() } };

    let minute = 0;
    for (const [entityId, plan, [attr0, attr1, attr2]] of USERS) {
      await eventStore.insert('App1', {
        event: '$set',
        entityType: 'user',
        entityId,
        properties: { plan, attr0, attr1, attr2 },
        eventTime: new Date(Date.UTC(2024, 0, 1, 0, ++minute)),
      });
    }

    const service = new EngineService(classificationEngine, params, new MemoryEngineInstanceStore(), ctx);
    await service.train();
    const host = new EngineHost(service);
    await host.reload();

    app = buildApp({ eventStore, host, logLevel: 'silent' });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers a query with a label', async () => {
    const res = await app.inject({ method: 'POST', url: '/queries.json', payload: { features: [0, 1, 0] } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ label: 1 });
  });

  it('classifies a query resembling the other plan', async () => {
    const res = await app.inject({ method: 'POST', url: '/queries.json', payload: { features: [1, 0, 0] } });

    expect(res.json()).toEqual({ label: 0 });
  });

  it('rejects a query without numeric features', async () => {
    const res = await app.inject({ method: 'POST', url: '/queries.json', payload: { features: ['a'] } });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  it('rejects a query with the wrong number of features', async () => {
    const res = await app.inject({ method: 'POST', url: '/queries.json', payload: { features: [1, 2] } });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('Query has 2 features but the model expects 3');
  });

  it('fails training when no user carries every attribute', async () => {
    const empty = new EngineService(
      classificationEngine,
      parseEngineParams({ ...params, datasource: { params: { appName: 'EmptyApp' } } }),
      new MemoryEngineInstanceStore(),
      ctx
    );

    await expect(empty.train()).rejects.toBeInstanceOf(TrainingError);
  });

  it('rejects invalid algorithm params', async () => {
    const bad = new EngineService(
      classificationEngine,
      parseEngineParams({ ...params, algorithms: [{ name: 'naive', params: { lambda: -1 } }] }),
      new MemoryEngineInstanceStore(),
      ctx
    );

    await expect(bad.train()).rejects.toThrow('Invalid naive params');
  });

  it('rejects a smoothing value of 0', async () => {
    const bad = new EngineService(
      classificationEngine,
      parseEngineParams({ ...params, algorithms: [{ name: 'naive', params: { lambda: 0 } }] }),
      new MemoryEngineInstanceStore(),
      ctx
    );

    await expect(bad.train()).rejects.toThrow('Invalid naive params: naive.lambda');
  });

  it('answers a reload of a corrupted model with a typed error', async () => {
    const instances = new MemoryEngineInstanceStore();
    const id = await instances.insert({
      status: 'COMPLETED',
      startTime: new Date(),
      engineFactory: 'classification',
      engineVariant: 'default',
      params,
      models: [{ labels: [0], pi: [0], theta: [[null]] }],
    });
    const host = new EngineHost(new EngineService(classificationEngine, params, instances, ctx));
    const corrupted = buildApp({ eventStore, host, logLevel: 'silent' });
    await corrupted.ready();

    const res = await corrupted.inject({ method: 'POST', url: '/reload' });
    await corrupted.close();

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      ok: false,
      error: 'MODEL_LOAD_FAILED',
      message:
        `Engine instance ${id} cannot be deployed: Cannot load the model of algorithm naive: ` +
        'Invalid Naive Bayes model: theta.0.0: Expected number, received null',
    });
  });

  it('evaluates candidate smoothing values by accuracy', async () => {
    const paramsList = buildEngineParamsList(params, [1, 10]);
    for (let i = 0; i < 7; i++) {
      await eventStore.insert('App1', {
        event: '$set',
        entityType: 'user',
        entityId: `extra${i}`,
        properties: i % 2 === 0
          ? { plan: 0, attr0: 3, attr1: 0, attr2: 0 }
          : { plan: 1, attr0: 0, attr1: 3, attr2: 1 },
        eventTime: new Date(Date.UTC(2024, 0, 2, 0, i)),
      });
    }

    const result = await evaluateEngine(classificationEngine, paramsList, new AccuracyMetric(), ctx);

    expect(result.metric).toBe('Accuracy');
    expect(result.scores).toHaveLength(2);
    expect(result.scores.map((s) => s.params.datasource.params)).toEqual([
      { appName: 'App1', evalK: 5 },
      { appName: 'App1', evalK: 5 },
    ]);
    expect(result.best.score).toBe(1);
  });
});

describe('buildEngineParamsList', () => {
  it('keeps the loaded variant and evalK and swaps in one algorithm per lambda', () => {
    const base = parseEngineParams({
      id: 'v2',
      engineFactory: 'classification',
      datasource: { params: { appName: 'App1', evalK: 3 } },
      algorithms: [{ name: 'naive', params: { lambda: 1 } }],
    });

    const list = buildEngineParamsList(base, [10, 100]);

    expect(list.map((p) => p.id)).toEqual(['v2', 'v2']);
    expect(list.map((p) => p.datasource.params)).toEqual([
      { appName: 'App1', evalK: 3 },
      { appName: 'App1', evalK: 3 },
    ]);
    expect(list.map((p) => p.algorithms)).toEqual([
      [{ name: 'naive', params: { lambda: 10 } }],
      [{ name: 'naive', params: { lambda: 100 } }],
    ]);
  });
});

describe('parseLambdaList', () => {
  it('parses a comma-separated list', () => {
    expect(parseLambdaList('10, 100,0.5')).toEqual([10, 100, 0.5]);
  });

  it('rejects empty, zero and non-numeric values', () => {
    expect(() => parseLambdaList('')).toThrow(ValidationError);
    expect(() => parseLambdaList('10,,100')).toThrow('Invalid smoothing value "" in "10,,100"');
    expect(() => parseLambdaList('0')).toThrow(ValidationError);
    expect(() => parseLambdaList('ten')).toThrow(ValidationError);
  });
});

describe('NaiveBayesAlgorithm.loadModel', () => {
  it('reports a malformed model as a validation error', () => {
    const algorithm = new NaiveBayesAlgorithm({ lambda: 1 });

    expect(() => algorithm.loadModel({ labels: [0], pi: [0], theta: [[null]] })).toThrow(
      new ValidationError('Invalid Naive Bayes model: theta.0.0: Expected number, received null')
    );
  });
});

describe('ClassificationServing', () => {
  it('returns the first prediction', () => {
    expect(new ClassificationServing().serve({ features: [1] }, [{ label: 2 }, { label: 3 }])).toEqual({ label: 2 });
  });

  it('fails without predictions', () => {
    expect(() => new ClassificationServing().serve({ features: [1] }, [])).toThrow('No predictions to serve');
  });
});

describe('AccuracyMetric', () => {
  it('averages exact label matches over all folds', () => {
    const metric = new AccuracyMetric();
    const score = metric.calculate([
      { evalInfo: {}, qpa: [[{ features: [1] }, { label: 1 }, { label: 1 }]] },
      {
        evalInfo: {},
        qpa: [
          [{ features: [1] }, { label: 0 }, { label: 1 }],
          [{ features: [2] }, { label: 2 }, { label: 2 }],
          [{ features: [3] }, { label: 1 }, { label: 1 }],
        ],
      },
    ]);
    expect(score).toBe(0.75);
  });
});

describe('classificationEngine.parseQuery', () => {
  it('requires a non-empty feature list', () => {
    expect(() => classificationEngine.parseQuery({ features: [] })).toThrow(ValidationError);
    expect(classificationEngine.parseQuery({ features: [0.5, 2] })).toEqual({ features: [0.5, 2] });
  });
});
