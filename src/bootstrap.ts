/**
 * Storage and engine wiring shared by the server and the CLI
 */

import { env, type Env } from './config/env.js';
import { connectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { createConsoleLogger } from './common/logger.js';
import { MemoryEventStore, MongoEventStore, type EventStore } from './modules/events/index.js';
import {
  EngineService,
  MemoryEngineInstanceStore,
  MongoEngineInstanceStore,
  loadEngineParams,
  type EngineContext,
  type EngineInstanceStore,
  type EngineParams,
} from './modules/engine/index.js';
import { classificationEngine } from './modules/classification/index.js';
import { ValidationError } from './common/errors.js';

export interface Stores {
  eventStore: EventStore;
  instanceStore: EngineInstanceStore;
}

export async function createStores(config: Env = env): Promise<Stores> {
  if (config.STORAGE === 'memory') {
    console.log('[Boot] Using in-memory storage');
    return { eventStore: new MemoryEventStore(), instanceStore: new MemoryEngineInstanceStore() };
  }

  await connectMongo(config.MONGO_URL);
  await ensureIndexes();
  return { eventStore: new MongoEventStore(), instanceStore: new MongoEngineInstanceStore() };
}

export function createContext(stores: Stores, tag = 'Engine'): EngineContext {
  return { eventStore: stores.eventStore, logger: createConsoleLogger(tag) };
}

export function readEngineParams(enginePath: string = env.ENGINE_JSON): EngineParams {
  const params = loadEngineParams(enginePath);
  if (params.engineFactory !== classificationEngine.factory) {
    throw new ValidationError(
      `engineFactory "${params.engineFactory}" is not available (expected "${classificationEngine.factory}")`
    );
  }
  return params;
}

export function createEngineService(params: EngineParams, stores: Stores, ctx: EngineContext) {
  return new EngineService(classificationEngine, params, stores.instanceStore, ctx);
}
