/**
 * ENGINE — Instance storage
 *
 * One document per training run. Status moves INIT → COMPLETED or
 * INIT → FAILED; deployments pick the latest COMPLETED run.
 */

import mongoose, { Schema, type Model } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import type { EngineParams } from './engine.params.js';

export type EngineInstanceStatus = 'INIT' | 'COMPLETED' | 'FAILED';

export interface EngineInstance {
  id: string;
  status: EngineInstanceStatus;
  startTime: Date;
  endTime?: Date;
  engineFactory: string;
  engineVariant: string;
  params: EngineParams;
  models: unknown[];
  error?: string;
}

export type EngineInstanceUpdate = Partial<Pick<EngineInstance, 'status' | 'endTime' | 'models' | 'error'>>;

export interface EngineInstanceStore {
  insert(instance: Omit<EngineInstance, 'id'>): Promise<string>;
  update(id: string, update: EngineInstanceUpdate): Promise<void>;
  get(id: string): Promise<EngineInstance | null>;
  getLatestCompleted(engineFactory: string, engineVariant: string): Promise<EngineInstance | null>;
}

// ═══════════════════════════════════════════════════════════════
// MONGODB
// ═══════════════════════════════════════════════════════════════

const EngineInstanceSchema = new Schema<EngineInstance>(
  {
    id: { type: String, required: true, unique: true },
    status: { type: String, enum: ['INIT', 'COMPLETED', 'FAILED'], required: true },
    startTime: { type: Date, required: true },
    endTime: { type: Date },
    engineFactory: { type: String, required: true },
    engineVariant: { type: String, required: true },
    params: { type: Schema.Types.Mixed, required: true },
    models: { type: [Schema.Types.Mixed], default: [] },
    error: { type: String },
  },
  {
    collection: 'engine_instances',
    minimize: false,
  }
);

export const EngineInstanceModel: Model<EngineInstance> =
  mongoose.models.EngineInstance || mongoose.model<EngineInstance>('EngineInstance', EngineInstanceSchema);

export class MongoEngineInstanceStore implements EngineInstanceStore {
  async insert(instance: Omit<EngineInstance, 'id'>): Promise<string> {
    const id = uuidv4();
    await EngineInstanceModel.create({ ...instance, id });
    return id;
  }

  async update(id: string, update: EngineInstanceUpdate): Promise<void> {
    await EngineInstanceModel.updateOne({ id }, { $set: update }).exec();
  }

  async get(id: string): Promise<EngineInstance | null> {
    return EngineInstanceModel.findOne({ id }, { _id: 0, __v: 0 }).lean<EngineInstance>().exec();
  }

  async getLatestCompleted(engineFactory: string, engineVariant: string): Promise<EngineInstance | null> {
    return EngineInstanceModel.findOne(
      { engineFactory, engineVariant, status: 'COMPLETED' },
      { _id: 0, __v: 0 }
    )
      .sort({ startTime: -1 })
      .lean<EngineInstance>()
      .exec();
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class MemoryEngineInstanceStore implements EngineInstanceStore {
  private instances = new Map<string, EngineInstance>();

  async insert(instance: Omit<EngineInstance, 'id'>): Promise<string> {
    const id = uuidv4();
    this.instances.set(id, { ...instance, id });
    return id;
  }

  async update(id: string, update: EngineInstanceUpdate): Promise<void> {
    const current = this.instances.get(id);
    if (current) this.instances.set(id, { ...current, ...update });
  }

  async get(id: string): Promise<EngineInstance | null> {
    return this.instances.get(id) ?? null;
  }

  async getLatestCompleted(engineFactory: string, engineVariant: string): Promise<EngineInstance | null> {
    let latest: EngineInstance | null = null;
    for (const instance of this.instances.values()) {
      if (
        instance.engineFactory !== engineFactory ||
        instance.engineVariant !== engineVariant ||
        instance.status !== 'COMPLETED'
      ) {
        continue;
      }
      if (!latest || instance.startTime.getTime() >= latest.startTime.getTime()) latest = instance;
    }
    return latest;
  }
}
