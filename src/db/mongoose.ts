/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import { env } from '../config/env.js';

export { mongoose };

export async function connectMongo(url: string = env.MONGO_URL): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  console.log('[DB] Connecting to MongoDB...');
  await mongoose.connect(url);
  console.log(`[DB] Connected (${mongoose.connection.name})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected');
}
