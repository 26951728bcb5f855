/**
 * Database Indexes
 * Run on startup, after connectMongo()
 */

import { mongoose } from './mongoose.js';
import { errorMessage } from '../common/errors.js';

export async function ensureIndexes(): Promise<void> {
  const db = mongoose.connection.db;
  if (!db) {
    console.log('[DB] No database connection, skipping indexes');
    return;
  }

  try {
    const events = db.collection('events');
    await events.createIndex({ appName: 1, entityType: 1, eventTime: 1 });
    await events.createIndex({ appName: 1, entityType: 1, entityId: 1, eventTime: 1 });
    console.log('[DB] events indexes created');
  } catch (err) {
    console.log('[DB] events indexes already exist or error:', errorMessage(err));
  }

  try {
    const instances = db.collection('engine_instances');
    await instances.createIndex({ engineFactory: 1, engineVariant: 1, status: 1, startTime: -1 });
    console.log('[DB] engine_instances indexes created');
  } catch (err) {
    console.log('[DB] engine_instances indexes already exist or error:', errorMessage(err));
  }

  console.log('[DB] Indexes ensured');
}
