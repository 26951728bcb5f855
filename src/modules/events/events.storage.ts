/**
 * EVENTS — MongoDB Model
 */

import mongoose, { Schema, type Model } from 'mongoose';
import type { StoredEvent } from './events.types.js';

const EventSchema = new Schema<StoredEvent>(
  {
    eventId: { type: String, required: true, unique: true },
    appName: { type: String, required: true, index: true },
    event: { type: String, required: true },
    entityType: { type: String, required: true },
    entityId: { type: String, required: true },
    targetEntityType: { type: String },
    targetEntityId: { type: String },
    properties: { type: Schema.Types.Mixed, default: {} },
    eventTime: { type: Date, required: true },
    creationTime: { type: Date, required: true },
  },
  {
    collection: 'events',
    minimize: false,
  }
);

export const EventModel: Model<StoredEvent> =
  mongoose.models.Event || mongoose.model<StoredEvent>('Event', EventSchema);
