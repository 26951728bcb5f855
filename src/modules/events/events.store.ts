/**
 * Event stores
 *
 * EventStore is what the event routes and data sources depend on.
 * MongoEventStore persists through mongoose; MemoryEventStore backs
 * tests and STORAGE=memory.
 */

import { v4 as uuidv4 } from 'uuid';
import type { FilterQuery } from 'mongoose';
import { EventModel } from './events.storage.js';
import { aggregateProperties } from './events.aggregator.js';
import type {
  AggregateOptions,
  EventInput,
  EventQuery,
  PropertyMap,
  StoredEvent,
} from './events.types.js';

export interface EventStore {
  insert(appName: string, input: EventInput): Promise<string>;
  get(appName: string, eventId: string): Promise<StoredEvent | null>;
  delete(appName: string, eventId: string): Promise<boolean>;
  find(query: EventQuery): Promise<StoredEvent[]>;
  aggregateProperties(
    appName: string,
    entityType: string,
    options?: AggregateOptions
  ): Promise<Map<string, PropertyMap>>;
}

const PROPERTY_EVENTS = ['$set', '$unset', '$delete'];

function toStoredEvent(appName: string, input: EventInput, now: Date): StoredEvent {
  return {
    eventId: uuidv4(),
    appName,
    event: input.event,
    entityType: input.entityType,
    entityId: input.entityId,
    targetEntityType: input.targetEntityType,
    targetEntityId: input.targetEntityId,
    properties: input.properties ?? {},
    eventTime: input.eventTime ?? now,
    creationTime: now,
  };
}

abstract class BaseEventStore implements EventStore {
  abstract insert(appName: string, input: EventInput): Promise<string>;
  abstract get(appName: string, eventId: string): Promise<StoredEvent | null>;
  abstract delete(appName: string, eventId: string): Promise<boolean>;
  abstract find(query: EventQuery): Promise<StoredEvent[]>;

  async aggregateProperties(
    appName: string,
    entityType: string,
    options: AggregateOptions = {}
  ): Promise<Map<string, PropertyMap>> {
    const events = await this.find({
      appName,
      entityType,
      eventNames: PROPERTY_EVENTS,
      startTime: options.startTime,
      untilTime: options.untilTime,
    });
    return aggregateProperties(events, options.required);
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class MemoryEventStore extends BaseEventStore {
  private events: StoredEvent[] = [];

  async insert(appName: string, input: EventInput): Promise<string> {
    const stored = toStoredEvent(appName, input, new Date());
    this.events.push(stored);
    return stored.eventId;
  }

  async get(appName: string, eventId: string): Promise<StoredEvent | null> {
    return this.events.find((e) => e.appName === appName && e.eventId === eventId) ?? null;
  }

  async delete(appName: string, eventId: string): Promise<boolean> {
    const before = this.events.length;
    this.events = this.events.filter((e) => !(e.appName === appName && e.eventId === eventId));
    return this.events.length < before;
  }

  async find(query: EventQuery): Promise<StoredEvent[]> {
    const matched = this.events
      .filter((e) => e.appName === query.appName)
      .filter((e) => query.entityType === undefined || e.entityType === query.entityType)
      .filter((e) => query.entityId === undefined || e.entityId === query.entityId)
      .filter((e) => query.eventNames === undefined || query.eventNames.includes(e.event))
      .filter((e) => query.startTime === undefined || e.eventTime.getTime() >= query.startTime.getTime())
      .filter((e) => query.untilTime === undefined || e.eventTime.getTime() < query.untilTime.getTime())
      .sort((a, b) => a.eventTime.getTime() - b.eventTime.getTime());

    if (query.reversed) matched.reverse();
    return query.limit !== undefined ? matched.slice(0, query.limit) : matched;
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGODB
// ═══════════════════════════════════════════════════════════════

export class MongoEventStore extends BaseEventStore {
  async insert(appName: string, input: EventInput): Promise<string> {
    const stored = toStoredEvent(appName, input, new Date());
    await EventModel.create(stored);
    return stored.eventId;
  }

  async get(appName: string, eventId: string): Promise<StoredEvent | null> {
    return EventModel.findOne({ appName, eventId }, { _id: 0, __v: 0 }).lean<StoredEvent>().exec();
  }

  async delete(appName: string, eventId: string): Promise<boolean> {
    const result = await EventModel.deleteOne({ appName, eventId }).exec();
    return result.deletedCount > 0;
  }

  async find(query: EventQuery): Promise<StoredEvent[]> {
    const filter: FilterQuery<StoredEvent> = { appName: query.appName };
    if (query.entityType !== undefined) filter.entityType = query.entityType;
    if (query.entityId !== undefined) filter.entityId = query.entityId;
    if (query.eventNames !== undefined) filter.event = { $in: query.eventNames };

    const eventTime: { $gte?: Date; $lt?: Date } = {};
    if (query.startTime !== undefined) eventTime.$gte = query.startTime;
    if (query.untilTime !== undefined) eventTime.$lt = query.untilTime;
    if (Object.keys(eventTime).length > 0) filter.eventTime = eventTime;

    let cursor = EventModel.find(filter, { _id: 0, __v: 0 }).sort({ eventTime: query.reversed ? -1 : 1 });
    if (query.limit !== undefined) cursor = cursor.limit(query.limit);

    return cursor.lean<StoredEvent[]>().exec();
  }
}
