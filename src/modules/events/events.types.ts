/**
 * EVENTS — Types
 *
 * Entity events as stored by the event server. The special events
 * $set / $unset / $delete maintain an entity's property map.
 */

export const SPECIAL_EVENTS = ['$set', '$unset', '$delete'] as const;
export type SpecialEventName = (typeof SPECIAL_EVENTS)[number];

export type EventProperties = Record<string, unknown>;

export interface StoredEvent {
  eventId: string;
  appName: string;
  event: string;
  entityType: string;
  entityId: string;
  targetEntityType?: string;
  targetEntityId?: string;
  properties: EventProperties;
  eventTime: Date;
  creationTime: Date;
}

export interface EventInput {
  event: string;
  entityType: string;
  entityId: string;
  targetEntityType?: string;
  targetEntityId?: string;
  properties?: EventProperties;
  eventTime?: Date;
}

export interface PropertyMap {
  fields: EventProperties;
  firstUpdated: Date;
  lastUpdated: Date;
}

export interface EventQuery {
  appName: string;
  entityType?: string;
  entityId?: string;
  eventNames?: string[];
  /** Inclusive */
  startTime?: Date;
  /** Exclusive */
  untilTime?: Date;
  limit?: number;
  reversed?: boolean;
}

export interface AggregateOptions {
  required?: string[];
  startTime?: Date;
  untilTime?: Date;
}

export function isSpecialEvent(name: string): name is SpecialEventName {
  return (SPECIAL_EVENTS as readonly string[]).includes(name);
}
