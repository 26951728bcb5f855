/**
 * Property aggregation
 *
 * Folds an entity's $set / $unset / $delete events, in eventTime order,
 * into its current property map. Other events leave the map untouched.
 */

import type { PropertyMap, StoredEvent } from './events.types.js';

type Fold = PropertyMap | undefined;

function applyEvent(current: Fold, e: StoredEvent): Fold {
  switch (e.event) {
    case '$set':
      if (!current) {
        return { fields: { ...e.properties }, firstUpdated: e.eventTime, lastUpdated: e.eventTime };
      }
      return {
        fields: { ...current.fields, ...e.properties },
        firstUpdated: current.firstUpdated,
        lastUpdated: e.eventTime,
      };

    case '$unset': {
      if (!current) return undefined;
      const fields = { ...current.fields };
      for (const key of Object.keys(e.properties)) delete fields[key];
      return { fields, firstUpdated: current.firstUpdated, lastUpdated: e.eventTime };
    }

    case '$delete':
      return undefined;

    default:
      return current;
  }
}

/**
 * Entity id → property map, in order of each entity's first event.
 * Entities missing any of `required` are left out.
 */
export function aggregateProperties(
  events: StoredEvent[],
  required: string[] = []
): Map<string, PropertyMap> {
  const ordered = [...events].sort((a, b) => a.eventTime.getTime() - b.eventTime.getTime());

  const folds = new Map<string, Fold>();
  for (const e of ordered) {
    folds.set(e.entityId, applyEvent(folds.get(e.entityId), e));
  }

  const result = new Map<string, PropertyMap>();
  for (const [entityId, pm] of folds) {
    if (!pm) continue;
    if (required.every((key) => key in pm.fields)) {
      result.set(entityId, pm);
    }
  }
  return result;
}
