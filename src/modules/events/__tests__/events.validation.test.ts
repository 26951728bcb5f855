import { describe, it, expect } from 'vitest';
import { eventRuleViolations, parseEventInput } from '../events.validation.js';
import { ValidationError } from '../../../common/errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('parseEventInput', () => {
  it('accepts a $set event and parses its eventTime', () => {
    const input = parseEventInput({
      event: '$set',
      entityType: 'user',
      entityId: 'u1',
      properties: { plan: 1 },
      eventTime: '2024-03-01T12:00:00.000Z',
    });

    expect(input.event).toBe('$set');
    expect(input.properties).toEqual({ plan: 1 });
    expect(input.eventTime?.toISOString()).toBe('2024-03-01T12:00:00.000Z');
  });

  it('reports missing fields', () => {
    expect(issuesOf(() => parseEventInput({ event: '$set', entityType: 'user' }))).toEqual([
      'entityId: Required',
    ]);
  });

  it('rejects unsupported reserved names', () => {
    expect(issuesOf(() => parseEventInput({ event: '$update', entityType: 'user', entityId: 'u1' }))).toEqual([
      '$update is not a supported reserved event name',
    ]);
  });

  it('rejects an $unset without properties', () => {
    expect(() => parseEventInput({ event: '$unset', entityType: 'user', entityId: 'u1' })).toThrow(
      'properties cannot be empty for $unset event'
    );
  });
});

describe('eventRuleViolations', () => {
  it('requires both target fields or neither', () => {
    expect(
      eventRuleViolations({ event: 'rate', entityType: 'user', entityId: 'u1', targetEntityType: 'item' })
    ).toEqual(['targetEntityType and targetEntityId must be specified together']);
  });

  it('forbids a target entity on reserved events', () => {
    expect(
      eventRuleViolations({
        event: '$set',
        entityType: 'user',
        entityId: 'u1',
        targetEntityType: 'item',
        targetEntityId: 'i1',
        properties: { a: 1 },
      })
    ).toEqual(['Reserved event $set cannot have targetEntity']);
  });

  it('accepts a plain event with a target entity', () => {
    expect(
      eventRuleViolations({
        event: 'rate',
        entityType: 'user',
        entityId: 'u1',
        targetEntityType: 'item',
        targetEntityId: 'i1',
      })
    ).toEqual([]);
  });
});
