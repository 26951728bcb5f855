/**
 * Event validation
 *
 * EventInputSchema parses the JSON body of POST /events.json;
 * validateEvent() applies the rules that span several fields.
 */

import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import { isSpecialEvent, type EventInput } from './events.types.js';

export const EventInputSchema = z.object({
  event: z.string().min(1),
  entityType: z.string().min(1),
  entityId: z.string().min(1),
  targetEntityType: z.string().min(1).optional(),
  targetEntityId: z.string().min(1).optional(),
  properties: z.record(z.unknown()).optional(),
  eventTime: z.coerce.date().optional(),
});

export function eventRuleViolations(input: EventInput): string[] {
  const issues: string[] = [];

  if (input.event.startsWith('$') && !isSpecialEvent(input.event)) {
    issues.push(`${input.event} is not a supported reserved event name`);
  }

  const hasTargetType = input.targetEntityType !== undefined;
  const hasTargetId = input.targetEntityId !== undefined;
  if (hasTargetType !== hasTargetId) {
    issues.push('targetEntityType and targetEntityId must be specified together');
  }

  if (isSpecialEvent(input.event) && (hasTargetType || hasTargetId)) {
    issues.push(`Reserved event ${input.event} cannot have targetEntity`);
  }

  if (input.event === '$unset' && Object.keys(input.properties ?? {}).length === 0) {
    issues.push('properties cannot be empty for $unset event');
  }

  return issues;
}

export function parseEventInput(body: unknown): EventInput {
  const parsed = EventInputSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new ValidationError('Invalid event', issues);
  }

  const issues = eventRuleViolations(parsed.data);
  if (issues.length > 0) {
    throw new ValidationError(issues[0], issues);
  }
  return parsed.data;
}
