/**
 * EVENTS ROUTES — Event server endpoints
 *
 * POST   /events.json?appName=          — insert one event
 * GET    /events.json?appName=&...      — list events
 * GET    /events/:eventId.json?appName= — get one event
 * DELETE /events/:eventId.json?appName= — delete one event
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../common/errors.js';
import { parseEventInput } from './events.validation.js';
import type { EventStore } from './events.store.js';

const AppQuerySchema = z.object({
  appName: z.string().min(1),
});

const FindQuerySchema = AppQuerySchema.extend({
  entityType: z.string().min(1).optional(),
  entityId: z.string().min(1).optional(),
  event: z.union([z.string(), z.array(z.string())]).optional(),
  startTime: z.coerce.date().optional(),
  untilTime: z.coerce.date().optional(),
  limit: z.coerce.number().int().positive().max(10_000).default(20),
  reversed: z.enum(['true', 'false']).optional(),
});

function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: unknown): T {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(issues[0] ?? 'Invalid query string', issues);
  }
  return parsed.data;
}

function eventIdFrom(param: string): string {
  return param.endsWith('.json') ? param.slice(0, -'.json'.length) : param;
}

export async function registerEventRoutes(
  app: FastifyInstance,
  deps: { store: EventStore }
): Promise<void> {
  const { store } = deps;

  app.post('/events.json', async (request, reply) => {
    const { appName } = parseQuery(AppQuerySchema, request.query);
    const input = parseEventInput(request.body);
    const eventId = await store.insert(appName, input);
    return reply.status(201).send({ ok: true, eventId });
  });

  app.get('/events.json', async (request) => {
    const q = parseQuery(FindQuerySchema, request.query);
    const events = await store.find({
      appName: q.appName,
      entityType: q.entityType,
      entityId: q.entityId,
      eventNames: q.event === undefined ? undefined : [q.event].flat(),
      startTime: q.startTime,
      untilTime: q.untilTime,
      limit: q.limit,
      reversed: q.reversed === 'true',
    });
    return { ok: true, count: events.length, events };
  });

  app.get<{ Params: { eventFile: string } }>('/events/:eventFile', async (request) => {
    const { appName } = parseQuery(AppQuerySchema, request.query);
    const eventId = eventIdFrom(request.params.eventFile);
    const event = await store.get(appName, eventId);
    if (!event) throw new NotFoundError(`Event ${eventId} not found`);
    return { ok: true, event };
  });

  app.delete<{ Params: { eventFile: string } }>('/events/:eventFile', async (request) => {
    const { appName } = parseQuery(AppQuerySchema, request.query);
    const eventId = eventIdFrom(request.params.eventFile);
    const deleted = await store.delete(appName, eventId);
    if (!deleted) throw new NotFoundError(`Event ${eventId} not found`);
    return { ok: true, message: 'Found' };
  });
}
