/**
 * ENGINE ROUTES — Query boundary
 *
 * GET  /             — server status
 * POST /queries.json — answer one query
 * POST /reload       — switch to the latest completed engine instance
 */

import type { FastifyInstance } from 'fastify';
import type { EngineHost } from './engine.host.js';

export async function registerEngineRoutes<Q, P>(
  app: FastifyInstance,
  deps: { host: EngineHost<Q, P> }
): Promise<void> {
  const { host } = deps;

  app.get('/', async () => host.status());

  app.post('/queries.json', async (request) => host.query(request.body));

  app.post('/reload', async () => {
    const { instance } = await host.reload();
    return { ok: true, engineInstanceId: instance.id };
  });
}
