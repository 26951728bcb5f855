/**
 * Engine server: event routes plus the query boundary of the latest
 * completed engine instance
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';
import { createContext, createEngineService, createStores, readEngineParams } from './bootstrap.js';
import { EngineHost } from './modules/engine/index.js';
import { EngineNotReadyError } from './common/errors.js';
import { disconnectMongo } from './db/mongoose.js';

export interface ServerOptions {
  enginePath?: string;
  port?: number;
  host?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<void> {
  const stores = await createStores();
  const params = readEngineParams(options.enginePath);
  const service = createEngineService(params, stores, createContext(stores, 'Serving'));
  const host = new EngineHost(service);

  try {
    await host.reload();
  } catch (err) {
    if (!(err instanceof EngineNotReadyError)) throw err;
    console.warn(`[Boot] ${err.message}; queries answer 503 until POST /reload`);
  }

  const app = buildApp({ eventStore: stores.eventStore, host });

  const shutdown = async (signal: string) => {
    app.log.info(`${signal} received, shutting down`);
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[Boot] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: options.port ?? env.PORT, host: options.host ?? env.HOST });
}
