/**
 * Engine server entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { startServer } from './engine-server.js';

startServer().catch((err) => {
  console.error('[Boot] Failed to start server:', err);
  process.exit(1);
});
