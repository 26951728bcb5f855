/**
 * Logger contract shared by services that take their logger by injection.
 * Fastify's `app.log` satisfies it, and so does createConsoleLogger().
 */

export interface Logger {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
  debug?(obj: unknown, msg?: string): void;
}

type Sink = (...args: unknown[]) => void;

function write(sink: Sink, tag: string, obj: unknown, msg?: string): void {
  if (typeof obj === 'string' && msg === undefined) {
    sink(`[${tag}] ${obj}`);
    return;
  }
  sink(`[${tag}] ${msg ?? ''}`.trimEnd(), obj);
}

export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => write(console.log, tag, obj, msg),
    warn: (obj, msg) => write(console.warn, tag, obj, msg),
    error: (obj, msg) => write(console.error, tag, obj, msg),
    debug: (obj, msg) => write(console.debug, tag, obj, msg),
  };
}
