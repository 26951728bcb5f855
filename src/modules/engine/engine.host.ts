/**
 * ENGINE — Host
 *
 * Holds the deployment currently answering queries, swaps it on reload,
 * and keeps the serving statistics shown by GET /.
 */

import { EngineNotReadyError } from '../../common/errors.js';
import type { Deployment, EngineDeployer } from './engine.service.js';

export interface EngineStatus {
  status: 'alive' | 'not_ready';
  engineInstanceId: string | null;
  engineFactory: string | null;
  engineVariant: string;
  instanceStartTime: string | null;
  serverStartTime: string;
  requestCount: number;
  avgServingSec: number;
  lastServingSec: number;
}

export class EngineHost<Q, P> {
  private current: Deployment<Q, P> | null = null;
  private readonly startedAt = new Date();
  private requestCount = 0;
  private totalServingMs = 0;
  private lastServingMs = 0;

  constructor(private readonly deployer: EngineDeployer<Q, P>) {}

  get deployment(): Deployment<Q, P> | null {
    return this.current;
  }

  async reload(): Promise<Deployment<Q, P>> {
    this.current = await this.deployer.deploy();
    return this.current;
  }

  async query(body: unknown): Promise<P> {
    const query = this.deployer.parseQuery(body);
    if (!this.current) throw new EngineNotReadyError();

    const started = performance.now();
    const result = await this.current.engine.query(query);
    this.lastServingMs = performance.now() - started;
    this.totalServingMs += this.lastServingMs;
    this.requestCount++;
    return result;
  }

  status(): EngineStatus {
    const instance = this.current?.instance ?? null;
    return {
      status: instance ? 'alive' : 'not_ready',
      engineInstanceId: instance?.id ?? null,
      engineFactory: instance?.engineFactory ?? null,
      engineVariant: this.deployer.variant,
      instanceStartTime: instance?.startTime.toISOString() ?? null,
      serverStartTime: this.startedAt.toISOString(),
      requestCount: this.requestCount,
      avgServingSec: this.requestCount === 0 ? 0 : this.totalServingMs / this.requestCount / 1000,
      lastServingSec: this.lastServingMs / 1000,
    };
  }
}
