/**
 * ENGINE — Service
 *
 * Runs training as a recorded engine instance and deploys the latest
 * completed one.
 */

import { EngineNotReadyError, ModelLoadError, TrainingError, errorMessage } from '../../common/errors.js';
import type { Engine, EngineContext } from './engine.contracts.js';
import type { EngineParams } from './engine.params.js';
import type { EngineInstance, EngineInstanceStore } from './engine.storage.js';
import { deployEngine, trainEngine, type DeployedEngine, type TrainOptions } from './engine.workflow.js';

export interface Deployment<Q, P> {
  instance: EngineInstance;
  engine: DeployedEngine<Q, P>;
}

/** What the HTTP layer needs from an engine service */
export interface EngineDeployer<Q, P> {
  readonly variant: string;
  parseQuery(body: unknown): Q;
  deploy(): Promise<Deployment<Q, P>>;
}

export class EngineService<TD, EI, PD, Q, P, A> implements EngineDeployer<Q, P> {
  constructor(
    private readonly engine: Engine<TD, EI, PD, Q, P, A>,
    private readonly params: EngineParams,
    private readonly instances: EngineInstanceStore,
    private readonly ctx: EngineContext
  ) {}

  get variant(): string {
    return this.params.id;
  }

  parseQuery(body: unknown): Q {
    return this.engine.parseQuery(body);
  }

  async train(options: TrainOptions = {}): Promise<EngineInstance> {
    const startTime = new Date();
    const id = await this.instances.insert({
      status: 'INIT',
      startTime,
      engineFactory: this.engine.factory,
      engineVariant: this.variant,
      params: this.params,
      models: [],
    });

    this.ctx.logger.info(`Engine instance ${id} training started (${this.engine.factory}/${this.variant})`);

    try {
      const models = await trainEngine(this.engine, this.params, this.ctx, options);
      await this.instances.update(id, { status: 'COMPLETED', endTime: new Date(), models });
    } catch (err) {
      const message = errorMessage(err);
      await this.instances.update(id, { status: 'FAILED', endTime: new Date(), error: message });
      this.ctx.logger.error({ instanceId: id, error: message }, 'Training failed');
      throw err instanceof TrainingError ? err : new TrainingError(message);
    }

    const instance = await this.instances.get(id);
    if (!instance) throw new TrainingError(`Engine instance ${id} disappeared after training`);

    this.ctx.logger.info(`Engine instance ${id} training completed`);
    return instance;
  }

  async deploy(): Promise<Deployment<Q, P>> {
    const instance = await this.instances.getLatestCompleted(this.engine.factory, this.variant);
    if (!instance) {
      throw new EngineNotReadyError(
        `No completed engine instance for ${this.engine.factory}/${this.variant}; run training first`
      );
    }

    let engine: DeployedEngine<Q, P>;
    try {
      engine = deployEngine(this.engine, instance.params, instance.models, this.ctx);
    } catch (err) {
      throw new ModelLoadError(`Engine instance ${instance.id} cannot be deployed: ${errorMessage(err)}`);
    }
    this.ctx.logger.info(`Deployed engine instance ${instance.id}`);
    return { instance, engine };
  }
}
