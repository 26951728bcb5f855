/**
 * ENGINE — Workflow
 *
 * trainEngine() runs every stage once, in order, and returns one model per
 * configured algorithm. deployEngine() rebuilds the stages around persisted
 * models and answers queries.
 */

import { ModelLoadError, TrainingError, ValidationError, errorMessage } from '../../common/errors.js';
import {
  hasSanityCheck,
  type Algorithm,
  type Engine,
  type EngineContext,
  type Serving,
} from './engine.contracts.js';
import type { EngineParams } from './engine.params.js';

export interface TrainOptions {
  skipSanityCheck?: boolean;
}

interface NamedAlgorithm<PD, Q, P> {
  name: string;
  algorithm: Algorithm<PD, unknown, Q, P>;
}

export function createAlgorithms<TD, EI, PD, Q, P, A>(
  engine: Engine<TD, EI, PD, Q, P, A>,
  params: EngineParams,
  ctx: EngineContext
): Array<NamedAlgorithm<PD, Q, P>> {
  return params.algorithms.map(({ name, params: algoParams }) => {
    const factory = engine.algorithms[name];
    if (!factory) {
      const known = Object.keys(engine.algorithms).join(', ');
      throw new ValidationError(`Unknown algorithm "${name}" (engine ${engine.factory} provides: ${known})`);
    }
    return { name, algorithm: factory(algoParams, ctx) };
  });
}

/**
 * Sanity check → prepare → train each algorithm, on data already read.
 * Shared by training and by every evaluation fold.
 */
export async function trainOnData<TD, EI, PD, Q, P, A>(
  engine: Engine<TD, EI, PD, Q, P, A>,
  params: EngineParams,
  trainingData: TD,
  ctx: EngineContext,
  options: TrainOptions = {}
): Promise<unknown[]> {
  if (!options.skipSanityCheck && hasSanityCheck(trainingData)) {
    try {
      trainingData.sanityCheck();
    } catch (err) {
      throw new TrainingError(`Training data failed sanity check: ${errorMessage(err)}`);
    }
  }

  const preparator = engine.preparator(params.preparator.params, ctx);
  const prepared = await preparator.prepare(trainingData);

  const models: unknown[] = [];
  for (const { name, algorithm } of createAlgorithms(engine, params, ctx)) {
    ctx.logger.info(`Training algorithm ${name}`);
    models.push(await algorithm.train(prepared));
  }
  return models;
}

export async function trainEngine<TD, EI, PD, Q, P, A>(
  engine: Engine<TD, EI, PD, Q, P, A>,
  params: EngineParams,
  ctx: EngineContext,
  options: TrainOptions = {}
): Promise<unknown[]> {
  const dataSource = engine.dataSource(params.datasource.params, ctx);
  const trainingData = await dataSource.readTraining();
  return trainOnData(engine, params, trainingData, ctx, options);
}

// ═══════════════════════════════════════════════════════════════
// DEPLOYED ENGINE
// ═══════════════════════════════════════════════════════════════

type Predictor<Q, P> = (query: Q) => Promise<P>;

export class DeployedEngine<Q, P> {
  constructor(
    private readonly serving: Serving<Q, P>,
    private readonly predictors: Array<Predictor<Q, P>>
  ) {}

  async query(query: Q): Promise<P> {
    const supplemented = this.serving.supplement ? await this.serving.supplement(query) : query;
    const predictions: P[] = [];
    for (const predict of this.predictors) {
      predictions.push(await predict(supplemented));
    }
    return this.serving.serve(query, predictions);
  }
}

export function bindModels<PD, Q, P>(
  algorithms: Array<NamedAlgorithm<PD, Q, P>>,
  models: unknown[]
): Array<Predictor<Q, P>> {
  if (algorithms.length !== models.length) {
    throw new ValidationError(
      `Engine has ${algorithms.length} algorithm(s) but ${models.length} model(s) were supplied`
    );
  }
  return algorithms.map(({ algorithm }, i) => {
    const model = models[i];
    return async (query: Q) => algorithm.predict(model, query);
  });
}

/**
 * @param rawModels models in persisted (JSON) form, one per algorithm
 */
export function deployEngine<TD, EI, PD, Q, P, A>(
  engine: Engine<TD, EI, PD, Q, P, A>,
  params: EngineParams,
  rawModels: unknown[],
  ctx: EngineContext
): DeployedEngine<Q, P> {
  const algorithms = createAlgorithms(engine, params, ctx);
  const models = rawModels.map((raw, i) => {
    const entry = algorithms[i];
    if (!entry) return raw;
    try {
      return entry.algorithm.loadModel(raw);
    } catch (err) {
      throw new ModelLoadError(`Cannot load the model of algorithm ${entry.name}: ${errorMessage(err)}`);
    }
  });
  const serving = engine.serving(params.serving.params, ctx);
  return new DeployedEngine(serving, bindModels(algorithms, models));
}
