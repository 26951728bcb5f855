/**
 * ENGINE — Evaluation
 *
 * Each candidate engine params is trained on every fold the data source
 * offers and scored by a metric over the fold's held-out queries.
 */

import { ValidationError } from '../../common/errors.js';
import type { Engine, EngineContext } from './engine.contracts.js';
import type { EngineParams } from './engine.params.js';
import { DeployedEngine, bindModels, createAlgorithms, trainOnData } from './engine.workflow.js';

export interface FoldResult<EI, Q, P, A> {
  evalInfo: EI;
  qpa: Array<[Q, P, A]>;
}

export interface Metric<EI, Q, P, A> {
  header: string;
  calculate(folds: Array<FoldResult<EI, Q, P, A>>): number;
}

/**
 * Mean of a per-query score over all folds. NaN when there is nothing to score.
 */
export abstract class AverageMetric<EI, Q, P, A> implements Metric<EI, Q, P, A> {
  abstract readonly header: string;
  abstract score(query: Q, predicted: P, actual: A): number;

  calculate(folds: Array<FoldResult<EI, Q, P, A>>): number {
    let sum = 0;
    let count = 0;
    for (const fold of folds) {
      for (const [q, p, a] of fold.qpa) {
        sum += this.score(q, p, a);
        count++;
      }
    }
    return count === 0 ? Number.NaN : sum / count;
  }
}

export interface ScoredParams {
  params: EngineParams;
  score: number;
}

export interface EvaluationResult {
  metric: string;
  scores: ScoredParams[];
  best: ScoredParams;
}

export async function evaluateParams<TD, EI, PD, Q, P, A>(
  engine: Engine<TD, EI, PD, Q, P, A>,
  params: EngineParams,
  metric: Metric<EI, Q, P, A>,
  ctx: EngineContext
): Promise<number> {
  const dataSource = engine.dataSource(params.datasource.params, ctx);
  if (!dataSource.readEval) {
    throw new ValidationError(`Data source of engine ${engine.factory} does not provide evaluation data`);
  }

  const folds = await dataSource.readEval();
  const results: Array<FoldResult<EI, Q, P, A>> = [];

  for (const fold of folds) {
    const models = await trainOnData(engine, params, fold.trainingData, ctx);
    const deployed = new DeployedEngine(
      engine.serving(params.serving.params, ctx),
      bindModels(createAlgorithms(engine, params, ctx), models)
    );

    const qpa: Array<[Q, P, A]> = [];
    for (const [query, actual] of fold.qa) {
      qpa.push([query, await deployed.query(query), actual]);
    }
    results.push({ evalInfo: fold.evalInfo, qpa });
  }

  return metric.calculate(results);
}

/**
 * Scores every candidate; the best is the highest score, earliest on ties.
 * NaN scores never win.
 */
export async function evaluateEngine<TD, EI, PD, Q, P, A>(
  engine: Engine<TD, EI, PD, Q, P, A>,
  paramsList: EngineParams[],
  metric: Metric<EI, Q, P, A>,
  ctx: EngineContext
): Promise<EvaluationResult> {
  if (paramsList.length === 0) {
    throw new ValidationError('No engine params to evaluate');
  }

  const scores: ScoredParams[] = [];
  for (const params of paramsList) {
    const score = await evaluateParams(engine, params, metric, ctx);
    ctx.logger.info(`${metric.header}: ${score} for params ${JSON.stringify(params.algorithms)}`);
    scores.push({ params, score });
  }

  let best = scores[0];
  for (const candidate of scores.slice(1)) {
    if (Number.isNaN(best.score) || candidate.score > best.score) best = candidate;
  }

  return { metric: metric.header, scores, best };
}
