/**
 * CLASSIFICATION — Evaluation
 */

import { ValidationError } from '../../common/errors.js';
import { AverageMetric } from '../engine/engine.evaluation.js';
import type { EngineParams } from '../engine/engine.params.js';
import type { ActualResult, EvalInfo, PredictedResult, Query } from './classification.types.js';

export class AccuracyMetric extends AverageMetric<EvalInfo, Query, PredictedResult, ActualResult> {
  readonly header = 'Accuracy';

  score(_query: Query, predicted: PredictedResult, actual: ActualResult): number {
    return predicted.label === actual.label ? 1 : 0;
  }
}

export const EVAL_LAMBDAS = [10, 100, 1000];
export const EVAL_K = 5;

/**
 * Candidate params: the loaded engine params with one Naive Bayes algorithm
 * per smoothing value. evalK falls back to EVAL_K when the data source sets none.
 */
export function buildEngineParamsList(base: EngineParams, lambdas: number[] = EVAL_LAMBDAS): EngineParams[] {
  const evalK = base.datasource.params.evalK ?? EVAL_K;
  return lambdas.map((lambda) => ({
    ...base,
    datasource: { params: { ...base.datasource.params, evalK } },
    algorithms: [{ name: 'naive', params: { lambda } }],
  }));
}

/** Parses a comma-separated list of smoothing values such as "10,100,1000" */
export function parseLambdaList(text: string): number[] {
  return text.split(',').map((part) => {
    const trimmed = part.trim();
    const lambda = trimmed === '' ? NaN : Number(trimmed);
    if (!(Number.isFinite(lambda) && lambda > 0)) {
      throw new ValidationError(`Invalid smoothing value "${trimmed}" in "${text}": expected a positive number`);
    }
    return lambda;
  });
}
