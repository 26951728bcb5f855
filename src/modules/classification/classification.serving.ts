import type { Serving } from '../engine/engine.contracts.js';
import type { PredictedResult, Query } from './classification.types.js';

/** Answers with the first algorithm's prediction */
export class ClassificationServing implements Serving<Query, PredictedResult> {
  serve(_query: Query, predictions: PredictedResult[]): PredictedResult {
    const first = predictions[0];
    if (!first) throw new Error('No predictions to serve');
    return first;
  }
}
