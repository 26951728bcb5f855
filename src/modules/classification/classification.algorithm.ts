/**
 * CLASSIFICATION — Naive Bayes algorithm
 */

import { ValidationError } from '../../common/errors.js';
import type { Algorithm } from '../engine/engine.contracts.js';
import { NaiveBayes, NaiveBayesParamsSchema, type NaiveBayesParams } from './models/naive-bayes.model.js';
import type { AlgorithmParams, PredictedResult, PreparedData, Query } from './classification.types.js';

export class NaiveBayesAlgorithm
  implements Algorithm<PreparedData, NaiveBayesParams, Query, PredictedResult>
{
  constructor(readonly params: AlgorithmParams) {}

  train(data: PreparedData): NaiveBayesParams {
    return new NaiveBayes().fit(data.labeledPoints, this.params.lambda);
  }

  predict(model: NaiveBayesParams, query: Query): PredictedResult {
    const nb = new NaiveBayes(model);
    if (query.features.length !== nb.numFeatures) {
      throw new ValidationError(
        `Query has ${query.features.length} features but the model expects ${nb.numFeatures}`
      );
    }
    if (query.features.some((v) => v < 0)) {
      throw new ValidationError('Query features must be nonnegative');
    }
    return { label: nb.predictOne(query.features) };
  }

  loadModel(raw: unknown): NaiveBayesParams {
    const parsed = NaiveBayesParamsSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'model'}: ${i.message}`);
      throw new ValidationError(`Invalid Naive Bayes model: ${issues[0]}`, issues);
    }
    return parsed.data;
  }
}
