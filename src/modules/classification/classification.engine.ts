/**
 * CLASSIFICATION — Engine factory
 */

import { ValidationError } from '../../common/errors.js';
import type { Engine } from '../engine/engine.contracts.js';
import { parseStageParams } from '../engine/engine.params.js';
import { ClassificationDataSource } from './classification.datasource.js';
import { ClassificationPreparator } from './classification.preparator.js';
import { NaiveBayesAlgorithm } from './classification.algorithm.js';
import { ClassificationServing } from './classification.serving.js';
import {
  AlgorithmParamsSchema,
  DataSourceParamsSchema,
  QuerySchema,
  type ActualResult,
  type EvalInfo,
  type PredictedResult,
  type PreparedData,
  type Query,
  type TrainingData,
} from './classification.types.js';

export const CLASSIFICATION_ENGINE_FACTORY = 'classification';

export const classificationEngine: Engine<
  TrainingData,
  EvalInfo,
  PreparedData,
  Query,
  PredictedResult,
  ActualResult
> = {
  factory: CLASSIFICATION_ENGINE_FACTORY,

  dataSource: (params, ctx) =>
    new ClassificationDataSource(
      parseStageParams('datasource', DataSourceParamsSchema, params),
      ctx.eventStore,
      ctx.logger
    ),

  preparator: () => new ClassificationPreparator(),

  algorithms: {
    naive: (params) => new NaiveBayesAlgorithm(parseStageParams('naive', AlgorithmParamsSchema, params)),
  },

  serving: () => new ClassificationServing(),

  parseQuery(body) {
    const parsed = QuerySchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
      throw new ValidationError(`Invalid query: ${issues[0]}`, issues);
    }
    return parsed.data;
  },
};
