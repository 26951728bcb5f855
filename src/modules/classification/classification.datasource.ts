/**
 * CLASSIFICATION — Data Source
 *
 * Aggregates the properties of every user and turns those carrying the
 * label and all features into labeled points.
 */

import type { Logger } from '../../common/logger.js';
import type { DataSource, EvalFold } from '../engine/engine.contracts.js';
import type { EventStore } from '../events/events.store.js';
import type { EventProperties } from '../events/events.types.js';
import {
  ENTITY_TYPE,
  FEATURE_PROPERTIES,
  LABEL_PROPERTY,
  REQUIRED_PROPERTIES,
  TrainingData,
  type ActualResult,
  type DataSourceParams,
  type EvalInfo,
  type LabeledPoint,
  type Query,
} from './classification.types.js';

function getNumber(fields: EventProperties, key: string): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Property ${key} is not a number: ${JSON.stringify(value)}`);
  }
  return value;
}

export class ClassificationDataSource
  implements DataSource<TrainingData, EvalInfo, Query, ActualResult>
{
  constructor(
    private readonly params: DataSourceParams,
    private readonly store: EventStore,
    private readonly logger: Logger
  ) {}

  private async readLabeledPoints(): Promise<LabeledPoint[]> {
    const users = await this.store.aggregateProperties(this.params.appName, ENTITY_TYPE, {
      required: REQUIRED_PROPERTIES,
    });

    const points: LabeledPoint[] = [];
    for (const [entityId, pm] of users) {
      try {
        points.push({
          label: getNumber(pm.fields, LABEL_PROPERTY),
          features: FEATURE_PROPERTIES.map((key) => getNumber(pm.fields, key)),
        });
      } catch (err) {
        this.logger.error(
          { entityId, properties: pm.fields, err },
          `Failed to get properties ${JSON.stringify(pm.fields)} of ${entityId}`
        );
        throw err;
      }
    }
    return points;
  }

  async readTraining(): Promise<TrainingData> {
    return new TrainingData(await this.readLabeledPoints());
  }

  /**
   * k folds by position: point i is held out in fold i mod k.
   */
  async readEval(): Promise<Array<EvalFold<TrainingData, EvalInfo, Query, ActualResult>>> {
    const k = this.params.evalK;
    if (k === undefined) {
      throw new Error('datasource.params.evalK must be set to read evaluation data');
    }

    const points = await this.readLabeledPoints();
    const folds: Array<EvalFold<TrainingData, EvalInfo, Query, ActualResult>> = [];

    for (let fold = 0; fold < k; fold++) {
      const training = points.filter((_, i) => i % k !== fold);
      const testing = points.filter((_, i) => i % k === fold);
      folds.push({
        trainingData: new TrainingData(training),
        evalInfo: {},
        qa: testing.map((p): [Query, ActualResult] => [{ features: p.features }, { label: p.label }]),
      });
    }
    return folds;
  }
}
