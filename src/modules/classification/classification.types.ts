/**
 * CLASSIFICATION — Types
 *
 * Users carry a plan (the label) and three numeric attributes (the
 * features), all set through $set events.
 */

import { z } from 'zod';
import type { SanityCheck } from '../engine/engine.contracts.js';

export const ENTITY_TYPE = 'user';
export const LABEL_PROPERTY = 'plan';
export const FEATURE_PROPERTIES = ['attr0', 'attr1', 'attr2'] as const;
export const REQUIRED_PROPERTIES: string[] = [LABEL_PROPERTY, ...FEATURE_PROPERTIES];

export interface Query {
  features: number[];
}

export interface PredictedResult {
  label: number;
}

export interface ActualResult {
  label: number;
}

export interface LabeledPoint {
  label: number;
  features: number[];
}

export const QuerySchema = z.object({
  features: z.array(z.number().finite()).min(1),
});

export const DataSourceParamsSchema = z.object({
  appName: z.string().min(1),
  evalK: z.number().int().min(2).optional(),
});
export type DataSourceParams = z.infer<typeof DataSourceParamsSchema>;

/** lambda must be positive: a zero count would persist a -Infinity log probability */
export const AlgorithmParamsSchema = z.object({
  lambda: z.number().positive(),
});
export type AlgorithmParams = z.infer<typeof AlgorithmParamsSchema>;

export class TrainingData implements SanityCheck {
  constructor(readonly labeledPoints: LabeledPoint[]) {}

  sanityCheck(): void {
    if (this.labeledPoints.length === 0) {
      throw new Error('labeledPoints cannot be empty; check that users have plan, attr0, attr1 and attr2 set');
    }
  }
}

export class PreparedData {
  constructor(readonly labeledPoints: LabeledPoint[]) {}
}

/** Evaluation folds carry no extra information */
export type EvalInfo = Record<string, never>;
