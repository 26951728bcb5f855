import type { Preparator } from '../engine/engine.contracts.js';
import { PreparedData, type TrainingData } from './classification.types.js';

export class ClassificationPreparator implements Preparator<TrainingData, PreparedData> {
  prepare(trainingData: TrainingData): PreparedData {
    return new PreparedData(trainingData.labeledPoints);
  }
}
