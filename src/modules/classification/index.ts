/**
 * CLASSIFICATION MODULE — Index
 */

export * from './classification.types.js';
export * from './classification.datasource.js';
export * from './classification.preparator.js';
export * from './classification.algorithm.js';
export * from './classification.serving.js';
export * from './classification.evaluation.js';
export * from './classification.engine.js';
export { NaiveBayes, type NaiveBayesParams } from './models/naive-bayes.model.js';
