import { describe, it, expect } from 'vitest';
import { NaiveBayes } from '../models/naive-bayes.model.js';

const samples = [
  { label: 0, features: [2, 0, 0] },
  { label: 0, features: [1, 0, 0] },
  { label: 1, features: [0, 3, 1] },
];

describe('NaiveBayes', () => {
  it('computes smoothed log priors and conditionals', () => {
    const params = new NaiveBayes().fit(samples, 1);

    expect(params.labels).toEqual([0, 1]);
    // (2 + 1) / (3 + 2·1) and (1 + 1) / (3 + 2·1)
    expect(params.pi[0]).toBeCloseTo(Math.log(3 / 5), 10);
    expect(params.pi[1]).toBeCloseTo(Math.log(2 / 5), 10);
    // label 0 sums [3, 0, 0] over 3 + 3·1; label 1 sums [0, 3, 1] over 4 + 3·1
    expect(params.theta[0][0]).toBeCloseTo(Math.log(4 / 6), 10);
    expect(params.theta[0][1]).toBeCloseTo(Math.log(1 / 6), 10);
    expect(params.theta[1][1]).toBeCloseTo(Math.log(4 / 7), 10);
    expect(params.theta[1][2]).toBeCloseTo(Math.log(2 / 7), 10);
  });

  it('predicts the label with the highest posterior', () => {
    const nb = new NaiveBayes();
    nb.fit(samples, 1);

    expect(nb.predictOne([1, 0, 0])).toBe(0);
    expect(nb.predictOne([0, 1, 0])).toBe(1);
    expect(nb.predictOne([0, 2, 2])).toBe(1);
  });

  it('sorts labels ascending whatever the input order', () => {
    const params = new NaiveBayes().fit(
      [
        { label: 2, features: [1, 0] },
        { label: 1, features: [0, 1] },
      ],
      1
    );
    expect(params.labels).toEqual([1, 2]);
  });

  it('restores a trained model from its params', () => {
    const trained = new NaiveBayes();
    const params = trained.fit(samples, 1);
    const restored = new NaiveBayes(JSON.parse(JSON.stringify(params)));

    expect(restored.predictOne([0, 1, 0])).toBe(trained.predictOne([0, 1, 0]));
    expect(restored.numFeatures).toBe(3);
  });

  it('ignores zero-valued features a label never saw when lambda is 0', () => {
    const nb = new NaiveBayes();
    nb.fit(
      [
        { label: 0, features: [0, 1, 0] },
        { label: 1, features: [1, 1, 1] },
      ],
      0
    );

    expect(nb.params.theta[0][0]).toBe(-Infinity);
    const [score0, score1] = nb.logPosteriors([0, 1, 1]);
    expect(score0).toBe(-Infinity);
    expect(score1).toBeCloseTo(Math.log(1 / 2) + 2 * Math.log(1 / 3), 10);
    expect(nb.predictOne([0, 1, 1])).toBe(1);
  });

  it('never picks a label whose posterior is NaN', () => {
    const nb = new NaiveBayes({ labels: [0, 1], pi: [NaN, -1], theta: [[0], [0]] });

    expect(nb.predictOne([1])).toBe(1);
  });

  it('rejects negative feature values', () => {
    expect(() => new NaiveBayes().fit([{ label: 0, features: [1, -1] }], 1)).toThrow(
      'Naive Bayes requires nonnegative feature values but found [1, -1]'
    );
  });

  it('rejects an empty data set', () => {
    expect(() => new NaiveBayes().fit([], 1)).toThrow('Cannot train Naive Bayes on an empty data set');
  });

  it('refuses to predict before training', () => {
    expect(() => new NaiveBayes().predictOne([1])).toThrow('Naive Bayes model is not trained');
  });
});
