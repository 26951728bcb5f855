/**
 * Multinomial Naive Bayes
 * =======================
 * Pure TypeScript implementation (no external deps)
 *
 * pi[c]       = log((n_c + λ) / (n + numLabels·λ))
 * theta[c][j] = log((Σ x_j over c + λ) / (Σ x over c + numFeatures·λ))
 * predict(x)  = argmax_c pi[c] + Σ_j theta[c][j]·x_j
 */

import { z } from 'zod';

export interface NaiveBayesParams {
  /** Distinct labels, ascending */
  labels: number[];
  /** Log prior per label */
  pi: number[];
  /** Log conditional probability per label and feature */
  theta: number[][];
}

export const NaiveBayesParamsSchema = z.object({
  labels: z.array(z.number()),
  pi: z.array(z.number()),
  theta: z.array(z.array(z.number())),
});

export interface NaiveBayesSample {
  label: number;
  features: number[];
}

function assertNonNegative(features: number[]): void {
  for (const v of features) {
    if (!(v >= 0)) {
      throw new Error(`Naive Bayes requires nonnegative feature values but found [${features.join(', ')}]`);
    }
  }
}

export class NaiveBayes {
  params: NaiveBayesParams;

  constructor(params?: NaiveBayesParams) {
    this.params = params ?? { labels: [], pi: [], theta: [] };
  }

  get numFeatures(): number {
    return this.params.theta[0]?.length ?? 0;
  }

  fit(samples: NaiveBayesSample[], lambda: number): NaiveBayesParams {
    if (samples.length === 0) {
      throw new Error('Cannot train Naive Bayes on an empty data set');
    }

    const numFeatures = samples[0].features.length;
    const byLabel = new Map<number, { count: number; sums: number[] }>();

    for (const { label, features } of samples) {
      if (features.length !== numFeatures) {
        throw new Error(`Expected ${numFeatures} features but found ${features.length}`);
      }
      assertNonNegative(features);

      let agg = byLabel.get(label);
      if (!agg) {
        agg = { count: 0, sums: new Array<number>(numFeatures).fill(0) };
        byLabel.set(label, agg);
      }
      agg.count++;
      for (let j = 0; j < numFeatures; j++) agg.sums[j] += features[j];
    }

    const labels = [...byLabel.keys()].sort((a, b) => a - b);
    const piLogDenom = Math.log(samples.length + labels.length * lambda);

    const pi: number[] = [];
    const theta: number[][] = [];
    for (const label of labels) {
      const { count, sums } = byLabel.get(label) ?? { count: 0, sums: [] };
      pi.push(Math.log(count + lambda) - piLogDenom);

      const total = sums.reduce((acc, v) => acc + v, 0);
      const thetaLogDenom = Math.log(total + numFeatures * lambda);
      theta.push(sums.map((s) => Math.log(s + lambda) - thetaLogDenom));
    }

    this.params = { labels, pi, theta };
    return this.params;
  }

  /** Unnormalised log posterior per label, in label order */
  logPosteriors(features: number[]): number[] {
    return this.params.labels.map((_, c) => {
      let score = this.params.pi[c];
      const row = this.params.theta[c];
      for (let j = 0; j < row.length; j++) {
        const x = features[j] ?? 0;
        // an unseen feature has theta = -Infinity when lambda is 0
        if (x !== 0) score += row[j] * x;
      }
      return score;
    });
  }

  predictOne(features: number[]): number {
    if (this.params.labels.length === 0) {
      throw new Error('Naive Bayes model is not trained');
    }
    assertNonNegative(features);

    const scores = this.logPosteriors(features);
    let best = 0;
    for (let c = 1; c < scores.length; c++) {
      if (Number.isNaN(scores[best]) || scores[c] > scores[best]) best = c;
    }
    return this.params.labels[best];
  }
}
