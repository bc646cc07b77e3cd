// src/experiments/application/SignificanceEngine.ts

/**
 * SignificanceEngine
 * ------------------
 * Pure application-layer component that estimates, for each variant, the
 * probability that it has the highest true conversion rate.
 *
 * Model:
 * - Beta(1, 1) prior per variant, conjugate update with visitors/conversions:
 *   a = 1 + conversions, b = 1 + visitors - conversions
 * - `samples` joint draws, one per variant per round; the round's maximum wins
 * - P(best) = wins / samples
 *
 * It has no persistence concerns; the plan service attaches the result to a plan.
 */

import type { BayesResult, Recommendation, VariantCounts } from '../domain/ExperimentPlan';
import { InvalidInputError } from '../domain/ExperimentErrors';
import { createRandomSource, sampleBeta } from './RandomSource';
import type { RandomSource, RandomSourceFactory } from './RandomSource';

export type SignificanceConfig = {
  /**
   * Monte-Carlo rounds when the caller does not pass a sample count.
   */
  defaultSamples: number;

  /**
   * Winner probability at or above which promotion is recommended.
   */
  promoteThreshold: number;

  /**
   * Below this many visitors on any variant, more data is recommended.
   */
  minVisitorsPerVariant: number;
};

export const DEFAULT_SIGNIFICANCE_CONFIG: SignificanceConfig = {
  defaultSamples: 20000,
  promoteThreshold: 0.95,
  minVisitorsPerVariant: 1000,
};

export type SignificanceResult = {
  bayes: BayesResult;
  recommendation: Recommendation;
};

type Posterior = {
  variantId: string;
  a: number;
  b: number;
};

export class SignificanceEngine {
  private readonly config: SignificanceConfig;
  private readonly randomSourceFactory: RandomSourceFactory;

  public constructor(
    options: {
      config?: SignificanceConfig;
      randomSourceFactory?: RandomSourceFactory;
    } = {},
  ) {
    this.config = options.config ?? DEFAULT_SIGNIFICANCE_CONFIG;
    this.randomSourceFactory = options.randomSourceFactory ?? (() => createRandomSource());
  }

  /**
   * Evaluate variant metrics. Map iteration order defines the baseline
   * (first entry) and breaks ties (first seen wins).
   */
  public evaluate(
    metrics: ReadonlyMap<string, VariantCounts>,
    samples: number = this.config.defaultSamples,
  ): SignificanceResult {
    const posteriors = this.buildPosteriors(metrics);
    assertSampleCount(samples);

    const probabilities = this.estimateWinProbabilities(
      posteriors,
      samples,
      this.randomSourceFactory(),
    );

    const meanRates: Record<string, number> = {};
    for (const p of posteriors) {
      meanRates[p.variantId] = p.a / (p.a + p.b);
    }

    const baselineMean = meanRates[posteriors[0].variantId];
    const relativeLiftVsBaseline: Record<string, number | null> = {};
    for (const p of posteriors) {
      relativeLiftVsBaseline[p.variantId] =
        baselineMean === 0 ? null : meanRates[p.variantId] / baselineMean - 1;
    }

    let winner = posteriors[0].variantId;
    for (const p of posteriors) {
      if (probabilities[p.variantId] > probabilities[winner]) {
        winner = p.variantId;
      }
    }

    const bayes: BayesResult = {
      winner,
      winnerProbability: probabilities[winner],
      probabilities,
      meanRates,
      relativeLiftVsBaseline,
    };

    return {
      bayes,
      recommendation: this.recommend(bayes, metrics),
    };
  }

  /**
   * Recommendation policy:
   * - promote_winner when the winner clears the threshold
   * - otherwise collect_more_data when any variant is under-sampled
   * - otherwise continue
   */
  private recommend(bayes: BayesResult, metrics: ReadonlyMap<string, VariantCounts>): Recommendation {
    if (bayes.winnerProbability >= this.config.promoteThreshold) {
      return 'promote_winner';
    }

    for (const counts of metrics.values()) {
      if (counts.visitors < this.config.minVisitorsPerVariant) {
        return 'collect_more_data';
      }
    }

    return 'continue';
  }

  private buildPosteriors(metrics: ReadonlyMap<string, VariantCounts>): Posterior[] {
    if (metrics.size === 0) {
      throw new InvalidInputError('Metrics must contain at least one variant');
    }

    const issues: string[] = [];
    const posteriors: Posterior[] = [];

    for (const [variantId, counts] of metrics) {
      if (!isCount(counts.visitors)) {
        issues.push(`"${variantId}.visitors" must be a non-negative integer.`);
        continue;
      }
      if (!isCount(counts.conversions)) {
        issues.push(`"${variantId}.conversions" must be a non-negative integer.`);
        continue;
      }
      if (counts.conversions > counts.visitors) {
        issues.push(
          `"${variantId}" has more conversions (${counts.conversions}) than visitors (${counts.visitors}).`,
        );
        continue;
      }

      posteriors.push({
        variantId,
        a: 1 + counts.conversions,
        b: 1 + counts.visitors - counts.conversions,
      });
    }

    if (issues.length > 0) {
      throw new InvalidInputError('Invalid significance metrics', issues);
    }

    return posteriors;
  }

  private estimateWinProbabilities(
    posteriors: Posterior[],
    samples: number,
    rng: RandomSource,
  ): Record<string, number> {
    const wins = new Array<number>(posteriors.length).fill(0);

    for (let round = 0; round < samples; round++) {
      let bestIndex = 0;
      let bestDraw = -Infinity;

      for (let i = 0; i < posteriors.length; i++) {
        const draw = sampleBeta(posteriors[i].a, posteriors[i].b, rng);
        if (draw > bestDraw) {
          bestDraw = draw;
          bestIndex = i;
        }
      }

      wins[bestIndex] += 1;
    }

    const probabilities: Record<string, number> = {};
    posteriors.forEach((p, i) => {
      probabilities[p.variantId] = wins[i] / samples;
    });

    return probabilities;
  }
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function assertSampleCount(samples: number): void {
  if (!Number.isInteger(samples) || samples < 1) {
    throw new InvalidInputError('Invalid sample count', [
      `"samples" must be an integer >= 1, got ${samples}.`,
    ]);
  }
}
