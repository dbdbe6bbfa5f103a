import { InvalidInputError } from '../errors';
import { mcCiNormal } from '../lib/confidence';
import { normalCdf } from '../lib/normal';
import { createNormalSampler, randomSource } from '../lib/random';
import { ProbabilityEstimate, RatingMap } from '../types/markets';
import { ratingOf } from './ratingEstimator';

// ---------------------------
// Closed-form Normal helpers
// ---------------------------

/**
 * P(X > line) for X ~ N(mean, sigma²). With sigma <= 0 the distribution is a
 * point mass at `mean`: 1 above the line, 0 below, 0.5 on it.
 */
export function probOverNormal(mean: number, sigma: number, line: number): number {
  if (sigma <= 0) {
    return mean > line ? 1.0 : mean < line ? 0.0 : 0.5;
  }
  return 1.0 - normalCdf((line - mean) / sigma);
}

/** P(X < line) for X ~ N(mean, sigma²), same point-mass policy. */
export function probUnderNormal(mean: number, sigma: number, line: number): number {
  if (sigma <= 0) {
    return mean < line ? 1.0 : mean > line ? 0.0 : 0.5;
  }
  return normalCdf((line - mean) / sigma);
}

/**
 * P(home covers) where margin = home - away ~ N(meanDiff, sigmaDiff²).
 * A home line of -2.5 means P(margin > -2.5).
 */
export function probCoverSpread(meanDiff: number, sigmaDiff: number, homeSpread: number): number {
  return probOverNormal(meanDiff, sigmaDiff, homeSpread);
}

export function probTotalOver(meanTotal: number, sigmaTotal: number, totalLine: number): number {
  return probOverNormal(meanTotal, sigmaTotal, totalLine);
}

// ---------------------------
// Monte Carlo
// ---------------------------

function simulateOver(mean: number, sigma: number, threshold: number, n: number, seed?: number): number {
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidInputError('n', n, 'must be a positive integer');
  }
  if (sigma <= 0) {
    return probOverNormal(mean, sigma, threshold);
  }
  const sample = createNormalSampler(randomSource(seed));
  let over = 0;
  for (let i = 0; i < n; i++) {
    if (mean + sigma * sample() > threshold) over++;
  }
  return over / n;
}

/** Monte Carlo estimate of P(home margin > spread). */
export function simulateCoverSpread(
  meanDiff: number,
  sigma: number,
  spread: number,
  n: number = 10000,
  seed?: number
): number {
  return simulateOver(meanDiff, sigma, spread, n, seed);
}

/** Monte Carlo estimate of P(total points > line). */
export function simulateTotalOver(
  totalMean: number,
  sigmaTotal: number,
  line: number,
  n: number = 10000,
  seed?: number
): number {
  return simulateOver(totalMean, sigmaTotal, line, n, seed);
}

// ---------------------------
// Rating-driven model
// ---------------------------

export interface ProbabilityModelOptions {
  hfaPoints: number;
  sigmaDiff: number;
  sigmaTotal: number;
  leagueTotalMean: number;
}

export const DEFAULT_MODEL_OPTIONS: ProbabilityModelOptions = {
  hfaPoints: 2.0,
  sigmaDiff: 13.0,
  sigmaTotal: 10.0,
  leagueTotalMean: 45.0,
};

export class ProbabilityModel {
  private readonly ratings: RatingMap;
  readonly options: ProbabilityModelOptions;

  constructor(ratings: RatingMap = {}, options: Partial<ProbabilityModelOptions> = {}) {
    this.ratings = ratings;
    this.options = { ...DEFAULT_MODEL_OPTIONS, ...options };
  }

  /** Expected point differential, home minus away. */
  meanDiff(homeTeam: string, awayTeam: string): number {
    return ratingOf(this.ratings, homeTeam) - ratingOf(this.ratings, awayTeam) + this.options.hfaPoints;
  }

  winProbability(homeTeam: string, awayTeam: string): number {
    return probOverNormal(this.meanDiff(homeTeam, awayTeam), this.options.sigmaDiff, 0);
  }

  coverProbability(homeTeam: string, awayTeam: string, spreadLine: number): number {
    return probCoverSpread(this.meanDiff(homeTeam, awayTeam), this.options.sigmaDiff, spreadLine);
  }

  overProbability(totalLine: number, leagueMeanTotal: number = this.options.leagueTotalMean): number {
    return probTotalOver(leagueMeanTotal, this.options.sigmaTotal, totalLine);
  }

  simulateWin(homeTeam: string, awayTeam: string, n: number, seed?: number): ProbabilityEstimate {
    return this.withInterval(simulateCoverSpread(this.meanDiff(homeTeam, awayTeam), this.options.sigmaDiff, 0, n, seed), n);
  }

  simulateCover(homeTeam: string, awayTeam: string, spreadLine: number, n: number, seed?: number): ProbabilityEstimate {
    const pHat = simulateCoverSpread(this.meanDiff(homeTeam, awayTeam), this.options.sigmaDiff, spreadLine, n, seed);
    return this.withInterval(pHat, n);
  }

  simulateOver(
    totalLine: number,
    n: number,
    seed?: number,
    leagueMeanTotal: number = this.options.leagueTotalMean
  ): ProbabilityEstimate {
    return this.withInterval(simulateTotalOver(leagueMeanTotal, this.options.sigmaTotal, totalLine, n, seed), n);
  }

  private withInterval(pointEstimate: number, n: number): ProbabilityEstimate {
    const [confidenceLo, confidenceHi] = mcCiNormal(pointEstimate, n);
    return { pointEstimate, confidenceLo, confidenceHi };
  }
}
