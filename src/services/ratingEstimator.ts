import { InvalidInputError } from '../errors';
import { GameResult, RatingMap } from '../types/markets';

export interface RatingFit {
  ratings: RatingMap;
  /** Team -> design column, exposed for diagnostics by strategies that build one. */
  teamIndex?: Record<string, number>;
}

/**
 * A strategy that turns historical results into team ratings. Implementations
 * never mutate `startRatings`; the caller owns the returned map.
 */
export interface RatingEstimator {
  readonly name: 'ridge' | 'elo';
  fit(results: readonly GameResult[], startRatings?: RatingMap): RatingFit;
}

/** Prototype-free map, so team names such as `constructor` are plain keys. */
export function emptyRatings(): RatingMap {
  return Object.create(null);
}

export function ratingOf(ratings: RatingMap, team: string): number {
  return Object.prototype.hasOwnProperty.call(ratings, team) ? ratings[team] : 0;
}

/**
 * Recenter to mean 0 and rescale to a population standard deviation of
 * `targetStd`. A map with no spread comes back centered but unscaled.
 */
export function normalizeRatings(ratings: RatingMap, targetStd: number = 7): RatingMap {
  if (!(targetStd >= 0) || !Number.isFinite(targetStd)) {
    throw new InvalidInputError('targetStd', targetStd, 'must be >= 0');
  }
  const teams = Object.keys(ratings);
  if (teams.length === 0) return emptyRatings();

  const mean = teams.reduce((sum, team) => sum + ratings[team], 0) / teams.length;
  const centered = emptyRatings();
  for (const team of teams) {
    centered[team] = ratings[team] - mean;
  }

  const variance = teams.reduce((sum, team) => sum + centered[team] ** 2, 0) / teams.length;
  const std = Math.sqrt(variance);
  if (std <= 1e-12) return centered;

  const scale = targetStd / std;
  const scaled = emptyRatings();
  for (const team of teams) {
    scaled[team] = centered[team] * scale;
  }
  return scaled;
}
