import { InvalidInputError } from '../errors';
import { GameResult, RatingMap } from '../types/markets';
import { RatingEstimator, RatingFit, emptyRatings, ratingOf } from './ratingEstimator';

export interface EloOptions {
  /** Update size in points per unit of outcome error. */
  k: number;
  hfaPoints: number;
  /** Passes over the full result list. */
  iters: number;
  /** Larger = flatter rating-difference -> win-probability curve. */
  scalePts: number;
  movEnabled: boolean;
  movScalePts: number;
  movCap: number;
}

export const DEFAULT_ELO_OPTIONS: EloOptions = {
  k: 20,
  hfaPoints: 2.0,
  iters: 2,
  scalePts: 13,
  movEnabled: false,
  movScalePts: 7,
  movCap: 2,
};

/**
 * Logistic stand-in for the Normal CDF: 1 / (1 + exp(-1.7 * diff / scale)).
 */
export function winProbFromRatingDiff(diffPts: number, scalePts: number = 13): number {
  return 1 / (1 + Math.exp(-(diffPts / scalePts) * 1.7));
}

/**
 * Margin-of-victory multiplier: grows with ln(1 + |margin| / scale) and is
 * capped at `cap`.
 */
export function movMultiplier(margin: number, scalePts: number, cap: number): number {
  return Math.min(cap, 1 + Math.log(1 + Math.abs(margin) / scalePts));
}

function gameOutcome(homePoints: number, awayPoints: number): number {
  if (homePoints > awayPoints) return 1;
  if (homePoints < awayPoints) return 0;
  return 0.5;
}

/**
 * Elo-style fitter on final scores. Every pass walks the results in the order
 * given, so the fit converges from a cold start rather than tracking ratings
 * through a season; for a chronological history pass date-sorted results with
 * iters = 1.
 *
 * Per game:
 *   diff = (R_home + hfa) - R_away
 *   err  = outcome - winProb(diff)
 *   R_home += k * mult * err;  R_away -= k * mult * err
 */
export class EloRatingFit implements RatingEstimator {
  readonly name = 'elo';
  private readonly options: EloOptions;

  constructor(options: Partial<EloOptions> = {}) {
    this.options = { ...DEFAULT_ELO_OPTIONS, ...options };
    const { k, scalePts, movScalePts, movCap, iters } = this.options;
    if (!(k > 0)) throw new InvalidInputError('k', k, 'must be > 0');
    if (!(scalePts > 0)) throw new InvalidInputError('scalePts', scalePts, 'must be > 0');
    if (!Number.isInteger(iters) || iters < 0) {
      throw new InvalidInputError('iters', iters, 'must be a non-negative integer');
    }
    if (this.options.movEnabled) {
      if (!(movScalePts > 0)) throw new InvalidInputError('movScalePts', movScalePts, 'must be > 0');
      if (!(movCap >= 1)) throw new InvalidInputError('movCap', movCap, 'must be >= 1');
    }
  }

  fit(results: readonly GameResult[], startRatings: RatingMap = {}): RatingFit {
    const { k, hfaPoints, iters, scalePts, movEnabled, movScalePts, movCap } = this.options;
    const ratings: RatingMap = Object.assign(emptyRatings(), startRatings);

    for (let pass = 0; pass < Math.max(1, iters); pass++) {
      for (const game of results) {
        const { homeTeam, awayTeam, homePoints, awayPoints } = game;
        const diff = ratingOf(ratings, homeTeam) + hfaPoints - ratingOf(ratings, awayTeam);
        const err = gameOutcome(homePoints, awayPoints) - winProbFromRatingDiff(diff, scalePts);
        const mult = movEnabled ? movMultiplier(homePoints - awayPoints, movScalePts, movCap) : 1;
        const delta = k * mult * err;

        ratings[homeTeam] = ratingOf(ratings, homeTeam) + delta;
        ratings[awayTeam] = ratingOf(ratings, awayTeam) - delta;
      }
    }

    return { ratings };
  }
}
