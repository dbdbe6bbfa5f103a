import { Config } from '../config';
import { logger } from '../lib/logger';
import { GameResult, RatingMap } from '../types/markets';
import { EloRatingFit } from './eloRatingFit';
import { RatingEstimator, normalizeRatings } from './ratingEstimator';
import { RidgeRatingFit } from './ridgeRatingFit';

export function createRatingEstimator(ratings: Config['ratings'], hfaPoints: number): RatingEstimator {
  if (ratings.strategy === 'elo') {
    return new EloRatingFit({
      k: ratings.eloK,
      hfaPoints,
      iters: ratings.eloIters,
      scalePts: ratings.eloScalePts,
      movEnabled: ratings.movEnabled,
      movScalePts: ratings.movScalePts,
      movCap: ratings.movCap,
    });
  }
  return new RidgeRatingFit({
    hfaPoints,
    l2Lambda: ratings.l2Lambda,
    enforceSumZero: ratings.enforceSumZero,
  });
}

export class RatingService {
  private readonly estimator: RatingEstimator;

  constructor(private readonly settings: Config['ratings'], hfaPoints: number) {
    this.estimator = createRatingEstimator(settings, hfaPoints);
  }

  get strategy(): RatingEstimator['name'] {
    return this.estimator.name;
  }

  /**
   * Fit ratings from results, starting from `startRatings` where the strategy
   * uses them. Elo output lives on an arbitrary spread, so it is rescaled to
   * `targetStd` points when that is set. With no results the starting
   * ratings come back as they are.
   */
  refit(results: readonly GameResult[], startRatings: RatingMap): RatingMap {
    if (results.length === 0) {
      logger.info('ratings', 'no results to fit; keeping starting ratings');
      return { ...startRatings };
    }

    const { ratings } = this.estimator.fit(results, startRatings);
    const fitted =
      this.estimator.name === 'elo' && this.settings.targetStd > 0
        ? normalizeRatings(ratings, this.settings.targetStd)
        : ratings;

    logger.info(
      'ratings',
      `fit ${Object.keys(fitted).length} teams from ${results.length} games (strategy=${this.estimator.name})`
    );
    return fitted;
  }
}
