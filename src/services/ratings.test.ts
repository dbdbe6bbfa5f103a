import { RidgeRatingFit, solveSpd } from './ridgeRatingFit';
import { EloRatingFit, movMultiplier, winProbFromRatingDiff } from './eloRatingFit';
import { normalizeRatings, ratingOf } from './ratingEstimator';
import { GameResult, RatingMap } from '../types/markets';
import { InvalidInputError } from '../errors';

function game(homeTeam: string, awayTeam: string, homePoints: number, awayPoints: number): GameResult {
  return { date: '2024-09-08', homeTeam, awayTeam, homePoints, awayPoints };
}

function sum(ratings: RatingMap): number {
  return Object.values(ratings).reduce((total, value) => total + value, 0);
}

describe('RidgeRatingFit', () => {
  const results = [game('A', 'B', 28, 20), game('A', 'B', 24, 17), game('B', 'A', 14, 21)];

  it('should rate the repeat winner above its opponent', () => {
    const { ratings } = new RidgeRatingFit({ hfaPoints: 2, l2Lambda: 4 }).fit(results);
    expect(ratings.A).toBeGreaterThan(ratings.B);
  });

  it('should solve the normal equations exactly for a two-team schedule', () => {
    // XᵀX + 4I = [[7, -3], [-3, 7]], Xᵀy = [20, -20]
    const { ratings } = new RidgeRatingFit({ hfaPoints: 2, l2Lambda: 4 }).fit(results);
    expect(ratings.A).toBeCloseTo(2, 9);
    expect(ratings.B).toBeCloseTo(-2, 9);
  });

  it('should sum to zero when requested', () => {
    const league = [
      game('A', 'B', 31, 10),
      game('C', 'D', 20, 17),
      game('B', 'C', 13, 27),
      game('D', 'A', 21, 24),
      game('E', 'A', 3, 38),
    ];
    const { ratings } = new RidgeRatingFit({ enforceSumZero: true }).fit(league);
    expect(Math.abs(sum(ratings))).toBeLessThan(1e-6);
    expect(Object.keys(ratings).sort()).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('should rate a team higher the larger its winning margins', () => {
    const narrow = new RidgeRatingFit().fit([game('A', 'B', 21, 20), game('B', 'A', 17, 20)]);
    const wide = new RidgeRatingFit().fit([game('A', 'B', 35, 10), game('B', 'A', 10, 31)]);
    expect(wide.ratings.A - wide.ratings.B).toBeGreaterThan(narrow.ratings.A - narrow.ratings.B);
    expect(wide.ratings.A).toBeGreaterThan(wide.ratings.B);
  });

  it('should solve with fewer games than teams', () => {
    const { ratings } = new RidgeRatingFit().fit([game('A', 'B', 24, 10), game('C', 'D', 17, 14)]);
    expect(Object.values(ratings).every(Number.isFinite)).toBe(true);
  });

  it('should expose the sorted team index', () => {
    const { teamIndex } = new RidgeRatingFit().fit([game('Jets', 'Bills', 10, 20)]);
    expect(teamIndex).toEqual({ Bills: 0, Jets: 1 });
  });

  it('should ignore starting ratings', () => {
    const fit = new RidgeRatingFit();
    const cold = fit.fit(results);
    const warm = fit.fit(results, { A: 50, B: -50 });
    expect(warm.ratings).toEqual(cold.ratings);
  });

  it('should return empty maps for no results', () => {
    expect(new RidgeRatingFit().fit([])).toEqual({ ratings: {}, teamIndex: {} });
  });

  it('should reject a non-positive penalty', () => {
    expect(() => new RidgeRatingFit({ l2Lambda: 0 })).toThrow(InvalidInputError);
  });
});

describe('solveSpd', () => {
  it('should solve a small positive-definite system', () => {
    const x = solveSpd(
      [
        [4, 2],
        [2, 3],
      ],
      [10, 8]
    );
    // 4x + 2y = 10, 2x + 3y = 8 -> x = 1.75, y = 1.5
    expect(x[0]).toBeCloseTo(1.75, 12);
    expect(x[1]).toBeCloseTo(1.5, 12);
  });
});

describe('EloRatingFit', () => {
  it('should push the better team up', () => {
    const { ratings } = new EloRatingFit({ k: 20, hfaPoints: 2, iters: 2 }).fit([
      game('A', 'B', 27, 10),
      game('A', 'B', 24, 20),
    ]);
    expect(ratings.A).toBeGreaterThan(ratings.B);
  });

  it('should keep ratings close to the start after a tie', () => {
    const { ratings } = new EloRatingFit({ k: 20, iters: 1 }).fit([game('A', 'B', 21, 21)]);
    expect(Math.abs(ratings.A)).toBeLessThan(5);
    expect(Math.abs(ratings.B)).toBeLessThan(5);
  });

  it('should apply the single-game update exactly', () => {
    const { ratings } = new EloRatingFit({ k: 20, hfaPoints: 0, iters: 1 }).fit([game('A', 'B', 10, 7)]);
    // diff = 0 -> expected 0.5, err = 0.5, delta = 10
    expect(ratings.A).toBeCloseTo(10, 12);
    expect(ratings.B).toBeCloseTo(-10, 12);
  });

  it('should move ratings further for a blowout when MOV weighting is on', () => {
    const options = { k: 20, movEnabled: true, movScalePts: 7, movCap: 2 };
    const narrow = new EloRatingFit(options).fit([game('A', 'B', 21, 20)]).ratings;
    const blowout = new EloRatingFit(options).fit([game('A', 'B', 42, 14)]).ratings;
    expect(blowout.A - blowout.B).toBeGreaterThan(narrow.A - narrow.B);
  });

  it('should treat margins alike when MOV weighting is off', () => {
    const narrow = new EloRatingFit().fit([game('A', 'B', 21, 20)]).ratings;
    const blowout = new EloRatingFit().fit([game('A', 'B', 42, 14)]).ratings;
    expect(blowout.A).toBeCloseTo(narrow.A, 12);
  });

  it('should keep every update zero-sum', () => {
    const start = { A: 3, B: -1 };
    const { ratings } = new EloRatingFit({ iters: 3 }).fit(
      [game('A', 'B', 17, 24), game('C', 'A', 30, 3), game('B', 'C', 20, 20)],
      start
    );
    expect(sum(ratings)).toBeCloseTo(2, 9);
  });

  it('should not mutate the starting ratings', () => {
    const start = { A: 1.5 };
    new EloRatingFit().fit([game('A', 'B', 7, 3)], start);
    expect(start).toEqual({ A: 1.5 });
  });

  it('should run at least one pass', () => {
    const once = new EloRatingFit({ iters: 1 }).fit([game('A', 'B', 7, 3)]).ratings;
    const zero = new EloRatingFit({ iters: 0 }).fit([game('A', 'B', 7, 3)]).ratings;
    expect(zero).toEqual(once);
  });

  it('should return the starting map for no results', () => {
    expect(new EloRatingFit().fit([], { A: 2 }).ratings).toEqual({ A: 2 });
  });

  it('should reject a negative pass count', () => {
    expect(() => new EloRatingFit({ iters: -1 })).toThrow('iters must be a non-negative integer (got -1)');
  });

  it('should rate teams whose names shadow object members', () => {
    const { ratings } = new EloRatingFit({ k: 20, hfaPoints: 0, iters: 1 }).fit([game('constructor', 'toString', 10, 7)]);
    expect(ratingOf(ratings, 'constructor')).toBeCloseTo(10, 12);
    expect(ratingOf(ratings, 'toString')).toBeCloseTo(-10, 12);
  });
});

describe('elo helpers', () => {
  it('should give even odds at zero difference', () => {
    expect(winProbFromRatingDiff(0)).toBe(0.5);
    expect(winProbFromRatingDiff(13)).toBeCloseTo(1 / (1 + Math.exp(-1.7)), 12);
  });

  it('should cap the MOV multiplier', () => {
    expect(movMultiplier(0, 7, 2)).toBe(1);
    expect(movMultiplier(7, 7, 2)).toBeCloseTo(1 + Math.log(2), 12);
    expect(movMultiplier(-70, 7, 2)).toBe(2);
  });
});

describe('normalizeRatings', () => {
  it('should center and rescale to the target spread', () => {
    const normalized = normalizeRatings({ A: 3, B: 1, C: -1 }, 7);
    const values = Object.values(normalized);
    const mean = values.reduce((a, b) => a + b, 0) / values.length;
    const std = Math.sqrt(values.reduce((a, b) => a + (b - mean) ** 2, 0) / values.length);
    expect(mean).toBeCloseTo(0, 12);
    expect(std).toBeCloseTo(7, 12);
    expect(normalized.B).toBeCloseTo(0, 12);
    expect(normalized.A).toBeCloseTo(2 * 7 / Math.sqrt(8 / 3), 12);
  });

  it('should only center a map with no spread', () => {
    expect(normalizeRatings({ A: 5, B: 5 })).toEqual({ A: 0, B: 0 });
  });

  it('should return an empty map unchanged', () => {
    expect(normalizeRatings({})).toEqual({});
  });

  it('should reject a negative target spread', () => {
    expect(() => normalizeRatings({ A: 3, B: 1 }, -7)).toThrow('targetStd must be >= 0 (got -7)');
  });
});

describe('ratingOf', () => {
  it('should rate unseen teams 0, including inherited member names', () => {
    expect(ratingOf({ A: 3 }, 'A')).toBe(3);
    expect(ratingOf({}, 'B')).toBe(0);
    expect(ratingOf({}, 'constructor')).toBe(0);
    expect(ratingOf({}, '__proto__')).toBe(0);
  });
});
