import { InvalidInputError } from '../errors';
import { GameResult, RatingMap } from '../types/markets';
import { RatingEstimator, RatingFit, emptyRatings } from './ratingEstimator';

export interface RidgeOptions {
  hfaPoints: number;
  /** Gaussian prior precision; larger shrinks ratings harder toward 0. */
  l2Lambda: number;
  enforceSumZero: boolean;
}

export const DEFAULT_RIDGE_OPTIONS: RidgeOptions = {
  hfaPoints: 2.0,
  l2Lambda: 4.0,
  enforceSumZero: true,
};

function teamsIndex(results: readonly GameResult[]): Record<string, number> {
  const teams = new Set<string>();
  for (const game of results) {
    teams.add(game.homeTeam);
    teams.add(game.awayTeam);
  }
  const index: Record<string, number> = Object.create(null);
  Array.from(teams)
    .sort()
    .forEach((team, i) => {
      index[team] = i;
    });
  return index;
}

/**
 * Solve A x = b for symmetric positive-definite A by Cholesky factorization
 * (A = L Lᵀ), then forward and back substitution.
 */
export function solveSpd(a: number[][], b: number[]): number[] {
  const n = b.length;
  const l: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = 0; j <= i; j++) {
      let sum = a[i][j];
      for (let k = 0; k < j; k++) {
        sum -= l[i][k] * l[j][k];
      }
      if (i === j) {
        if (sum <= 0) {
          throw new InvalidInputError('matrix', sum, 'must be positive-definite');
        }
        l[i][i] = Math.sqrt(sum);
      } else {
        l[i][j] = sum / l[j][j];
      }
    }
  }

  const y = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    let sum = b[i];
    for (let k = 0; k < i; k++) sum -= l[i][k] * y[k];
    y[i] = sum / l[i][i];
  }

  const x = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = y[i];
    for (let k = i + 1; k < n; k++) sum -= l[k][i] * x[k];
    x[i] = sum / l[i][i];
  }
  return x;
}

/**
 * Ridge (MAP) fit of net team strength from point differentials:
 *   y = homePoints - awayPoints - hfa ≈ R_home - R_away + ε
 * with prior R ~ N(0, τ²I), i.e. penalty λ = σ²/τ².
 *
 * Each game row has +1 in the home column and -1 in the away column, so
 * XᵀX is the schedule Laplacian and is built directly without materializing X.
 */
export class RidgeRatingFit implements RatingEstimator {
  readonly name = 'ridge';
  private readonly options: RidgeOptions;

  constructor(options: Partial<RidgeOptions> = {}) {
    this.options = { ...DEFAULT_RIDGE_OPTIONS, ...options };
    if (!(this.options.l2Lambda > 0) || !Number.isFinite(this.options.l2Lambda)) {
      throw new InvalidInputError('l2Lambda', this.options.l2Lambda, 'must be > 0');
    }
  }

  // Closed-form batch fit: starting ratings do not enter the solution.
  fit(results: readonly GameResult[], _startRatings?: RatingMap): RatingFit {
    if (results.length === 0) {
      return { ratings: {}, teamIndex: {} };
    }

    const { hfaPoints, l2Lambda, enforceSumZero } = this.options;
    const index = teamsIndex(results);
    const nTeams = Object.keys(index).length;

    const xtx: number[][] = Array.from({ length: nTeams }, () => new Array<number>(nTeams).fill(0));
    const xty = new Array<number>(nTeams).fill(0);

    for (const game of results) {
      const h = index[game.homeTeam];
      const a = index[game.awayTeam];
      const y = game.homePoints - game.awayPoints - hfaPoints;
      if (h === a) continue; // a team cannot play itself; the row would be all zeros
      xtx[h][h] += 1;
      xtx[a][a] += 1;
      xtx[h][a] -= 1;
      xtx[a][h] -= 1;
      xty[h] += y;
      xty[a] -= y;
    }
    for (let i = 0; i < nTeams; i++) {
      xtx[i][i] += l2Lambda;
    }

    let beta = solveSpd(xtx, xty);
    if (enforceSumZero) {
      const mean = beta.reduce((sum, value) => sum + value, 0) / nTeams;
      beta = beta.map((value) => value - mean);
    }

    const ratings = emptyRatings();
    for (const [team, j] of Object.entries(index)) {
      ratings[team] = beta[j];
    }
    return { ratings, teamIndex: index };
  }
}
