import dotenv from 'dotenv';
import * as path from 'path';
import { InvalidInputError } from './errors';

// Load .env file from project root
dotenv.config({ path: path.resolve(__dirname, '..', '.env') });

export type RatingStrategy = 'ridge' | 'elo';

export interface Config {
  paths: {
    datalake: string;
  };
  model: {
    hfaPoints: number;
    sigmaDiff: number;
    sigmaTotal: number;
    leagueTotalMean: number;
  };
  ratings: {
    strategy: RatingStrategy;
    l2Lambda: number;
    enforceSumZero: boolean;
    eloK: number;
    eloIters: number;
    eloScalePts: number;
    movEnabled: boolean;
    movScalePts: number;
    movCap: number;
    /** Spread the Elo ratings are rescaled to; 0 leaves them as fitted. */
    targetStd: number;
  };
  betting: {
    bankroll: number;
    kellyFraction: number;
    minEdgePct: number;
    minKellyStake: number;
  };
  simulation: {
    /** Monte Carlo draws per market leg; 0 disables simulation. */
    n: number;
    seed?: number;
  };
  bot: {
    runScheduleCron?: string;
  };
}

type Env = Record<string, string | undefined>;

function getOptionalEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  return env[key] || defaultValue;
}

function getNumber(env: Env, key: string, defaultValue: number): number {
  const raw = getOptionalEnv(env, key);
  if (raw === undefined) return defaultValue;
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidInputError(key, raw, 'must be a number');
  }
  return value;
}

function getInteger(env: Env, key: string, defaultValue: number): number {
  const value = getNumber(env, key, defaultValue);
  if (!Number.isInteger(value)) {
    throw new InvalidInputError(key, value, 'must be an integer');
  }
  return value;
}

function getBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = getOptionalEnv(env, key);
  if (raw === undefined) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new InvalidInputError(key, raw, 'must be a boolean');
}

function getStrategy(env: Env): RatingStrategy {
  const raw = (getOptionalEnv(env, 'RATING_STRATEGY', 'ridge') || 'ridge').trim().toLowerCase();
  if (raw !== 'ridge' && raw !== 'elo') {
    throw new InvalidInputError('RATING_STRATEGY', raw, "must be 'ridge' or 'elo'");
  }
  return raw;
}

function requirePositive(key: string, value: number): void {
  if (!(value > 0)) {
    throw new InvalidInputError(key, value, 'must be > 0');
  }
}

/**
 * Read and validate the whole configuration once. Every option has a default,
 * so an empty environment yields a usable config.
 */
export function loadConfig(env: Env = process.env): Config {
  const seedRaw = getOptionalEnv(env, 'MC_SEED');

  const loaded: Config = {
    paths: {
      datalake: getOptionalEnv(env, 'DATALAKE_ROOT', './data') || './data',
    },
    model: {
      hfaPoints: getNumber(env, 'HFA_POINTS', 2.0),
      sigmaDiff: getNumber(env, 'SIGMA_DIFF', 13.0),
      sigmaTotal: getNumber(env, 'SIGMA_TOTAL', 10.0),
      leagueTotalMean: getNumber(env, 'LEAGUE_TOTAL_MEAN', 45.0),
    },
    ratings: {
      strategy: getStrategy(env),
      l2Lambda: getNumber(env, 'L2_LAMBDA', 4.0),
      enforceSumZero: getBoolean(env, 'ENFORCE_SUM_ZERO', true),
      eloK: getNumber(env, 'ELO_K', 20),
      eloIters: getInteger(env, 'ELO_ITERS', 2),
      eloScalePts: getNumber(env, 'ELO_SCALE_PTS', 13),
      movEnabled: getBoolean(env, 'MOV_ENABLED', true),
      movScalePts: getNumber(env, 'MOV_SCALE_PTS', 7),
      movCap: getNumber(env, 'MOV_CAP', 2),
      targetStd: getNumber(env, 'RATINGS_TARGET_STD', 7),
    },
    betting: {
      bankroll: getNumber(env, 'BANKROLL', 1000),
      kellyFraction: getNumber(env, 'KELLY_FRACTION', 0.33),
      minEdgePct: getNumber(env, 'MIN_EDGE_PCT', 0),
      minKellyStake: getNumber(env, 'MIN_KELLY_STAKE', 0),
    },
    simulation: {
      n: getInteger(env, 'MC_N', 0),
      seed: seedRaw === undefined ? undefined : getInteger(env, 'MC_SEED', 0),
    },
    bot: {
      runScheduleCron: getOptionalEnv(env, 'RUN_SCHEDULE_CRON'),
    },
  };

  requirePositive('SIGMA_DIFF', loaded.model.sigmaDiff);
  requirePositive('SIGMA_TOTAL', loaded.model.sigmaTotal);
  requirePositive('L2_LAMBDA', loaded.ratings.l2Lambda);
  requirePositive('ELO_K', loaded.ratings.eloK);
  requirePositive('ELO_ITERS', loaded.ratings.eloIters);
  requirePositive('ELO_SCALE_PTS', loaded.ratings.eloScalePts);
  requirePositive('MOV_SCALE_PTS', loaded.ratings.movScalePts);
  if (loaded.ratings.movCap < 1) {
    throw new InvalidInputError('MOV_CAP', loaded.ratings.movCap, 'must be >= 1');
  }
  if (loaded.ratings.targetStd < 0) {
    throw new InvalidInputError('RATINGS_TARGET_STD', loaded.ratings.targetStd, 'must be >= 0');
  }
  if (loaded.betting.bankroll < 0) {
    throw new InvalidInputError('BANKROLL', loaded.betting.bankroll, 'must be >= 0');
  }
  const { kellyFraction } = loaded.betting;
  if (!(kellyFraction > 0 && kellyFraction <= 1)) {
    throw new InvalidInputError('KELLY_FRACTION', kellyFraction, 'must be in (0,1]');
  }
  if (loaded.simulation.n < 0) {
    throw new InvalidInputError('MC_N', loaded.simulation.n, 'must be >= 0');
  }

  return loaded;
}
