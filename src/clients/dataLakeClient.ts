import * as fs from 'fs';
import * as path from 'path';
import { CsvRow, formatCsv, parseCsv } from '../lib/csv';
import { logger } from '../lib/logger';
import { formatAmerican } from '../lib/odds';
import { emptyRatings } from '../services/ratingEstimator';
import { GameOdds, GameResult, MarketQuote, RatingMap, Ticket } from '../types/markets';

export type Layer = 'bronze' | 'silver' | 'gold';

export const TICKET_HEADERS = [
  'game_id',
  'market',
  'side_or_bet',
  'odds_am',
  'odds_dec',
  'line',
  'fair_prob',
  'model_prob',
  'edge',
  'ev_per_dollar',
  'kelly_stake',
  'mc_prob',
  'ci_lo',
  'ci_hi',
] as const;

/**
 * Partition directory such as data/bronze/league=NFL/season=2025/week=1.
 * Without a week the season directory is returned.
 */
export function partPath(root: string, layer: Layer, league: string, season: number, week?: number): string {
  const base = path.join(root, layer, `league=${league}`, `season=${season}`);
  return week === undefined ? base : path.join(base, `week=${week}`);
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(file, 'utf8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function parseScore(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return Number(raw);
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  return Number(raw);
}

function signed(value: number, digits: number): string {
  const text = value.toFixed(digits);
  return value >= 0 ? `+${text}` : text;
}

/** Reads and writes the CSV files of the bronze/silver/gold layout. */
export class DataLakeClient {
  constructor(private readonly root: string) {}

  partition(layer: Layer, league: string, season: number, week?: number): string {
    return partPath(this.root, layer, league, season, week);
  }

  /**
   * Historical results. Headers are matched case- and space-insensitively
   * (`Home Pts`, `home_points`); rows without both team names or with scores
   * that are not non-negative integers are skipped. A missing file reads as
   * no results.
   */
  async loadResults(file: string): Promise<GameResult[]> {
    const text = await readIfExists(file);
    if (text === null) return [];

    const results: GameResult[] = [];
    let skipped = 0;
    for (const row of parseCsv(text)) {
      const homePoints = parseScore(row.home_pts ?? row.home_points);
      const awayPoints = parseScore(row.away_pts ?? row.away_points);
      const homeTeam = row.home_team ?? '';
      const awayTeam = row.away_team ?? '';
      if (homePoints === null || awayPoints === null || !homeTeam || !awayTeam) {
        skipped++;
        continue;
      }
      results.push({ date: row.date ?? '', homeTeam, awayTeam, homePoints, awayPoints });
    }

    if (skipped > 0) {
      logger.warn('results', `skipped ${skipped} unparsable rows in ${file}`);
    }
    return results;
  }

  /**
   * Odds board with one row per game:
   * game_id,home_team,away_team,home_ml,away_ml,home_spread,home_spread_price,
   * away_spread_price,total_line,over_price,under_price.
   * A blank price leaves that leg off the board; the away spread line is the
   * negated home line.
   */
  async loadOdds(file: string): Promise<GameOdds[]> {
    const text = await readIfExists(file);
    if (text === null) return [];
    return parseCsv(text).map((row) => this.toGameOdds(row));
  }

  private toGameOdds(row: CsvRow): GameOdds {
    const gameId = row.game_id ?? '';
    const quotes: MarketQuote[] = [];
    const push = (quote: Omit<MarketQuote, 'gameId' | 'americanPrice'>, rawPrice: string | undefined): void => {
      const americanPrice = parseNumber(rawPrice);
      if (americanPrice !== undefined) {
        quotes.push({ gameId, americanPrice, ...quote });
      }
    };

    push({ kind: 'ML', side: 'HOME' }, row.home_ml);
    push({ kind: 'ML', side: 'AWAY' }, row.away_ml);

    const homeSpread = parseNumber(row.home_spread);
    if (homeSpread !== undefined) {
      push({ kind: 'ATS', side: 'HOME', line: homeSpread }, row.home_spread_price);
      push({ kind: 'ATS', side: 'AWAY', line: -homeSpread }, row.away_spread_price);
    }

    const totalLine = parseNumber(row.total_line);
    if (totalLine !== undefined) {
      push({ kind: 'OU', side: 'OVER', line: totalLine }, row.over_price);
      push({ kind: 'OU', side: 'UNDER', line: totalLine }, row.under_price);
    }

    return { gameId, homeTeam: row.home_team ?? '', awayTeam: row.away_team ?? '', quotes };
  }

  /** `team,rating` pairs; a missing file reads as an empty map. */
  async loadRatings(file: string): Promise<RatingMap> {
    const text = await readIfExists(file);
    const ratings = emptyRatings();
    if (text === null) return ratings;

    for (const row of parseCsv(text)) {
      const rating = parseNumber(row.rating);
      if (!row.team || rating === undefined || !Number.isFinite(rating)) continue;
      ratings[row.team] = rating;
    }
    return ratings;
  }

  async writeRatings(file: string, ratings: RatingMap): Promise<void> {
    const rows = Object.keys(ratings)
      .sort()
      .map((team) => ({ team, rating: String(ratings[team]) }));
    await ensureDir(path.dirname(file));
    await fs.promises.writeFile(file, formatCsv(['team', 'rating'], rows), 'utf8');
  }

  async writeTickets(file: string, tickets: readonly Ticket[]): Promise<void> {
    await ensureDir(path.dirname(file));
    await fs.promises.writeFile(file, formatCsv(TICKET_HEADERS, tickets.map(ticketRow)), 'utf8');
  }
}

export function ticketRow(ticket: Ticket): Record<string, string> {
  let line = '';
  if (ticket.line !== undefined) {
    line = ticket.market === 'ATS' ? signed(ticket.line, 1) : ticket.line.toFixed(1);
  }
  return {
    game_id: ticket.gameId,
    market: ticket.market,
    side_or_bet: ticket.side,
    odds_am: formatAmerican(ticket.americanPrice),
    odds_dec: ticket.decimalPrice.toFixed(4),
    line,
    fair_prob: ticket.fairProbability.toFixed(4),
    model_prob: ticket.modelProbability.toFixed(4),
    edge: signed(ticket.edge, 4),
    ev_per_dollar: signed(ticket.evPerDollar, 4),
    kelly_stake: ticket.kellyStake.toFixed(2),
    mc_prob: ticket.mcProbability === undefined ? '' : ticket.mcProbability.toFixed(4),
    ci_lo: ticket.confidenceLo === undefined ? '' : ticket.confidenceLo.toFixed(4),
    ci_hi: ticket.confidenceHi === undefined ? '' : ticket.confidenceHi.toFixed(4),
  };
}
