import cron from 'node-cron';
import * as path from 'path';
import { Config, loadConfig } from './config';
import { DataLakeClient, ensureDir } from './clients/dataLakeClient';
import { errorMessage } from './errors';
import { colors, logger } from './lib/logger';
import { NotificationService } from './services/notificationService';
import { ProbabilityModel } from './services/probabilityModel';
import { RatingService } from './services/ratingService';
import { TicketService } from './services/ticketService';
import { Ticket } from './types/markets';

export interface RunArgs {
  league: string;
  season: number;
  week: number;
}

export interface RunSummary {
  ratingsCount: number;
  gamesCount: number;
  tickets: Ticket[];
  ticketsPath: string;
}

function formatTicket(ticket: Ticket): string {
  const edgeColor = ticket.edge > 0 ? colors.green : colors.gray;
  const line = ticket.line === undefined ? '' : ` ${ticket.line}`;
  return (
    `  ${colors.bright}${ticket.gameId}${colors.reset} ${ticket.market} ${ticket.side}${line} ` +
    `@ ${ticket.americanPrice > 0 ? '+' : ''}${ticket.americanPrice} ` +
    `${colors.gray}fair${colors.reset} ${ticket.fairProbability.toFixed(4)} ` +
    `${colors.gray}model${colors.reset} ${ticket.modelProbability.toFixed(4)} ` +
    `${edgeColor}edge ${ticket.edge.toFixed(4)}${colors.reset} ` +
    `${colors.gray}stake${colors.reset} $${ticket.kellyStake.toFixed(2)}`
  );
}

/**
 * One slate: starting ratings (silver) -> refit from results (bronze) ->
 * odds board (bronze) -> tickets (gold) -> digest.
 */
export async function runDailyPipeline(
  args: RunArgs,
  config: Config,
  notifier: NotificationService = new NotificationService()
): Promise<RunSummary> {
  const { league, season, week } = args;
  const { betting } = config;
  console.log(
    `\n${colors.bright}${colors.cyan}🏈 ${league} ${season} W${week}${colors.reset} ` +
      `${colors.gray}bankroll${colors.reset} $${betting.bankroll.toFixed(0)} ` +
      `${colors.gray}kelly${colors.reset} ${betting.kellyFraction} ` +
      `${colors.gray}min edge${colors.reset} ${betting.minEdgePct.toFixed(3)} ` +
      `${colors.gray}min stake${colors.reset} $${betting.minKellyStake.toFixed(2)}`
  );

  const lake = new DataLakeClient(config.paths.datalake);
  const bronze = lake.partition('bronze', league, season, week);
  const silver = lake.partition('silver', league, season, week);
  const gold = lake.partition('gold', league, season, week);
  for (const dir of [bronze, silver, gold]) {
    await ensureDir(dir);
  }

  const ratingsPath = path.join(silver, 'teams', 'ratings.csv');
  const startRatings = await lake.loadRatings(ratingsPath);
  logger.info('ratings', `loaded ${Object.keys(startRatings).length} team ratings from ${ratingsPath}`);

  const results = await lake.loadResults(path.join(bronze, 'results.csv'));
  const ratingService = new RatingService(config.ratings, config.model.hfaPoints);
  const ratings = ratingService.refit(results, startRatings);
  if (results.length > 0) {
    await lake.writeRatings(ratingsPath, ratings);
  }

  const model = new ProbabilityModel(ratings, config.model);
  const oddsPath = path.join(bronze, 'odds.csv');
  const board = await lake.loadOdds(oddsPath);
  if (board.length === 0) {
    logger.warn('odds', `no odds found at ${oddsPath}`);
  }

  const ticketService = new TicketService(model, {
    bankroll: betting.bankroll,
    kellyFraction: betting.kellyFraction,
    minEdgePct: betting.minEdgePct,
    minKellyStake: betting.minKellyStake,
    mcN: config.simulation.n,
    mcSeed: config.simulation.seed,
  });
  const tickets = ticketService.buildTickets(board);

  console.log(`\n${colors.bright}Tickets (filtered):${colors.reset}`);
  if (tickets.length === 0) {
    console.log(`  ${colors.gray}None${colors.reset}`);
  }
  for (const ticket of tickets) {
    console.log(formatTicket(ticket));
  }

  const ticketsPath = path.join(gold, 'tickets.csv');
  await lake.writeTickets(ticketsPath, tickets);
  logger.success('tickets', `saved ${tickets.length} tickets to ${ticketsPath}`);

  await notifier.sendTicketDigest(tickets, league, season, week);

  return {
    ratingsCount: Object.keys(ratings).length,
    gamesCount: board.length,
    tickets,
    ticketsPath,
  };
}

/**
 * `--season 2025 --week 1 [--league NFL]`
 */
export function parseArgs(argv: readonly string[]): RunArgs {
  const values = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag.startsWith('--')) {
      values.set(flag.slice(2), argv[i + 1] ?? '');
      i++;
    }
  }

  const league = (values.get('league') || 'NFL').toUpperCase();
  if (league !== 'NFL' && league !== 'CFB') {
    throw new Error(`--league must be NFL or CFB (got ${league})`);
  }
  const season = Number(values.get('season'));
  const week = Number(values.get('week'));
  if (!Number.isInteger(season)) {
    throw new Error('--season is required, e.g. --season 2025');
  }
  if (!Number.isInteger(week) || week < 0) {
    throw new Error('--week is required, e.g. --week 1');
  }
  return { league, season, week };
}

// Main execution for CLI usage only
async function main(): Promise<void> {
  const config = loadConfig();
  const args = parseArgs(process.argv.slice(2));

  // Run once immediately
  await runDailyPipeline(args, config);

  // Schedule recurring runs if cron expression is provided
  if (config.bot.runScheduleCron) {
    logger.info('pipeline', `scheduled with cron "${config.bot.runScheduleCron}"`);
    cron.schedule(config.bot.runScheduleCron, async () => {
      try {
        await runDailyPipeline(args, config);
      } catch (error: unknown) {
        logger.error('pipeline', errorMessage(error), error instanceof Error ? error.stack : undefined);
      }
    });
  } else {
    process.exit(0);
  }
}

// Only attach process handlers and start when this file is executed
// directly (e.g. "node dist/index.js"), not when imported.
if (require.main === module) {
  process.on('unhandledRejection', (error: unknown) => {
    logger.error('pipeline', `unhandled rejection: ${errorMessage(error)}`);
    process.exit(1);
  });

  process.on('SIGINT', () => {
    process.exit(0);
  });

  main().catch((error: unknown) => {
    logger.error('pipeline', errorMessage(error), error instanceof Error ? error.stack : undefined);
    process.exit(1);
  });
}
