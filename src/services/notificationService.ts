import { ticketRow } from '../clients/dataLakeClient';
import { errorMessage } from '../errors';
import { logger } from '../lib/logger';
import { americanOddsFromProbability, formatAmerican } from '../lib/odds';
import { Ticket } from '../types/markets';

const MAX_MESSAGE_LENGTH = 1000;

export interface TicketDigest {
  title: string;
  message: string;
}

/** Where a digest ends up. Delivery transports live outside this project. */
export interface DigestSink {
  send(digest: TicketDigest): Promise<void>;
}

export const logSink: DigestSink = {
  async send(digest: TicketDigest): Promise<void> {
    logger.info('digest', digest.title);
    for (const line of digest.message.split('\n')) {
      console.log(`  ${line}`);
    }
  },
};

/**
 * Best tickets first: highest edge, ties broken by the larger stake.
 */
export function selectTopTickets(tickets: readonly Ticket[], topN: number = 3): Ticket[] {
  return [...tickets]
    .sort((a, b) => b.edge - a.edge || b.kellyStake - a.kellyStake)
    .slice(0, Math.max(0, topN));
}

function formatTicketLine(ticket: Ticket): string {
  const row = ticketRow(ticket);
  const parts = [row.game_id, `${row.market} ${row.side_or_bet}`];
  if (row.line) {
    parts.push(`line ${row.line}`);
  }
  parts.push(
    `odds ${row.odds_am} (${row.odds_dec})`,
    `fair ${row.fair_prob}`,
    `model ${row.model_prob} (${formatAmerican(americanOddsFromProbability(ticket.modelProbability))})`
  );
  if (row.ci_lo && row.ci_hi) {
    parts.push(`CI [${row.ci_lo}..${row.ci_hi}]`);
  }
  parts.push(`edge ${row.edge}`, `EV ${row.ev_per_dollar}`, `stake $${row.kelly_stake}`);
  return parts.join(' · ');
}

export function buildTitleAndMessage(
  tickets: readonly Ticket[],
  league: string,
  season: number,
  week: number,
  topN: number = 3
): TicketDigest {
  const title = `Picks — ${league} ${season} W${week}`;
  const top = selectTopTickets(tickets, topN);
  if (top.length === 0) {
    return { title, message: 'No tickets passed filters.' };
  }

  let message = top.map(formatTicketLine).join('\n');
  if (message.length > MAX_MESSAGE_LENGTH) {
    message = message.slice(0, 980) + '\n…(truncated)';
  }
  return { title, message };
}

export class NotificationService {
  constructor(private readonly sink: DigestSink = logSink) {}

  /**
   * Send the top tickets for a slate through the configured sink.
   */
  async sendTicketDigest(tickets: readonly Ticket[], league: string, season: number, week: number, topN: number = 3): Promise<void> {
    const digest = buildTitleAndMessage(tickets, league, season, week, topN);

    try {
      await this.sink.send(digest);
    } catch (error: unknown) {
      throw new Error(`Failed to send ticket digest: ${errorMessage(error)}`);
    }
  }
}
