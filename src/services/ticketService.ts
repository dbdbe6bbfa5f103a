import { InvalidInputError, errorMessage } from '../errors';
import { evAndEdge, kellyFractional } from '../lib/edge';
import { logger } from '../lib/logger';
import { americanToDecimal, impliedProbabilityFromAmerican, removeVigTwoWay } from '../lib/odds';
import { deriveSeed } from '../lib/random';
import {
  GameOdds,
  MarketKind,
  MarketQuote,
  MarketSide,
  ProbabilityEstimate,
  Ticket,
} from '../types/markets';
import { ProbabilityModel } from './probabilityModel';

export interface TicketOptions {
  bankroll: number;
  kellyFraction: number;
  minEdgePct: number;
  minKellyStake: number;
  /** Monte Carlo draws per leg; 0 skips simulation. */
  mcN: number;
  mcSeed?: number;
}

// Closed-form probabilities saturate to exactly 0 or 1 in lopsided games.
const MODEL_PROBABILITY_FLOOR = 1e-6;

const MARKET_ORDER: Record<MarketKind, number> = { ML: 0, ATS: 1, OU: 2 };
const SIDE_ORDER: Record<MarketSide, number> = { HOME: 0, AWAY: 1, OVER: 2, UNDER: 3 };

const MARKET_SIDES: Record<MarketKind, [MarketSide, MarketSide]> = {
  ML: ['HOME', 'AWAY'],
  ATS: ['HOME', 'AWAY'],
  OU: ['OVER', 'UNDER'],
};

/** Deterministic output order: game id, then ML < ATS < OU, then side. */
export function compareTickets(a: Ticket, b: Ticket): number {
  if (a.gameId !== b.gameId) return a.gameId < b.gameId ? -1 : 1;
  if (a.market !== b.market) return MARKET_ORDER[a.market] - MARKET_ORDER[b.market];
  return SIDE_ORDER[a.side] - SIDE_ORDER[b.side];
}

function requireLine(quote: MarketQuote): number {
  if (quote.line === undefined || !Number.isFinite(quote.line)) {
    throw new InvalidInputError(`${quote.kind} ${quote.side} line`, quote.line, 'must be a finite number');
  }
  return quote.line;
}

function clampProbability(p: number): number {
  return Math.min(1 - MODEL_PROBABILITY_FLOOR, Math.max(MODEL_PROBABILITY_FLOOR, p));
}

function complement(estimate: ProbabilityEstimate): ProbabilityEstimate {
  return {
    pointEstimate: 1 - estimate.pointEstimate,
    confidenceLo: estimate.confidenceHi === undefined ? undefined : 1 - estimate.confidenceHi,
    confidenceHi: estimate.confidenceLo === undefined ? undefined : 1 - estimate.confidenceLo,
  };
}

export class TicketService {
  constructor(
    private readonly model: ProbabilityModel,
    private readonly options: TicketOptions
  ) {}

  /**
   * Evaluate every leg of every two-way market on the board and keep the legs
   * that clear both the edge and the stake thresholds. A leg that fails
   * validation is logged and skipped; the rest of the board still runs.
   */
  buildTickets(board: readonly GameOdds[]): Ticket[] {
    const tickets: Ticket[] = [];

    for (const game of board) {
      for (const kind of ['ML', 'ATS', 'OU'] as const) {
        const [sideA, sideB] = MARKET_SIDES[kind];
        const legA = game.quotes.find((q) => q.kind === kind && q.side === sideA);
        const legB = game.quotes.find((q) => q.kind === kind && q.side === sideB);
        if (!legA && !legB) continue;
        if (!legA || !legB) {
          logger.warn('tickets', `${game.gameId} ${kind}: missing one side of the market, skipped`);
          continue;
        }

        for (const [leg, other] of [
          [legA, legB],
          [legB, legA],
        ]) {
          try {
            const ticket = this.evaluateLeg(game, leg, other);
            if (this.passes(ticket)) {
              tickets.push(ticket);
            }
          } catch (error: unknown) {
            if (!(error instanceof InvalidInputError)) throw error;
            logger.warn('tickets', `${game.gameId} ${kind} ${leg.side}: ${errorMessage(error)}, skipped`);
          }
        }
      }
    }

    return tickets.sort(compareTickets);
  }

  private passes(ticket: Ticket): boolean {
    return ticket.edge >= this.options.minEdgePct && ticket.kellyStake >= this.options.minKellyStake;
  }

  private evaluateLeg(game: GameOdds, leg: MarketQuote, other: MarketQuote): Ticket {
    const [fairProbability] = removeVigTwoWay(
      impliedProbabilityFromAmerican(leg.americanPrice),
      impliedProbabilityFromAmerican(other.americanPrice)
    );
    const modelProbability = clampProbability(this.modelProbability(game, leg));
    const decimalPrice = americanToDecimal(leg.americanPrice);
    const { evPerDollar, edge } = evAndEdge(modelProbability, fairProbability, decimalPrice);
    const kellyStake = kellyFractional(
      modelProbability,
      decimalPrice,
      this.options.bankroll,
      this.options.kellyFraction
    );

    const ticket: Ticket = {
      gameId: game.gameId,
      market: leg.kind,
      side: leg.side,
      americanPrice: leg.americanPrice,
      decimalPrice,
      line: leg.kind === 'ML' ? undefined : leg.line,
      fairProbability,
      modelProbability,
      edge,
      evPerDollar,
      kellyStake,
    };

    if (this.options.mcN > 0) {
      const simulated = this.simulate(game, leg);
      ticket.mcProbability = simulated.pointEstimate;
      ticket.confidenceLo = simulated.confidenceLo;
      ticket.confidenceHi = simulated.confidenceHi;
    }
    return ticket;
  }

  /**
   * Spread lines are quoted from the leg's own side: home -2.5 covers when the
   * home margin exceeds 2.5, away +2.5 covers when it stays below 2.5.
   */
  private modelProbability(game: GameOdds, leg: MarketQuote): number {
    const { homeTeam, awayTeam } = game;
    switch (leg.kind) {
      case 'ML': {
        const home = this.model.winProbability(homeTeam, awayTeam);
        return leg.side === 'HOME' ? home : 1 - home;
      }
      case 'ATS': {
        const line = requireLine(leg);
        return leg.side === 'HOME'
          ? this.model.coverProbability(homeTeam, awayTeam, -line)
          : 1 - this.model.coverProbability(homeTeam, awayTeam, line);
      }
      case 'OU': {
        const over = this.model.overProbability(requireLine(leg));
        return leg.side === 'OVER' ? over : 1 - over;
      }
    }
  }

  private simulate(game: GameOdds, leg: MarketQuote): ProbabilityEstimate {
    const { homeTeam, awayTeam, gameId } = game;
    const { mcN, mcSeed } = this.options;
    const seed = mcSeed === undefined ? undefined : deriveSeed(mcSeed, `${gameId}:${leg.kind}:${leg.side}`);

    switch (leg.kind) {
      case 'ML': {
        const home = this.model.simulateWin(homeTeam, awayTeam, mcN, seed);
        return leg.side === 'HOME' ? home : complement(home);
      }
      case 'ATS': {
        const line = requireLine(leg);
        return leg.side === 'HOME'
          ? this.model.simulateCover(homeTeam, awayTeam, -line, mcN, seed)
          : complement(this.model.simulateCover(homeTeam, awayTeam, line, mcN, seed));
      }
      case 'OU': {
        const over = this.model.simulateOver(requireLine(leg), mcN, seed);
        return leg.side === 'OVER' ? over : complement(over);
      }
    }
  }
}
