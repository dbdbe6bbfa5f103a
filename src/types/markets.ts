export interface GameResult {
  date: string;
  homeTeam: string;
  awayTeam: string;
  homePoints: number; // non-negative integer
  awayPoints: number; // non-negative integer
}

/** Team name -> strength on a points scale. Teams not present rate 0. */
export type RatingMap = Record<string, number>;

export type MarketKind = 'ML' | 'ATS' | 'OU';

export type MarketSide = 'HOME' | 'AWAY' | 'OVER' | 'UNDER';

export interface MarketQuote {
  gameId: string;
  kind: MarketKind;
  side: MarketSide;
  americanPrice: number; // nonzero integer
  /**
   * Spread legs carry the line from that side's perspective (home -2.5,
   * away +2.5); totals legs carry the total. Moneyline legs have none.
   */
  line?: number;
}

/** One game on the odds board together with every quoted leg. */
export interface GameOdds {
  gameId: string;
  homeTeam: string;
  awayTeam: string;
  quotes: MarketQuote[];
}

export interface ProbabilityEstimate {
  pointEstimate: number;
  confidenceLo?: number;
  confidenceHi?: number;
}

export interface Ticket {
  gameId: string;
  market: MarketKind;
  side: MarketSide;
  americanPrice: number;
  decimalPrice: number;
  line?: number;
  fairProbability: number; // de-vigged market probability
  modelProbability: number;
  edge: number; // modelProbability - fairProbability
  evPerDollar: number;
  kellyStake: number; // dollars, never negative
  mcProbability?: number;
  confidenceLo?: number;
  confidenceHi?: number;
}
