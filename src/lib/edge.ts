import { InvalidInputError, InvalidProbabilityError, InvalidOddsError } from '../errors';

const BREAKEVEN_TOLERANCE = 1e-12;

export interface EvAndEdge {
  /** Expected profit per $1 wagered (0.05 = +5 cents per $1). */
  evPerDollar: number;
  /** modelProb - fairProb, in absolute probability points. */
  edge: number;
}

function assertOpenUnit(field: string, value: number): void {
  if (!(value > 0 && value < 1)) {
    throw new InvalidProbabilityError(field, value, 'must be in (0,1)');
  }
}

function assertDecimalPrice(value: number): void {
  if (!(value > 1) || !Number.isFinite(value)) {
    throw new InvalidOddsError('decimalPrice', value, 'must be > 1');
  }
}

export function evAndEdge(modelProb: number, fairProb: number, decimalPrice: number): EvAndEdge {
  assertOpenUnit('modelProb', modelProb);
  assertOpenUnit('fairProb', fairProb);
  assertDecimalPrice(decimalPrice);

  const b = decimalPrice - 1; // net payout ratio
  const evPerDollar = modelProb * b - (1 - modelProb);
  return { evPerDollar, edge: modelProb - fairProb };
}

/**
 * Fractional Kelly stake in dollars.
 * @param pWin - model win probability
 * @param decimalPrice - market decimal odds (1.91 for -110)
 * @param fraction - share of full Kelly to stake, 0.33 is third-Kelly
 * @returns Stake >= 0; exactly 0 when the price offers no edge
 */
export function kellyFractional(
  pWin: number,
  decimalPrice: number,
  bankroll: number,
  fraction: number = 0.33
): number {
  assertOpenUnit('pWin', pWin);
  assertDecimalPrice(decimalPrice);
  if (!(bankroll >= 0) || !Number.isFinite(bankroll)) {
    throw new InvalidInputError('bankroll', bankroll, 'must be >= 0');
  }
  if (!(fraction > 0 && fraction <= 1)) {
    throw new InvalidInputError('fraction', fraction, 'must be in (0,1]');
  }

  const b = decimalPrice - 1;
  const kellyNumerator = b * pWin - (1 - pWin);
  // p = 1/decimal leaves rounding residue of a few ulps; that is still no edge.
  if (kellyNumerator <= BREAKEVEN_TOLERANCE * Math.max(1, b)) {
    return 0;
  }
  return bankroll * fraction * (kellyNumerator / b);
}
