import { InvalidOddsError, InvalidProbabilityError } from '../errors';

function assertAmerican(odds: number): void {
  if (!Number.isInteger(odds) || odds === 0) {
    throw new InvalidOddsError('americanOdds', odds, 'must be a nonzero integer');
  }
}

/**
 * Convert American odds to decimal odds
 * @param odds - American odds (e.g., -120, +150)
 * @returns Decimal odds, always > 1 (e.g., 1.8333, 2.5)
 */
export function americanToDecimal(odds: number): number {
  assertAmerican(odds);
  if (odds > 0) {
    return 1 + odds / 100;
  } else {
    return 1 + 100 / Math.abs(odds);
  }
}

/**
 * Convert American odds to implied probability
 * @param odds - American odds (e.g., -150, +200)
 * @returns Implied probability as a decimal (0-1)
 */
export function impliedProbabilityFromAmerican(odds: number): number {
  assertAmerican(odds);
  if (odds > 0) {
    return 100 / (odds + 100);
  } else {
    return (-odds) / ((-odds) + 100);
  }
}

/**
 * Normalize the two implied probabilities of a two-way market so they sum to 1,
 * removing the bookmaker margin. Relative order of the inputs is preserved.
 * @example removeVigTwoWay(0.54, 0.50) // [0.5192, 0.4808]
 */
export function removeVigTwoWay(probA: number, probB: number): [number, number] {
  if (!(probA > 0)) {
    throw new InvalidProbabilityError('probA', probA, 'must be > 0');
  }
  if (!(probB > 0)) {
    throw new InvalidProbabilityError('probB', probB, 'must be > 0');
  }
  const total = probA + probB;
  return [probA / total, probB / total];
}

/**
 * Convert implied probability to American odds
 * @param probability - Implied probability as a decimal (0-1)
 * @returns American odds
 */
export function americanOddsFromProbability(probability: number): number {
  if (!(probability > 0 && probability < 1)) {
    throw new InvalidProbabilityError('probability', probability, 'must be in (0,1)');
  }
  if (probability >= 0.5) {
    return Math.round(-100 * probability / (1 - probability));
  } else {
    return Math.round(100 * (1 - probability) / probability);
  }
}

/** Signed American price as books print it: +150, -120. */
export function formatAmerican(odds: number): string {
  return odds > 0 ? `+${odds}` : `${odds}`;
}
