import {
  americanToDecimal,
  impliedProbabilityFromAmerican,
  removeVigTwoWay,
  americanOddsFromProbability,
  formatAmerican,
} from './odds';
import { InvalidOddsError, InvalidProbabilityError } from '../errors';

describe('odds', () => {
  describe('americanToDecimal', () => {
    it('should convert positive American odds to decimal', () => {
      expect(americanToDecimal(150)).toBeCloseTo(2.5, 9);
      expect(americanToDecimal(100)).toBe(2);
    });

    it('should convert negative American odds to decimal', () => {
      expect(americanToDecimal(-120)).toBeCloseTo(1 + 100 / 120, 9);
      expect(americanToDecimal(-120)).toBeCloseTo(1.8333, 4);
      expect(americanToDecimal(-200)).toBe(1.5);
    });

    it('should reject zero odds', () => {
      expect(() => americanToDecimal(0)).toThrow(InvalidOddsError);
    });

    it('should reject fractional odds', () => {
      expect(() => americanToDecimal(110.5)).toThrow(InvalidOddsError);
    });
  });

  describe('impliedProbabilityFromAmerican', () => {
    it('should convert positive American odds to probability', () => {
      expect(impliedProbabilityFromAmerican(200)).toBeCloseTo(100 / 300, 4);
      expect(impliedProbabilityFromAmerican(150)).toBeCloseTo(0.4, 9);
      expect(impliedProbabilityFromAmerican(100)).toBeCloseTo(0.5, 4);
    });

    it('should convert negative American odds to probability', () => {
      expect(impliedProbabilityFromAmerican(-120)).toBeCloseTo(120 / 220, 9);
      expect(impliedProbabilityFromAmerican(-150)).toBeCloseTo(150 / 250, 4);
      expect(impliedProbabilityFromAmerican(-100)).toBeCloseTo(0.5, 4);
    });

    it('should reject zero odds with the offending value', () => {
      expect(() => impliedProbabilityFromAmerican(0)).toThrow('americanOdds must be a nonzero integer (got 0)');
    });
  });

  describe('removeVigTwoWay', () => {
    it('should sum to one and keep the favourite ahead', () => {
      const home = impliedProbabilityFromAmerican(-120);
      const away = impliedProbabilityFromAmerican(110);
      const [homeFair, awayFair] = removeVigTwoWay(home, away);
      expect(Math.abs(homeFair + awayFair - 1)).toBeLessThan(1e-9);
      expect(homeFair).toBeGreaterThan(awayFair);
    });

    it('should normalize a simple overround', () => {
      const [a, b] = removeVigTwoWay(0.54, 0.5);
      expect(a).toBeCloseTo(0.5192, 4);
      expect(b).toBeCloseTo(0.4808, 4);
    });

    it('should preserve order for many pairs', () => {
      const pairs: Array<[number, number]> = [
        [0.1, 0.95],
        [0.5238, 0.5238],
        [0.01, 0.02],
        [0.7, 0.35],
      ];
      for (const [pA, pB] of pairs) {
        const [fairA, fairB] = removeVigTwoWay(pA, pB);
        expect(Math.abs(fairA + fairB - 1)).toBeLessThan(1e-9);
        expect(Math.sign(fairA - fairB)).toBe(Math.sign(pA - pB));
      }
    });

    it('should reject non-positive inputs', () => {
      expect(() => removeVigTwoWay(0, 0.5)).toThrow(InvalidProbabilityError);
      expect(() => removeVigTwoWay(0.5, -0.1)).toThrow(InvalidProbabilityError);
    });
  });

  describe('americanOddsFromProbability', () => {
    it('should convert probability to negative American odds when >= 0.5', () => {
      expect(americanOddsFromProbability(0.5)).toBe(-100);
      expect(americanOddsFromProbability(0.67)).toBeCloseTo(-203, 0);
      expect(americanOddsFromProbability(0.75)).toBe(-300);
    });

    it('should convert probability to positive American odds when < 0.5', () => {
      expect(americanOddsFromProbability(0.33)).toBeCloseTo(203, 0);
      expect(americanOddsFromProbability(0.25)).toBe(300);
      expect(americanOddsFromProbability(0.1)).toBe(900);
    });

    it('should reject probabilities outside (0,1)', () => {
      expect(() => americanOddsFromProbability(1)).toThrow(InvalidProbabilityError);
    });
  });

  describe('formatAmerican', () => {
    it('should sign positive prices', () => {
      expect(formatAmerican(150)).toBe('+150');
      expect(formatAmerican(-110)).toBe('-110');
    });
  });
});
