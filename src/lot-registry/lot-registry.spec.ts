import Decimal from 'decimal.js';
import { buy, EMPTY_REGISTRY, passthrough, sell, split, totalShares } from './lot-registry';
import { InsufficientSharesException } from '../common/exceptions/ledger.exceptions';
import { toDate } from '../common/utils/date.util';

describe('Lot registry', () => {
  const day1 = toDate('2024-01-01');
  const day2 = toDate('2024-01-02');
  const day3 = toDate('2024-01-03');

  const twoLots = () => buy(buy(EMPTY_REGISTRY, new Decimal(100), day1), new Decimal(50), day2);

  describe('buy', () => {
    it('should append a lot without touching the previous registry', () => {
      const before = buy(EMPTY_REGISTRY, new Decimal(100), day1);
      const after = buy(before, new Decimal(50), day2);

      expect(before).toHaveLength(1);
      expect(after).toHaveLength(2);
      expect(after[1].acquisitionDate).toEqual(day2);
      expect(after[1].shares.toNumber()).toBe(50);
    });

    it('should return frozen lots', () => {
      const registry = buy(EMPTY_REGISTRY, new Decimal(10), day1);

      expect(Object.isFrozen(registry)).toBe(true);
      expect(Object.isFrozen(registry[0])).toBe(true);
    });
  });

  describe('sell', () => {
    it('should consume the oldest lots first', () => {
      const { consumed, remaining } = sell(twoLots(), new Decimal(120), day3);

      expect(remaining).toHaveLength(1);
      expect(remaining[0].acquisitionDate).toEqual(day2);
      expect(remaining[0].shares.toNumber()).toBe(30);

      expect(consumed.map((l) => l.shares.toNumber())).toEqual([100, 20]);
      expect(consumed[1].acquisitionDate).toEqual(day2);
    });

    it('should remove a lot exactly when the amount matches it', () => {
      const { remaining } = sell(twoLots(), new Decimal(100), day3);

      expect(remaining).toHaveLength(1);
      expect(remaining[0].shares.toNumber()).toBe(50);
    });

    it('should empty the registry when selling everything', () => {
      const { consumed, remaining } = sell(twoLots(), new Decimal(150), day3);

      expect(remaining).toHaveLength(0);
      expect(totalShares(consumed).toNumber()).toBe(150);
    });

    it('should leave the input registry unchanged', () => {
      const registry = twoLots();
      sell(registry, new Decimal(120), day3);

      expect(registry.map((l) => l.shares.toNumber())).toEqual([100, 50]);
    });

    it('should throw when selling more than held', () => {
      expect(() => sell(twoLots(), new Decimal('150.01'), day3)).toThrow(InsufficientSharesException);
    });

    it('should throw when selling from an empty registry', () => {
      expect(() => sell(EMPTY_REGISTRY, new Decimal(1), day1)).toThrow(
        'Insufficient shares on 2024-01-01. Available: 0, Requested: 1',
      );
    });
  });

  describe('split', () => {
    it('should double the total and keep acquisition dates', () => {
      const registry = twoLots();
      const result = split(registry, new Decimal(2), day3);

      expect(totalShares(result).toNumber()).toBe(300);
      expect(result.map((l) => l.acquisitionDate)).toEqual([day1, day2]);
    });

    it('should round scaled lots to cents', () => {
      const registry = buy(EMPTY_REGISTRY, new Decimal('10.01'), day1);
      const result = split(registry, new Decimal('1.5'), day3);

      // 10.01 * 1.5 = 15.015
      expect(result[0].shares.toString()).toBe('15.02');
    });

    it('should reject a ratio that is not positive', () => {
      expect(() => split(twoLots(), new Decimal(0), day3)).toThrow(
        'Corporate action not recognized: split ratio 0 on 2024-01-03',
      );
    });
  });

  describe('passthrough', () => {
    it('should return an equal but distinct registry', () => {
      const registry = twoLots();
      const copy = passthrough(registry);

      expect(copy).not.toBe(registry);
      expect(copy).toEqual(registry);
    });
  });
});
