import { Test, TestingModule } from '@nestjs/testing';
import { LedgerReplayService, ReplayResult } from './ledger-replay.service';
import { createTestInstrument, instructions } from '../testing/instrument.fixtures';
import { totalShares } from '../lot-registry/lot-registry';
import { InstrumentQuoteProvider } from '../instrument/interfaces/instrument-provider.interface';
import {
  InsufficientSharesException,
  PrematureSellException,
  UnrecognizedCorporateActionException,
} from '../common/exceptions/ledger.exceptions';
import { addDays, formatDate, toDate } from '../common/utils/date.util';
import { ZERO } from '../common/utils/decimal.util';

describe('LedgerReplayService', () => {
  let service: LedgerReplayService;
  const end = toDate('2024-01-31');

  const entriesOf = (result: ReplayResult) =>
    result.entries.map((e) => ({ date: formatDate(e.date), cash: e.cash.toNumber(), shares: e.shares.toNumber() }));

  const lotsOf = (result: ReplayResult) =>
    result.snapshots[result.snapshots.length - 1].lots.map((l) => ({
      date: formatDate(l.acquisitionDate),
      shares: l.shares.toNumber(),
    }));

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [LedgerReplayService],
    }).compile();

    service = module.get<LedgerReplayService>(LedgerReplayService);
  });

  describe('purchases and redemptions', () => {
    it('should buy and fully redeem at a flat price', () => {
      const result = service.replay(
        createTestInstrument(),
        instructions([['2024-01-01', 1000], ['2024-01-05', -0.005]]),
        toDate('2024-01-10'),
      );

      expect(entriesOf(result)).toEqual([
        { date: '2024-01-01', cash: -1000, shares: 1000 },
        { date: '2024-01-05', cash: 1000, shares: -1000 },
      ]);
      expect(lotsOf(result)).toEqual([]);
    });

    it('should consume the oldest lots first on redemption by share count', () => {
      const result = service.replay(
        createTestInstrument(),
        instructions([['2024-01-01', 100], ['2024-01-02', 50], ['2024-01-03', -120]]),
        end,
      );

      expect(entriesOf(result)[2]).toEqual({ date: '2024-01-03', cash: 120, shares: -120 });
      expect(lotsOf(result)).toEqual([{ date: '2024-01-02', shares: 30 }]);
    });

    it('should redeem half of the holding for -0.0025', () => {
      const result = service.replay(
        createTestInstrument(),
        instructions([['2024-01-01', 1000], ['2024-01-03', -0.0025]]),
        end,
      );

      expect(entriesOf(result)[1]).toEqual({ date: '2024-01-03', cash: 500, shares: -500 });
      expect(lotsOf(result)).toEqual([{ date: '2024-01-01', shares: 500 }]);
    });

    it('should price purchases at the day\'s net value', () => {
      const result = service.replay(
        createTestInstrument({ price: (d) => (d < '2024-01-10' ? 1 : 2) }),
        instructions([['2024-01-01', 1000], ['2024-01-15', 1000]]),
        end,
      );

      expect(entriesOf(result)).toEqual([
        { date: '2024-01-01', cash: -1000, shares: 1000 },
        { date: '2024-01-15', cash: -1000, shares: 500 },
      ]);
    });

    it('should ignore zero instructions', () => {
      const result = service.replay(
        createTestInstrument(),
        instructions([['2024-01-01', 0], ['2024-01-02', 100], ['2024-01-03', 0]]),
        end,
      );

      expect(entriesOf(result)).toEqual([{ date: '2024-01-02', cash: -100, shares: 100 }]);
    });

    it('should keep only the first instruction of a date', () => {
      const result = service.replay(
        createTestInstrument(),
        instructions([['2024-01-01', 100], ['2024-01-01', 300]]),
        end,
      );

      expect(entriesOf(result)).toEqual([{ date: '2024-01-01', cash: -100, shares: 100 }]);
    });
  });

  describe('termination', () => {
    it('should return an empty ledger without instructions', () => {
      const result = service.replay(createTestInstrument(), [], end);

      expect(result.entries).toEqual([]);
      expect(result.snapshots).toEqual([]);
    });

    it('should return an empty ledger when the first purchase is after the end date', () => {
      const result = service.replay(createTestInstrument(), instructions([['2024-02-01', 100]]), end);

      expect(result.entries).toHaveLength(0);
    });

    it('should not replay instructions after the end date', () => {
      const result = service.replay(
        createTestInstrument(),
        instructions([['2024-01-01', 100], ['2024-02-05', 100]]),
        end,
      );

      expect(result.entries).toHaveLength(1);
    });
  });

  describe('fatal conditions', () => {
    it('should reject a redemption before any purchase', () => {
      expect(() =>
        service.replay(createTestInstrument(), instructions([['2024-01-01', -10]]), end),
      ).toThrow(PrematureSellException);
    });

    it('should reject redeeming more shares than held', () => {
      expect(() =>
        service.replay(
          createTestInstrument(),
          instructions([['2024-01-01', 100], ['2024-01-02', -150]]),
          end,
        ),
      ).toThrow(InsufficientSharesException);
    });

    it('should reject a corporate action on the first purchase day', () => {
      expect(() =>
        service.replay(
          createTestInstrument({ actions: [{ date: '2024-01-01', value: 0.05 }] }),
          instructions([['2024-01-01', 100]]),
          end,
        ),
      ).toThrow(UnrecognizedCorporateActionException);
    });

    it('should reject an unrecognized corporate action value', () => {
      expect(() =>
        service.replay(
          createTestInstrument({ actions: [{ date: '2024-01-04', value: 'n/a' }] }),
          instructions([['2024-01-01', 100]]),
          end,
        ),
      ).toThrow('Corporate action not recognized: "n/a" on 2024-01-04');
    });
  });

  describe('lock dates', () => {
    it('should skip instructions on a lock date', () => {
      const result = service.replay(
        createTestInstrument({ lockDates: ['2024-01-03'] }),
        instructions([['2024-01-01', 100], ['2024-01-03', 50]]),
        end,
      );

      expect(entriesOf(result)).toEqual([{ date: '2024-01-01', cash: -100, shares: 100 }]);
    });

    it('should still apply a corporate action on a lock date', () => {
      const result = service.replay(
        createTestInstrument({
          lockDates: ['2024-01-03'],
          actions: [{ date: '2024-01-03', value: 0.1 }],
        }),
        instructions([['2024-01-01', 100], ['2024-01-03', 50]]),
        end,
      );

      expect(entriesOf(result)).toEqual([
        { date: '2024-01-01', cash: -100, shares: 100 },
        { date: '2024-01-03', cash: 10, shares: 0 },
      ]);
    });

    it('should start from the first instruction outside a lock date', () => {
      const result = service.replay(
        createTestInstrument({ lockDates: ['2024-01-01'] }),
        instructions([['2024-01-01', 100], ['2024-01-02', 200]]),
        end,
      );

      expect(entriesOf(result)).toEqual([{ date: '2024-01-02', cash: -200, shares: 200 }]);
    });
  });

  describe('corporate actions', () => {
    it('should scale every lot on a split', () => {
      const result = service.replay(
        createTestInstrument({ actions: [{ date: '2024-01-04', value: -2 }] }),
        instructions([['2024-01-01', 100], ['2024-01-02', 50]]),
        end,
      );

      expect(entriesOf(result)[2]).toEqual({ date: '2024-01-04', cash: 0, shares: 150 });
      expect(lotsOf(result)).toEqual([
        { date: '2024-01-01', shares: 200 },
        { date: '2024-01-02', shares: 100 },
      ]);
    });

    it('should pay a cash dividend on the shares held', () => {
      const result = service.replay(
        createTestInstrument({ actions: [{ date: '2024-01-03', value: 0.05 }] }),
        instructions([['2024-01-01', 1000]]),
        end,
      );

      expect(entriesOf(result)[1]).toEqual({ date: '2024-01-03', cash: 50, shares: 0 });
      expect(lotsOf(result)).toEqual([{ date: '2024-01-01', shares: 1000 }]);
    });

    it('should keep applying dividends after the last instruction', () => {
      const result = service.replay(
        createTestInstrument({
          actions: [
            { date: '2024-01-10', value: 0.01 },
            { date: '2024-01-20', value: 0.02 },
          ],
        }),
        instructions([['2024-01-01', 1000]]),
        end,
      );

      expect(entriesOf(result).map((e) => e.cash)).toEqual([-1000, 10, 20]);
    });

    it('should pay the dividend on the balance held before a same-day redemption', () => {
      const result = service.replay(
        createTestInstrument({ actions: [{ date: '2024-01-03', value: 0.1 }] }),
        instructions([['2024-01-01', 1000], ['2024-01-03', -400]]),
        end,
      );

      // 400 redeemed + 1000 * 0.1 dividend
      expect(entriesOf(result)[1]).toEqual({ date: '2024-01-03', cash: 500, shares: -400 });
    });

    it('should reinvest the dividend when the day carries the reinvestment marker', () => {
      const result = service.replay(
        createTestInstrument({
          price: (d) => (d < '2024-01-03' ? 1 : 1.25),
          actions: [{ date: '2024-01-03', value: 0.05 }],
        }),
        instructions([['2024-01-01', 1000], ['2024-01-03', 0.05]]),
        end,
      );

      // 1000 * 0.05 / 1.25 = 40 new shares, no cash
      expect(entriesOf(result)[1]).toEqual({ date: '2024-01-03', cash: 0, shares: 40 });
      expect(lotsOf(result)).toEqual([
        { date: '2024-01-01', shares: 1000 },
        { date: '2024-01-03', shares: 40 },
      ]);
    });

    it('should combine a marked purchase with the reinvested dividend', () => {
      const result = service.replay(
        createTestInstrument({
          price: (d) => (d < '2024-01-03' ? 1 : 1.25),
          actions: [{ date: '2024-01-03', value: 0.05 }],
        }),
        instructions([['2024-01-01', 1000], ['2024-01-03', 200.05]]),
        end,
      );

      // 200 / 1.25 = 160 purchased + 40 reinvested
      expect(entriesOf(result)[1]).toEqual({ date: '2024-01-03', cash: -200, shares: 200 });
      expect(lotsOf(result)).toEqual([
        { date: '2024-01-01', shares: 1000 },
        { date: '2024-01-03', shares: 160 },
        { date: '2024-01-03', shares: 40 },
      ]);
    });

    it('should reinvest when the instrument flags the dividend as reinvested', () => {
      const result = service.replay(
        createTestInstrument({ actions: [{ date: '2024-01-03', value: 0.05, reinvest: true }] }),
        instructions([['2024-01-01', 1000]]),
        end,
      );

      expect(entriesOf(result)[1]).toEqual({ date: '2024-01-03', cash: 0, shares: 50 });
    });
  });

  describe('delayed settlement', () => {
    // Purchases settle two days after the instruction
    const settlingLater = (): InstrumentQuoteProvider => {
      const instrument = createTestInstrument({
        actions: [
          { date: '2024-01-02', value: 0.1 },
          { date: '2024-01-05', value: 0.1 },
        ],
      });
      return {
        code: instrument.code,
        name: instrument.name,
        priceAt: (date) => instrument.priceAt(date),
        pricesBetween: (start, until) => instrument.pricesBetween(start, until),
        quoteBuy: (amount, date) => ({ ...instrument.quoteBuy(amount, date), settleDate: addDays(date, 2) }),
        quoteRedeem: (shares, date, registry) => instrument.quoteRedeem(shares, date, registry),
        corporateActionAt: (date) => instrument.corporateActionAt(date),
        isLockDate: (date) => instrument.isLockDate(date),
      };
    };

    it('should date the entry and lot on the settlement day and resume after it', () => {
      const result = service.replay(settlingLater(), instructions([['2024-01-01', 1000]]), toDate('2024-01-10'));

      expect(entriesOf(result)).toEqual([
        { date: '2024-01-03', cash: -1000, shares: 1000 },
        { date: '2024-01-05', cash: 100, shares: 0 },
      ]);
      expect(lotsOf(result)).toEqual([{ date: '2024-01-03', shares: 1000 }]);
    });
  });

  describe('invariants', () => {
    const result = () =>
      service.replay(
        createTestInstrument({
          price: (d) => (d < '2024-01-08' ? 1 : 1.6),
          actions: [
            { date: '2024-01-05', value: 0.02 },
            { date: '2024-01-08', value: -1.5 },
            { date: '2024-01-12', value: 0.03 },
          ],
        }),
        instructions([
          ['2024-01-01', 1000],
          ['2024-01-03', 333.33],
          ['2024-01-09', -0.001],
          ['2024-01-12', 50.05],
          ['2024-01-15', -200.5],
        ]),
        end,
      );

    it('should keep entries and snapshots aligned and strictly increasing', () => {
      const { entries, snapshots } = result();

      expect(entries).toHaveLength(snapshots.length);
      entries.forEach((entry, i) => {
        expect(snapshots[i].date).toEqual(entry.date);
        if (i > 0) {
          expect(entry.date.getTime()).toBeGreaterThan(entries[i - 1].date.getTime());
        }
      });
    });

    it('should keep every snapshot total equal to the running share balance', () => {
      const { entries, snapshots } = result();
      let running = ZERO;

      entries.forEach((entry, i) => {
        running = running.plus(entry.shares);
        expect(totalShares(snapshots[i].lots).toString()).toBe(running.toString());
      });
    });

    it('should never alter an earlier snapshot', () => {
      const { snapshots } = result();

      expect(snapshots[0].lots.map((l) => l.shares.toNumber())).toEqual([1000]);
      expect(Object.isFrozen(snapshots[0].lots)).toBe(true);
    });
  });
});
