import { xirr, xnpv } from './xirr';
import { IrrNotSolvableException } from '../common/exceptions/ledger.exceptions';
import { toDate } from '../common/utils/date.util';

describe('xirr', () => {
  const yearlyGain = [
    { date: toDate('2023-01-01'), amount: -1000 },
    { date: toDate('2024-01-01'), amount: 1100 },
  ];

  it('should find the annual rate of a one-year investment', () => {
    expect(xirr(yearlyGain, 0.1)).toBeCloseTo(0.1, 8);
  });

  it('should converge from a distant guess', () => {
    expect(xirr(yearlyGain, 5)).toBeCloseTo(0.1, 6);
  });

  it('should accept unsorted cash flows', () => {
    expect(xirr([...yearlyGain].reverse(), 0.1)).toBeCloseTo(0.1, 8);
  });

  it('should give zero present value at the solved rate', () => {
    const flows = [
      { date: toDate('2023-01-01'), amount: -1000 },
      { date: toDate('2023-04-01'), amount: -500 },
      { date: toDate('2023-09-15'), amount: 200 },
      { date: toDate('2024-03-01'), amount: 1450 },
    ];

    expect(xnpv(xirr(flows, 0.1), flows)).toBeCloseTo(0, 6);
  });

  it('should fail when every flow has the same sign', () => {
    const flows = [
      { date: toDate('2023-01-01'), amount: -100 },
      { date: toDate('2023-06-01'), amount: -100 },
    ];

    expect(() => xirr(flows, 0.1)).toThrow(IrrNotSolvableException);
  });

  it('should return 0 when every flow falls on one day', () => {
    const flows = [
      { date: toDate('2024-01-01'), amount: -1000 },
      { date: toDate('2024-01-01'), amount: 990.1 },
    ];

    expect(xirr(flows, 0.1)).toBe(0);
  });

  it('should fail without cash flows', () => {
    expect(() => xirr([], 0.1)).toThrow(IrrNotSolvableException);
  });
});
