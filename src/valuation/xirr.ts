import { compareAsc } from 'date-fns';
import { IrrNotSolvableException } from '../common/exceptions/ledger.exceptions';
import { daysBetween } from '../common/utils/date.util';

export interface Cashflow {
  date: Date;
  amount: number;
}

const TOLERANCE = 1e-10;
const MAX_NEWTON_STEPS = 100;
const MAX_BISECTION_STEPS = 200;

/** Net present value with `(1 + rate)^(-days / 365)` discounting from the first flow */
export function xnpv(rate: number, cashflows: Cashflow[]): number {
  if (rate <= -1) {
    return Number.POSITIVE_INFINITY;
  }
  const t0 = cashflows[0].date;
  return cashflows.reduce(
    (total, cf) => total + cf.amount * Math.pow(1 + rate, -daysBetween(t0, cf.date) / 365),
    0,
  );
}

function xnpvDerivative(rate: number, cashflows: Cashflow[]): number {
  const t0 = cashflows[0].date;
  return cashflows.reduce((total, cf) => {
    const t = daysBetween(t0, cf.date) / 365;
    return total - t * cf.amount * Math.pow(1 + rate, -t - 1);
  }, 0);
}

/**
 * Rate at which the cash flows' net present value is zero.
 * Newton iteration seeded at `guess`; falls back to bisection when Newton
 * leaves (-1, inf) or stalls. Flows that all fall on one day yield 0.
 * @throws IrrNotSolvableException when no sign change can be bracketed
 */
export function xirr(cashflows: Cashflow[], guess = 0.1): number {
  const flows = [...cashflows].sort((a, b) => compareAsc(a.date, b.date));
  if (flows.length === 0) {
    throw new IrrNotSolvableException('no cash flows');
  }
  // no time elapses between the flows, so no rate applies
  if (daysBetween(flows[0].date, flows[flows.length - 1].date) === 0) {
    return 0;
  }

  let rate = guess;
  for (let i = 0; i < MAX_NEWTON_STEPS; i++) {
    const value = xnpv(rate, flows);
    const slope = xnpvDerivative(rate, flows);
    if (!Number.isFinite(value) || !Number.isFinite(slope) || slope === 0) {
      break;
    }
    const next = rate - value / slope;
    if (!Number.isFinite(next) || next <= -1) {
      break;
    }
    if (Math.abs(next - rate) < TOLERANCE) {
      return next;
    }
    rate = next;
  }

  return bisect(flows);
}

function bisect(flows: Cashflow[]): number {
  let lo = -0.9999;
  let hi = 10;
  let fLo = xnpv(lo, flows);
  let fHi = xnpv(hi, flows);

  // expand hi if needed
  while (fLo * fHi > 0 && hi < 1e6) {
    hi *= 2;
    fHi = xnpv(hi, flows);
  }
  if (fLo * fHi > 0) {
    throw new IrrNotSolvableException('cash flows never change the sign of their present value');
  }

  for (let i = 0; i < MAX_BISECTION_STEPS; i++) {
    const mid = (lo + hi) / 2;
    const fMid = xnpv(mid, flows);
    if (Math.abs(fMid) < TOLERANCE) {
      return mid;
    }
    if (fLo * fMid <= 0) {
      hi = mid;
    } else {
      lo = mid;
      fLo = fMid;
    }
  }
  return (lo + hi) / 2;
}
