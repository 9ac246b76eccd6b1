import Decimal from 'decimal.js';

export enum InstructionKind {
  NONE = 'none',
  BUY = 'buy',
  REINVEST_DIVIDEND = 'reinvest-dividend',
  REDEEM_RATIO = 'redeem-ratio',
  REDEEM_SHARES = 'redeem-shares',
}

export type DecodedInstruction =
  | { kind: InstructionKind.NONE }
  | { kind: InstructionKind.BUY; amount: Decimal }
  | { kind: InstructionKind.REINVEST_DIVIDEND; amount: Decimal }
  | { kind: InstructionKind.REDEEM_RATIO; ratio: Decimal }
  | { kind: InstructionKind.REDEEM_SHARES; shares: Decimal };

// -0.005 redeems the whole holding; smaller magnitudes redeem a fraction of it
export const FULL_REDEMPTION_VALUE = new Decimal('-0.005');

const HALF_TENTH = new Decimal('0.5');

/**
 * A purchase whose tenths-fraction digit is 5 (e.g. 1000.05, 0.05) marks the
 * day's dividend as reinvested.
 */
export function isReinvestMarker(value: Decimal): boolean {
  if (value.lessThanOrEqualTo(0)) {
    return false;
  }
  const tenths = value.times(10);
  return tenths.minus(tenths.trunc()).toDecimalPlaces(1).equals(HALF_TENTH);
}

/**
 * Decodes a raw instruction value into the action it encodes.
 *
 * value > 0                -> purchase of `value` in cash
 * value > 0 with marker    -> purchase of `value` rounded to one decimal (marker dropped),
 *                             dividend that day is reinvested
 * -0.005 <= value < 0      -> redeem `-value / 0.005` of the current shares
 * value < -0.005           -> redeem `-value` shares
 */
export function decodeInstruction(value: Decimal): DecodedInstruction {
  if (value.isZero()) {
    return { kind: InstructionKind.NONE };
  }
  if (value.greaterThan(0)) {
    if (isReinvestMarker(value)) {
      return {
        kind: InstructionKind.REINVEST_DIVIDEND,
        amount: value.toDecimalPlaces(1, Decimal.ROUND_HALF_DOWN),
      };
    }
    return { kind: InstructionKind.BUY, amount: value };
  }
  if (value.greaterThanOrEqualTo(FULL_REDEMPTION_VALUE)) {
    return { kind: InstructionKind.REDEEM_RATIO, ratio: value.negated().dividedBy(FULL_REDEMPTION_VALUE.negated()) };
  }
  return { kind: InstructionKind.REDEEM_SHARES, shares: value.negated() };
}

export function isRedemption(decoded: DecodedInstruction): boolean {
  return decoded.kind === InstructionKind.REDEEM_RATIO || decoded.kind === InstructionKind.REDEEM_SHARES;
}
