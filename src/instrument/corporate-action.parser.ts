import Decimal from 'decimal.js';
import { CorporateAction, CorporateActionKind } from './interfaces/instrument-provider.interface';
import { UnrecognizedCorporateActionException } from '../common/exceptions/ledger.exceptions';
import { formatDate } from '../common/utils/date.util';

// Announced action as the price feed encodes it:
// negative value = split ratio (magnitude), positive value = cash per share.
export interface RawCorporateAction {
  date: Date;
  value: number | string;
  reinvest?: boolean;
}

/**
 * Classifies a raw action value.
 * @throws UnrecognizedCorporateActionException for zero or non-numeric values
 */
export function parseCorporateAction(raw: RawCorporateAction): CorporateAction {
  let value: Decimal;
  try {
    value = new Decimal(raw.value);
  } catch {
    throw new UnrecognizedCorporateActionException(`"${raw.value}" on ${formatDate(raw.date)}`);
  }

  if (!value.isFinite() || value.isZero()) {
    throw new UnrecognizedCorporateActionException(`"${raw.value}" on ${formatDate(raw.date)}`);
  }

  if (value.isNegative()) {
    return { kind: CorporateActionKind.SPLIT, ratio: value.negated() };
  }
  return {
    kind: CorporateActionKind.DIVIDEND,
    perShareAmount: value,
    reinvest: raw.reinvest ?? false,
  };
}
