import Decimal from 'decimal.js';

// One user instruction row for a holding; value 0 means "no instruction".
// The sign and magnitude of `value` encode the action, see instruction-decoder.
export interface StatusInstruction {
  date: Date;
  value: Decimal;
}
