import {
  BadRequestException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

// Fatal replay conditions. They mean the instruction data is malformed,
// so the holding's replay is aborted and never retried.

export class InsufficientSharesException extends UnprocessableEntityException {
  constructor(requested: string, available: string, date: string) {
    super(
      `Insufficient shares on ${date}. Available: ${available}, Requested: ${requested}`,
    );
  }
}

export class PrematureSellException extends UnprocessableEntityException {
  constructor(code: string, date: string) {
    super(`Holding ${code} redeems on ${date} before any purchase`);
  }
}

export class UnrecognizedCorporateActionException extends UnprocessableEntityException {
  constructor(detail: string) {
    super(`Corporate action not recognized: ${detail}`);
  }
}

// Rejected before any computation

export class UnsupportedAggregationFrequencyException extends BadRequestException {
  constructor(freq: string) {
    super(`Unsupported aggregation frequency "${freq}", expected one of D, W, M`);
  }
}

export class IrrNotSolvableException extends BadRequestException {
  constructor(reason: string) {
    super(`Internal rate of return cannot be solved: ${reason}`);
  }
}

export class InstrumentNotFoundException extends NotFoundException {
  constructor(code: string) {
    super(`Instrument ${code} is not registered`);
  }
}

export class HoldingNotFoundException extends NotFoundException {
  constructor(code: string) {
    super(`No ledger has been replayed for holding ${code}`);
  }
}

export class PriceUnavailableException extends NotFoundException {
  constructor(code: string, date: string) {
    super(`No price for ${code} on or before ${date}`);
  }
}

/**
 * Raised by the replay step when no actionable day remains before the end date.
 * Caught by the replay driver; never leaves the engine.
 */
export class EndOfInput extends Error {
  constructor() {
    super('No further instructions to add to the ledger');
    this.name = 'EndOfInput';
  }
}
