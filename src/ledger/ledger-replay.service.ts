import { Injectable, Logger } from '@nestjs/common';
import { compareAsc } from 'date-fns';
import Decimal from 'decimal.js';
import { StatusInstruction } from './entities/status-instruction.entity';
import { LedgerEntry } from './entities/ledger-entry.entity';
import { DecodedInstruction, decodeInstruction, InstructionKind, isRedemption } from './instruction-decoder';
import {
  CorporateAction,
  CorporateActionKind,
  InstrumentQuoteProvider,
  Quote,
} from '../instrument/interfaces/instrument-provider.interface';
import { LotRegistry, LotRegistrySnapshot } from '../lot-registry/entities/lot.entity';
import { buy, EMPTY_REGISTRY, passthrough, sell, split, totalShares } from '../lot-registry/lot-registry';
import {
  EndOfInput,
  PrematureSellException,
  UnrecognizedCorporateActionException,
} from '../common/exceptions/ledger.exceptions';
import { roundAmount, ZERO } from '../common/utils/decimal.util';
import { shareBalance } from './ledger.util';
import { addDays, formatDate, isAfter } from '../common/utils/date.util';

export interface ReplayResult {
  entries: LedgerEntry[];
  snapshots: LotRegistrySnapshot[];
}

// Mutable cursor of one replay run; entries and snapshots only ever grow
interface ReplayState {
  provider: InstrumentQuoteProvider;
  instructions: Map<string, StatusInstruction>;   // nonzero instructions by date key
  endDate: Date;
  entries: LedgerEntry[];
  snapshots: LotRegistrySnapshot[];
  lastProcessed?: Date;
}

// Working totals for the day being processed
interface DayResult {
  date: Date;
  cash: Decimal;
  shares: Decimal;
  registry: LotRegistry;
  reinvestDay: boolean;
}

/**
 * Rebuilds a holding's ledger day by day from sparse instructions and the
 * instrument's corporate-action calendar.
 *
 * Only one instruction is honored per date; same-day buys and sells must be
 * merged before they reach the engine. A lock date blocks instructions but
 * its corporate action still applies.
 */
@Injectable()
export class LedgerReplayService {
  private readonly logger = new Logger(LedgerReplayService.name);

  replay(
    provider: InstrumentQuoteProvider,
    instructions: StatusInstruction[],
    endDate: Date,
  ): ReplayResult {
    const state: ReplayState = {
      provider,
      instructions: this.indexInstructions(provider.code, instructions),
      endDate,
      entries: [],
      snapshots: [],
    };

    for (;;) {
      try {
        this.addNext(state);
      } catch (error) {
        if (error instanceof EndOfInput) {
          break;
        }
        this.logger.error(
          `Replay of ${provider.code} aborted after ${state.entries.length} entries: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
        throw error;
      }
    }

    return { entries: state.entries, snapshots: state.snapshots };
  }

  private indexInstructions(code: string, instructions: StatusInstruction[]): Map<string, StatusInstruction> {
    const byDate = new Map<string, StatusInstruction>();
    [...instructions]
      .sort((a, b) => compareAsc(a.date, b.date))
      .forEach((instruction) => {
        if (instruction.value.isZero()) {
          return;
        }
        const key = formatDate(instruction.date);
        if (byDate.has(key)) {
          this.logger.warn(`${code}: more than one instruction on ${key}, keeping the first`);
          return;
        }
        byDate.set(key, instruction);
      });
    return byDate;
  }

  private addNext(state: ReplayState): void {
    if (state.lastProcessed === undefined) {
      this.addFirstPurchase(state);
    } else {
      this.addFollowingDay(state, state.lastProcessed);
    }
  }

  // The first actionable instruction must be a purchase
  private addFirstPurchase(state: ReplayState): void {
    const { provider } = state;
    const first = Array.from(state.instructions.values()).find(
      (instruction) => !provider.isLockDate(instruction.date),
    );

    if (!first || isAfter(first.date, state.endDate)) {
      throw new EndOfInput();
    }

    const decoded = decodeInstruction(first.value);
    if (isRedemption(decoded)) {
      throw new PrematureSellException(provider.code, formatDate(first.date));
    }
    if (provider.corporateActionAt(first.date) !== undefined) {
      throw new UnrecognizedCorporateActionException(
        `${provider.code} announces an action on its first purchase day ${formatDate(first.date)}`,
      );
    }

    const day: DayResult = {
      date: first.date,
      cash: ZERO,
      shares: ZERO,
      registry: EMPTY_REGISTRY,
      reinvestDay: false,
    };
    this.applyInstruction(state, day, decoded, ZERO);
    this.record(state, day);
  }

  private addFollowingDay(state: ReplayState, lastProcessed: Date): void {
    const { provider } = state;
    let date = addDays(lastProcessed, 1);
    let action: CorporateAction | undefined;
    let instruction: Decimal | undefined;

    for (;;) {
      if (isAfter(date, state.endDate)) {
        throw new EndOfInput();
      }
      action = provider.corporateActionAt(date);
      const raw = state.instructions.get(formatDate(date));
      instruction = raw !== undefined && !provider.isLockDate(date) ? raw.value : undefined;
      if (action !== undefined || instruction !== undefined) {
        break;
      }
      date = addDays(date, 1);
    }

    // dividends are paid on the balance held before the day's own trade
    const priorBalance = shareBalance(state.entries);
    const day: DayResult = {
      date,
      cash: ZERO,
      shares: ZERO,
      registry: state.snapshots[state.snapshots.length - 1].lots,
      reinvestDay: false,
    };

    if (instruction !== undefined) {
      this.applyInstruction(state, day, decodeInstruction(instruction), priorBalance);
    }
    if (action !== undefined) {
      this.applyCorporateAction(state, day, action, priorBalance);
    }
    this.record(state, day);
  }

  private applyInstruction(
    state: ReplayState,
    day: DayResult,
    decoded: DecodedInstruction,
    priorBalance: Decimal,
  ): void {
    const { provider } = state;
    const quote = this.execute(provider, day, decoded, priorBalance);
    if (!quote) {
      return;
    }

    this.logger.debug(
      `${provider.code} ${formatDate(day.date)} ${decoded.kind}: cash ${quote.cash.toString()}, shares ${quote.shares.toString()}`,
    );
    day.date = quote.settleDate;
    day.cash = day.cash.plus(quote.cash);
    day.shares = day.shares.plus(quote.shares);
  }

  // Quotes the instruction and moves the day's registry accordingly
  private execute(
    provider: InstrumentQuoteProvider,
    day: DayResult,
    decoded: DecodedInstruction,
    priorBalance: Decimal,
  ): Quote | undefined {
    switch (decoded.kind) {
      case InstructionKind.NONE:
        return undefined;
      case InstructionKind.BUY:
      case InstructionKind.REINVEST_DIVIDEND: {
        day.reinvestDay = decoded.kind === InstructionKind.REINVEST_DIVIDEND;
        if (decoded.amount.isZero()) {
          // bare reinvestment marker, nothing purchased
          return undefined;
        }
        const quote = provider.quoteBuy(decoded.amount, day.date);
        day.registry = buy(day.registry, quote.shares, quote.settleDate);
        return quote;
      }
      case InstructionKind.REDEEM_RATIO:
      case InstructionKind.REDEEM_SHARES: {
        const shares =
          decoded.kind === InstructionKind.REDEEM_RATIO
            ? roundAmount(priorBalance.times(decoded.ratio))
            : decoded.shares;
        const quote = provider.quoteRedeem(shares, day.date, day.registry);
        day.registry = sell(day.registry, quote.shares.negated(), quote.settleDate).remaining;
        return quote;
      }
    }
  }

  private applyCorporateAction(
    state: ReplayState,
    day: DayResult,
    action: CorporateAction,
    priorBalance: Decimal,
  ): void {
    const { provider } = state;

    if (action.kind === CorporateActionKind.SPLIT) {
      const scaled = split(day.registry, action.ratio, day.date);
      day.shares = day.shares.plus(totalShares(scaled).minus(totalShares(day.registry)));
      day.registry = scaled;
      this.logger.debug(`${provider.code} ${formatDate(day.date)} split x${action.ratio.toString()}`);
      return;
    }

    if (day.reinvestDay || action.reinvest) {
      // dividend already turned into shares at the day's price; no cash
      const price = provider.priceAt(day.date);
      const reinvested = roundAmount(priorBalance.times(action.perShareAmount).dividedBy(price));
      day.shares = day.shares.plus(reinvested);
      day.registry = reinvested.isZero() ? passthrough(day.registry) : buy(day.registry, reinvested, day.date);
      this.logger.debug(`${provider.code} ${formatDate(day.date)} dividend reinvested as ${reinvested.toString()} shares`);
      return;
    }

    const dividend = roundAmount(priorBalance.times(action.perShareAmount));
    day.cash = day.cash.plus(dividend);
    day.registry = passthrough(day.registry);
    this.logger.debug(`${provider.code} ${formatDate(day.date)} cash dividend ${dividend.toString()}`);
  }

  // The scan resumes after the settled date, so a delayed settlement skips
  // the days it covers
  private record(state: ReplayState, day: DayResult): void {
    state.entries.push(Object.freeze({ date: day.date, cash: day.cash, shares: day.shares }));
    state.snapshots.push(Object.freeze({ date: day.date, lots: day.registry }));
    state.lastProcessed = day.date;
  }
}
