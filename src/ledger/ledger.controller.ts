import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { LedgerService } from './ledger.service';
import { LedgerQueryService } from './ledger-query.service';
import { ReplayInstructionsDto } from './dto/replay-instructions.dto';
import { LedgerResponseDto, LotSnapshotDto } from './dto/ledger-response.dto';
import { ParseOptionalDatePipe } from '../common/pipes/parse-date.pipe';
import { formatDate } from '../common/utils/date.util';
import { shareBalance } from './ledger.util';
import { toNumber } from '../common/utils/decimal.util';

@Controller('holdings')
export class LedgerController {
  constructor(
    private readonly ledgerService: LedgerService,
    private readonly queryService: LedgerQueryService,
  ) {}

  /**
   * Replays the holding's full instruction history against its instrument.
   * Replaces the stored ledger; 422 on malformed instruction data.
   *
   * POST /holdings/:code/instructions
   */
  @Post(':code/instructions')
  @HttpCode(HttpStatus.CREATED)
  replay(@Param('code') code: string, @Body() dto: ReplayInstructionsDto): LedgerResponseDto {
    this.ledgerService.replayHolding(code, dto);
    return this.queryService.getLedger(code);
  }

  /**
   * Lists replayed holdings.
   *
   * GET /holdings
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  getHoldings() {
    return this.queryService.getAllHoldings().map((ledger) => ({
      code: ledger.code,
      replayId: ledger.replayId,
      endDate: formatDate(ledger.endDate),
      entryCount: ledger.entries.length,
      currentShares: toNumber(shareBalance(ledger.entries)),
    }));
  }

  /**
   * Cash-flow ledger and lot snapshots.
   *
   * GET /holdings/:code/ledger
   */
  @Get(':code/ledger')
  @HttpCode(HttpStatus.OK)
  getLedger(@Param('code') code: string): LedgerResponseDto {
    return this.queryService.getLedger(code);
  }

  /**
   * FIFO lots outstanding as of a date (default: latest).
   *
   * GET /holdings/:code/lots?date=2024-03-01
   */
  @Get(':code/lots')
  @HttpCode(HttpStatus.OK)
  getLots(
    @Param('code') code: string,
    @Query('date', ParseOptionalDatePipe) date?: Date,
  ): LotSnapshotDto {
    return this.queryService.getLots(code, date);
  }

  /** DELETE /holdings/:code */
  @Delete(':code')
  @HttpCode(HttpStatus.OK)
  remove(@Param('code') code: string) {
    this.ledgerService.removeHolding(code);
    return { message: `Holding ${code} removed` };
  }
}
