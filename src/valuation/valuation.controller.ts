import { Controller, Get, HttpCode, HttpStatus, Param, Query } from '@nestjs/common';
import { ValuationService } from './valuation.service';
import {
  CostSeriesResponseDto,
  RateResponseDto,
  SnapshotReportDto,
  TradeVolumeResponseDto,
  ValueSeriesResponseDto,
} from './dto/valuation-response.dto';
import { ParseOptionalDatePipe } from '../common/pipes/parse-date.pipe';
import { ParseOptionalNumberPipe } from '../common/pipes/parse-number.pipe';

@Controller('holdings')
export class ValuationController {
  constructor(private readonly valuationService: ValuationService) {}

  /**
   * Shares, value, capital in/out, unit cost, bottleneck, turnover and gain.
   *
   * GET /holdings/:code/report?date=2024-06-28
   */
  @Get(':code/report')
  @HttpCode(HttpStatus.OK)
  getReport(
    @Param('code') code: string,
    @Query('date', ParseOptionalDatePipe) date?: Date,
  ): SnapshotReportDto {
    return this.valuationService.getReport(code, date);
  }

  /** GET /holdings/:code/unit-cost?date= */
  @Get(':code/unit-cost')
  @HttpCode(HttpStatus.OK)
  getUnitCost(
    @Param('code') code: string,
    @Query('date', ParseOptionalDatePipe) date?: Date,
  ): RateResponseDto {
    return this.valuationService.getUnitCost(code, date);
  }

  /** GET /holdings/:code/bottleneck */
  @Get(':code/bottleneck')
  @HttpCode(HttpStatus.OK)
  getBottleneck(@Param('code') code: string): RateResponseDto {
    return this.valuationService.getBottleneck(code);
  }

  /** GET /holdings/:code/turnover?date= */
  @Get(':code/turnover')
  @HttpCode(HttpStatus.OK)
  getTurnover(
    @Param('code') code: string,
    @Query('date', ParseOptionalDatePipe) date?: Date,
  ): RateResponseDto {
    return this.valuationService.getTurnoverRate(code, date);
  }

  /**
   * IRR with every held share virtually redeemed on `date`.
   *
   * GET /holdings/:code/irr?date=2024-06-28&guess=0.1
   */
  @Get(':code/irr')
  @HttpCode(HttpStatus.OK)
  getIrr(
    @Param('code') code: string,
    @Query('date', ParseOptionalDatePipe) date?: Date,
    @Query('guess', ParseOptionalNumberPipe) guess?: number,
  ): RateResponseDto {
    return this.valuationService.getInternalRateOfReturn(code, date, guess);
  }

  /**
   * Buy/sell cash grouped by D (day), W (week) or M (month).
   *
   * GET /holdings/:code/trade-volume?freq=W
   */
  @Get(':code/trade-volume')
  @HttpCode(HttpStatus.OK)
  getTradeVolume(@Param('code') code: string, @Query('freq') freq?: string): TradeVolumeResponseDto {
    return this.valuationService.getTradeVolume(code, freq ?? 'D');
  }

  /** GET /holdings/:code/value-series?end= */
  @Get(':code/value-series')
  @HttpCode(HttpStatus.OK)
  getValueSeries(
    @Param('code') code: string,
    @Query('end', ParseOptionalDatePipe) end?: Date,
  ): ValueSeriesResponseDto {
    return this.valuationService.getValueSeries(code, end);
  }

  /** GET /holdings/:code/cost-series?start=&end= */
  @Get(':code/cost-series')
  @HttpCode(HttpStatus.OK)
  getCostSeries(
    @Param('code') code: string,
    @Query('start', ParseOptionalDatePipe) start?: Date,
    @Query('end', ParseOptionalDatePipe) end?: Date,
  ): CostSeriesResponseDto {
    return this.valuationService.getCostSeries(code, start, end);
  }
}
