import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { ValuationService } from './valuation.service';
import { PortfolioIrrResponseDto } from './dto/valuation-response.dto';
import { ParseOptionalDatePipe } from '../common/pipes/parse-date.pipe';
import { ParseOptionalNumberPipe } from '../common/pipes/parse-number.pipe';

@Controller('portfolio')
export class PortfolioController {
  constructor(private readonly valuationService: ValuationService) {}

  /**
   * Combined IRR of several holdings sold out together.
   *
   * GET /portfolio/irr?codes=A,B&date=2024-06-28
   * @param codesQuery - Comma-separated codes or omit for all holdings
   */
  @Get('irr')
  @HttpCode(HttpStatus.OK)
  getIrr(
    @Query('date', ParseOptionalDatePipe) date?: Date,
    @Query('guess', ParseOptionalNumberPipe) guess?: number,
    @Query('codes') codesQuery?: string,
  ): PortfolioIrrResponseDto {
    const codes = codesQuery ? codesQuery.split(',').map((c) => c.trim()) : undefined;
    return this.valuationService.getPortfolioInternalRateOfReturn(date, guess, codes);
  }
}
