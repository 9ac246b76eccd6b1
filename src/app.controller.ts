import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { LedgerService } from './ledger/ledger.service';
import { InstrumentService } from './instrument/instrument.service';

@Controller()
export class AppController {
  constructor(
    private readonly ledgerService: LedgerService,
    private readonly instrumentService: InstrumentService,
  ) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'holding-ledger',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Holding Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        instruments: '/instruments',
        holdings: '/holdings',
        replay: '/holdings/:code/instructions',
        report: '/holdings/:code/report',
        portfolioIrr: '/portfolio/irr',
      },
    };
  }

  /**
   * Clears all instruments and ledgers - test harness only.
   *
   * POST /reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.ledgerService.clearAll();
    this.instrumentService.clearAll();
    return { message: 'All instruments and ledgers cleared' };
  }
}
