import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { TradeHistoryService } from './trade/trade-history.service';
import { TradeDirectoryService } from './trade/trade-directory.service';

@Controller()
export class AppController {
  constructor(
    private readonly history: TradeHistoryService,
    private readonly directory: TradeDirectoryService,
  ) {}

  /**
   * Liveness probe with the current ledger and directory sizes.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'trade-lifecycle',
      historyEntries: this.history.count(),
      trades: this.directory.count(),
    };
  }

  /**
   * Service name and the routes it serves.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Trade Lifecycle API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        submit: 'POST /trades',
        status: 'GET /trades/:uuid',
        actions: 'POST /trades/:uuid/actions',
        historyCount: 'GET /history',
        currencies: 'GET /currencies',
        history: 'GET /history/:index',
      },
    };
  }
}
