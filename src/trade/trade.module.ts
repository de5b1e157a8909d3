import { Module } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { TradeController } from './trade.controller';
import { TradeHistoryController } from './trade-history.controller';
import { TradeService } from './trade.service';
import { TradeQueryService } from './trade-query.service';
import { TradeLifecycleService } from './trade-lifecycle.service';
import { TradeHistoryService } from './trade-history.service';
import { TRADE_ID_GENERATOR, TradeDirectoryService } from './trade-directory.service';
import { CurrencyModule } from '../currency/currency.module';

@Module({
  imports: [CurrencyModule], // Numeric ISO code lookup for incoming details
  controllers: [TradeController, TradeHistoryController],
  providers: [
    TradeHistoryService,
    TradeLifecycleService,
    TradeDirectoryService,
    { provide: TRADE_ID_GENERATOR, useValue: () => uuidv4() },
    TradeService,      // Mutations: submit, act
    TradeQueryService, // Queries: status, history
  ],
  exports: [TradeHistoryService, TradeDirectoryService],
})
export class TradeModule {}
