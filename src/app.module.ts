import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { TradeModule } from './trade/trade.module';

@Module({
  imports: [TradeModule],
  controllers: [AppController],
})
export class AppModule {}
