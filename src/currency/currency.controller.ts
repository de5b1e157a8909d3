import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { CurrencyService } from './currency.service';
import { Currency } from './entities/currency.entity';

@Controller('currencies')
export class CurrencyController {
  constructor(private readonly currencyService: CurrencyService) {}

  /**
   * Currencies accepted in trade details, by alpha code.
   * Clients send the numeric code.
   *
   * GET /currencies
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  list(): Currency[] {
    return this.currencyService.list();
  }
}
