import { Injectable } from '@nestjs/common';
import { Currency } from './entities/currency.entity';
import catalogue from './data/currencies.json';

/**
 * ISO 4217 lookup for the request boundary.
 * Full table of active codes bundled with the service - no live reference data feed.
 */
@Injectable()
export class CurrencyService {
  private byNumeric: Map<number, Currency> = new Map();

  constructor() {
    catalogue.forEach((entry) => {
      const currency: Currency = Object.freeze({ ...entry });
      this.byNumeric.set(currency.numeric, currency);
    });
  }

  /** O(1) lookup - returns undefined for codes ISO 4217 does not assign */
  fromNumeric(numeric: number): Currency | undefined {
    return this.byNumeric.get(numeric);
  }

  /** Every known currency, ordered by alpha code */
  list(): Currency[] {
    return Array.from(this.byNumeric.values()).sort((a, b) => a.code.localeCompare(b.code));
  }
}
