import { MutableTradeFields } from './entities/trade-record.entity';
import { InvalidDetailsError } from './errors/trade.errors';

/**
 * Rules checked on creation and on every field replacement, in this order:
 * value date, delivery date against trade date, delivery against value date,
 * then currency membership. Returns the first violation.
 */
export function checkDetails(
  fields: MutableTradeFields,
  tradeDate: Date,
): InvalidDetailsError | undefined {
  const trade = tradeDate.getTime();
  const value = fields.valueDate.getTime();
  const delivery = fields.deliveryDate.getTime();

  if (value < trade) {
    return new InvalidDetailsError('Value date must not precede the trade date');
  }
  if (delivery < trade) {
    return new InvalidDetailsError('Delivery date must not precede the trade date');
  }
  if (delivery < value) {
    return new InvalidDetailsError('Delivery date must not precede the value date');
  }

  const listed = fields.underlying.some(
    (currency) => currency.code === fields.notionalCurrency.code,
  );
  if (!listed) {
    const underlying = fields.underlying.map((currency) => currency.code).join(',');
    return new InvalidDetailsError(
      `Currency ${fields.notionalCurrency.code} not listed in the underlying ${underlying}`,
    );
  }

  return undefined;
}
