import { sameCurrency } from '../currency/entities/currency.entity';
import { FieldChange, TradeDetailsDiff } from './entities/historical-record.entity';
import { TradePayload, sameDate, sameUnderlying } from './entities/trade-record.entity';

function change<T>(before: T, after: T, equals: (a: T, b: T) => boolean): FieldChange<T> | undefined {
  return equals(before, after) ? undefined : Object.freeze({ before, after });
}

const strictEquals = <T>(a: T, b: T): boolean => a === b;

/**
 * Field-level delta between two snapshots of a trade.
 * Absent (not empty) when nothing changed and no strike was set, so a no-op
 * update leaves no payload in the history.
 */
export function computeDiff(before: TradePayload, after: TradePayload): TradeDetailsDiff | undefined {
  const a = before.fields;
  const b = after.fields;

  const diff: TradeDetailsDiff = {};
  const put = <K extends keyof TradeDetailsDiff>(key: K, value: TradeDetailsDiff[K]): void => {
    if (value !== undefined) {
      diff[key] = value;
    }
  };

  put('counterparty', change(a.counterparty, b.counterparty, strictEquals));
  put('direction', change(a.direction, b.direction, strictEquals));
  put('style', change(a.style, b.style, strictEquals));
  put('notionalCurrency', change(a.notionalCurrency, b.notionalCurrency, sameCurrency));
  put('notionalAmount', change(a.notionalAmount, b.notionalAmount, (x, y) => x.equals(y)));
  put('underlying', change(a.underlying, b.underlying, sameUnderlying));
  put('valueDate', change(a.valueDate, b.valueDate, sameDate));
  put('deliveryDate', change(a.deliveryDate, b.deliveryDate, sameDate));
  put('strike', after.strike);

  return Object.keys(diff).length === 0 ? undefined : Object.freeze(diff);
}
