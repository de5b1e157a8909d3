import Decimal from 'decimal.js';
import { Currency, snapshotCurrency } from '../../currency/entities/currency.entity';
import { Direction, copyDate, snapshotUnderlying } from './trade-record.entity';
import { LifecycleState, TradeAction } from './lifecycle-state.entity';

export interface FieldChange<T> {
  readonly before: T;
  readonly after: T;
}

// Only changed fields are present. strike carries the post-transition value.
export interface TradeDetailsDiff {
  counterparty?: FieldChange<string>;
  direction?: FieldChange<Direction>;
  style?: FieldChange<string>;
  notionalCurrency?: FieldChange<Currency>;
  notionalAmount?: FieldChange<Decimal>;
  underlying?: FieldChange<readonly Currency[]>;
  valueDate?: FieldChange<Date>;
  deliveryDate?: FieldChange<Date>;
  strike?: Decimal;
}

// One audited transition. Frozen once appended to the ledger.
export interface HistoricalRecord {
  readonly timestamp: Date;
  readonly action: TradeAction;
  readonly userId: string;
  readonly stateBefore: LifecycleState;
  readonly stateAfter: LifecycleState;
  readonly changes?: Readonly<TradeDetailsDiff>;
}

function snapshotChange<T>(
  change: FieldChange<T> | undefined,
  copy: (value: T) => T,
): FieldChange<T> | undefined {
  return change ? Object.freeze({ before: copy(change.before), after: copy(change.after) }) : undefined;
}

const same = <T>(value: T): T => value;

/** Deep frozen copy; Dates are cloned because freezing does not stop setTime */
export function snapshotDiff(diff: Readonly<TradeDetailsDiff>): Readonly<TradeDetailsDiff> {
  const copy: TradeDetailsDiff = {};
  const put = <K extends keyof TradeDetailsDiff>(key: K, value: TradeDetailsDiff[K]): void => {
    if (value !== undefined) {
      copy[key] = value;
    }
  };

  put('counterparty', snapshotChange(diff.counterparty, same));
  put('direction', snapshotChange(diff.direction, same));
  put('style', snapshotChange(diff.style, same));
  put('notionalCurrency', snapshotChange(diff.notionalCurrency, snapshotCurrency));
  put('notionalAmount', snapshotChange(diff.notionalAmount, same));
  put('underlying', snapshotChange(diff.underlying, snapshotUnderlying));
  put('valueDate', snapshotChange(diff.valueDate, copyDate));
  put('deliveryDate', snapshotChange(diff.deliveryDate, copyDate));
  put('strike', diff.strike);
  return Object.freeze(copy);
}

export function snapshotHistoricalRecord(record: HistoricalRecord): HistoricalRecord {
  const { changes, ...entry } = record;
  return Object.freeze({
    ...entry,
    timestamp: copyDate(record.timestamp),
    ...(changes ? { changes: snapshotDiff(changes) } : {}),
  });
}
