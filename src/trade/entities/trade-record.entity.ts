import Decimal from 'decimal.js';
import { Currency, sameCurrency, snapshotCurrency } from '../../currency/entities/currency.entity';
import { Requester } from './identity.entity';
import { CancellableState, LifecycleState, isCancellable } from './lifecycle-state.entity';

export enum Direction {
  BUY = 'BUY',
  SELL = 'SELL',
}

// Everything an approver may change on update.
export interface MutableTradeFields {
  counterparty: string;
  direction: Direction;
  style: string;                     // contract type, e.g. "Forward"
  notionalCurrency: Currency;        // must be one of underlying
  notionalAmount: Decimal;           // unsigned integer, no minor units
  underlying: readonly Currency[];   // eligible currencies, a set
  valueDate: Date;
  deliveryDate: Date;
}

/**
 * A trade proposal tagged with its lifecycle state.
 * tradingEntity and tradeDate are fixed at creation; strike is set on booking.
 */
export interface TradeRecord<S extends LifecycleState> {
  readonly tradingEntity: Requester;
  readonly fields: Readonly<MutableTradeFields>;
  readonly tradeDate: Date;
  readonly strike?: Decimal;
  readonly state: S;
}

export type AnyTradeRecord = { [S in LifecycleState]: TradeRecord<S> }[LifecycleState];

export type CancellableTradeRecord = TradeRecord<CancellableState>;

export function isCancellableRecord(record: AnyTradeRecord): record is CancellableTradeRecord {
  return isCancellable(record.state);
}

// Parts of a record a transition may change.
export interface TradePayload {
  fields: Readonly<MutableTradeFields>;
  strike?: Decimal;
}

export function copyDate(date: Date): Date {
  return new Date(date.getTime());
}

export function snapshotUnderlying(underlying: readonly Currency[]): readonly Currency[] {
  return Object.freeze(underlying.map(snapshotCurrency));
}

/**
 * Deep copy of the fields with every nested array and currency frozen and
 * fresh Date instances, so a record shares nothing with its caller.
 */
export function snapshotFields(fields: Readonly<MutableTradeFields>): Readonly<MutableTradeFields> {
  return Object.freeze({
    counterparty: fields.counterparty,
    direction: fields.direction,
    style: fields.style,
    notionalCurrency: snapshotCurrency(fields.notionalCurrency),
    notionalAmount: fields.notionalAmount,
    underlying: snapshotUnderlying(fields.underlying),
    valueDate: copyDate(fields.valueDate),
    deliveryDate: copyDate(fields.deliveryDate),
  });
}

export function sameDate(a: Date, b: Date): boolean {
  return a.getTime() === b.getTime();
}

/** Order-insensitive comparison by currency code */
export function sameUnderlying(a: readonly Currency[], b: readonly Currency[]): boolean {
  const left = new Set(a.map((currency) => currency.code));
  const right = new Set(b.map((currency) => currency.code));
  if (left.size !== right.size) {
    return false;
  }
  return Array.from(left).every((code) => right.has(code));
}

export function fieldsEqual(a: MutableTradeFields, b: MutableTradeFields): boolean {
  return (
    a.counterparty === b.counterparty &&
    a.direction === b.direction &&
    a.style === b.style &&
    sameCurrency(a.notionalCurrency, b.notionalCurrency) &&
    a.notionalAmount.equals(b.notionalAmount) &&
    sameUnderlying(a.underlying, b.underlying) &&
    sameDate(a.valueDate, b.valueDate) &&
    sameDate(a.deliveryDate, b.deliveryDate)
  );
}
