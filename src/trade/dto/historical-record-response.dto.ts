import { Direction } from '../entities/trade-record.entity';
import { LifecycleState, TradeAction } from '../entities/lifecycle-state.entity';

export interface FieldChangeView<T> {
  before: T;
  after: T;
}

// Diff rendered in wire units (numeric currency codes, digit strings, ISO dates)
export interface TradeDetailsDiffView {
  counterparty?: FieldChangeView<string>;
  direction?: FieldChangeView<Direction>;
  style?: FieldChangeView<string>;
  currencyCode?: FieldChangeView<number>;
  currencyAmount?: FieldChangeView<string>;
  underlyingCurrencyCodes?: FieldChangeView<number[]>;
  valueDate?: FieldChangeView<string>;
  deliveryDate?: FieldChangeView<string>;
  strike?: string;
}

export interface HistoricalRecordResponseDto {
  index: number;
  timestamp: string;
  action: TradeAction;
  userId: string;
  stateBefore: LifecycleState;
  stateAfter: LifecycleState;
  changes: TradeDetailsDiffView | null;
}

export interface HistoryCountResponseDto {
  count: number;
}
