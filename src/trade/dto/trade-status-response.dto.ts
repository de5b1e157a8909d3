import { Direction } from '../entities/trade-record.entity';
import { LifecycleState, TradeAction } from '../entities/lifecycle-state.entity';

export interface TradeDetailsView {
  counterparty: string;
  direction: Direction;
  style: string;
  currencyCode: number;             // ISO 4217 numeric
  currencyAmount: string;           // unsigned integer
  underlyingCurrencyCodes: number[];
  valueDate: string;                // ISO timestamp
  deliveryDate: string;
}

// Current state of one trade plus its full field snapshot
export interface TradeStatusResponseDto {
  uuid: string;
  state: LifecycleState;
  status: number;                   // numeric state id, 0 = Draft
  tradingEntity: string;            // owning requester
  details: TradeDetailsView;
  tradeDate: string;
  strike: string | null;            // set once booked
  availableActions: TradeAction[];
}
