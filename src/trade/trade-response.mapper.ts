import { HistoricalRecord, TradeDetailsDiff } from './entities/historical-record.entity';
import { LIFECYCLE_STATE_IDS, availableActions } from './entities/lifecycle-state.entity';
import { AnyTradeRecord, MutableTradeFields } from './entities/trade-record.entity';
import { TradeDetailsView, TradeStatusResponseDto } from './dto/trade-status-response.dto';
import {
  FieldChangeView,
  HistoricalRecordResponseDto,
  TradeDetailsDiffView,
} from './dto/historical-record-response.dto';
import { toAmountString } from '../common/utils/decimal.util';

export function toTradeDetailsView(fields: MutableTradeFields): TradeDetailsView {
  return {
    counterparty: fields.counterparty,
    direction: fields.direction,
    style: fields.style,
    currencyCode: fields.notionalCurrency.numeric,
    currencyAmount: toAmountString(fields.notionalAmount),
    underlyingCurrencyCodes: fields.underlying.map((currency) => currency.numeric),
    valueDate: fields.valueDate.toISOString(),
    deliveryDate: fields.deliveryDate.toISOString(),
  };
}

export function toTradeStatusResponse(uuid: string, record: AnyTradeRecord): TradeStatusResponseDto {
  return {
    uuid,
    state: record.state,
    status: LIFECYCLE_STATE_IDS[record.state],
    tradingEntity: record.tradingEntity.id,
    details: toTradeDetailsView(record.fields),
    tradeDate: record.tradeDate.toISOString(),
    strike: record.strike ? toAmountString(record.strike) : null,
    availableActions: availableActions(record.state),
  };
}

function view<T, V>(change: { before: T; after: T } | undefined, render: (value: T) => V): FieldChangeView<V> | undefined {
  return change ? { before: render(change.before), after: render(change.after) } : undefined;
}

const same = <T>(value: T): T => value;

export function toDiffView(diff: Readonly<TradeDetailsDiff>): TradeDetailsDiffView {
  const rendered: TradeDetailsDiffView = {};
  const put = <K extends keyof TradeDetailsDiffView>(key: K, value: TradeDetailsDiffView[K]): void => {
    if (value !== undefined) {
      rendered[key] = value;
    }
  };

  put('counterparty', view(diff.counterparty, same));
  put('direction', view(diff.direction, same));
  put('style', view(diff.style, same));
  put('currencyCode', view(diff.notionalCurrency, (currency) => currency.numeric));
  put('currencyAmount', view(diff.notionalAmount, toAmountString));
  put('underlyingCurrencyCodes', view(diff.underlying, (currencies) => currencies.map((c) => c.numeric)));
  put('valueDate', view(diff.valueDate, (date) => date.toISOString()));
  put('deliveryDate', view(diff.deliveryDate, (date) => date.toISOString()));
  put('strike', diff.strike ? toAmountString(diff.strike) : undefined);
  return rendered;
}

export function toHistoricalRecordResponse(
  index: number,
  record: HistoricalRecord,
): HistoricalRecordResponseDto {
  return {
    index,
    timestamp: record.timestamp.toISOString(),
    action: record.action,
    userId: record.userId,
    stateBefore: record.stateBefore,
    stateAfter: record.stateAfter,
    changes: record.changes ? toDiffView(record.changes) : null,
  };
}
