import Decimal from 'decimal.js';
import { toDiffView, toHistoricalRecordResponse, toTradeStatusResponse } from './trade-response.mapper';
import { Direction, TradeRecord } from './entities/trade-record.entity';
import { LifecycleState, TradeAction } from './entities/lifecycle-state.entity';
import { requester } from './entities/identity.entity';
import { Currency } from '../currency/entities/currency.entity';

const USD: Currency = { code: 'USD', numeric: 840, name: 'US Dollar' };
const JPY: Currency = { code: 'JPY', numeric: 392, name: 'Yen' };

describe('trade response mapper', () => {
  const executed: TradeRecord<LifecycleState.Executed> = {
    tradingEntity: requester('Bob'),
    fields: {
      counterparty: 'Maggie',
      direction: Direction.BUY,
      style: 'Forward',
      notionalCurrency: USD,
      notionalAmount: new Decimal('18446744073709551616'),
      underlying: [USD, JPY],
      valueDate: new Date('2031-05-01T00:00:00.000Z'),
      deliveryDate: new Date('2031-05-03T00:00:00.000Z'),
    },
    tradeDate: new Date('2030-01-01T12:00:00.000Z'),
    strike: new Decimal(900),
    state: LifecycleState.Executed,
  };

  it('should render a terminal trade with its strike and no actions', () => {
    const view = toTradeStatusResponse('trade-1', executed);

    expect(view.status).toBe(5);
    expect(view.strike).toBe('900');
    expect(view.tradeDate).toBe('2030-01-01T12:00:00.000Z');
    expect(view.details.currencyAmount).toBe('18446744073709551616');
    expect(view.details.underlyingCurrencyCodes).toEqual([840, 392]);
    expect(view.availableActions).toEqual([]);
  });

  it('should render only the keys present in a diff', () => {
    const view = toDiffView({
      notionalCurrency: { before: USD, after: JPY },
      deliveryDate: {
        before: new Date('2031-05-03T00:00:00.000Z'),
        after: new Date('2031-06-03T00:00:00.000Z'),
      },
      strike: new Decimal(42),
    });

    expect(view).toEqual({
      currencyCode: { before: 840, after: 392 },
      deliveryDate: { before: '2031-05-03T00:00:00.000Z', after: '2031-06-03T00:00:00.000Z' },
      strike: '42',
    });
  });

  it('should render a record without changes as null', () => {
    const view = toHistoricalRecordResponse(3, {
      timestamp: new Date('2030-01-02T00:00:00.000Z'),
      action: TradeAction.Accept,
      userId: 'Ellie',
      stateBefore: LifecycleState.PendingApproval,
      stateAfter: LifecycleState.Approved,
    });

    expect(view).toEqual({
      index: 3,
      timestamp: '2030-01-02T00:00:00.000Z',
      action: TradeAction.Accept,
      userId: 'Ellie',
      stateBefore: LifecycleState.PendingApproval,
      stateAfter: LifecycleState.Approved,
      changes: null,
    });
  });
});
