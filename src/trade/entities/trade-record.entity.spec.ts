import Decimal from 'decimal.js';
import { Direction, MutableTradeFields, fieldsEqual, sameUnderlying } from './trade-record.entity';
import { Capability, approver, requester, sameIdentity, signIn } from './identity.entity';
import { Currency } from '../../currency/entities/currency.entity';

const USD: Currency = { code: 'USD', numeric: 840, name: 'US Dollar' };
const GBP: Currency = { code: 'GBP', numeric: 826, name: 'Pound Sterling' };

describe('trade record equality', () => {
  const createFields = (overrides: Partial<MutableTradeFields> = {}): MutableTradeFields => ({
    counterparty: 'Maggie',
    direction: Direction.BUY,
    style: 'Forward',
    notionalCurrency: USD,
    notionalAmount: new Decimal(100),
    underlying: [USD, GBP],
    valueDate: new Date('2031-01-01T00:00:00.000Z'),
    deliveryDate: new Date('2031-01-02T00:00:00.000Z'),
    ...overrides,
  });

  it('should compare fields by value', () => {
    expect(fieldsEqual(createFields(), createFields())).toBe(true);
    expect(fieldsEqual(createFields(), createFields({ notionalAmount: new Decimal('100.0') }))).toBe(true);
  });

  it('should treat the underlying currencies as a set', () => {
    expect(sameUnderlying([USD, GBP], [GBP, USD])).toBe(true);
    expect(sameUnderlying([USD, GBP], [USD])).toBe(false);
    expect(fieldsEqual(createFields(), createFields({ underlying: [GBP, USD] }))).toBe(true);
  });

  it('should notice a changed field', () => {
    expect(fieldsEqual(createFields(), createFields({ direction: Direction.SELL }))).toBe(false);
    expect(
      fieldsEqual(createFields(), createFields({ deliveryDate: new Date('2031-01-03T00:00:00.000Z') })),
    ).toBe(false);
  });
});

describe('identity', () => {
  it('should freeze identities at sign-in', () => {
    const user = signIn('Bob', Capability.Requester);

    expect(user).toEqual({ id: 'Bob', capability: Capability.Requester });
    expect(Object.isFrozen(user)).toBe(true);
  });

  it('should match on both id and capability', () => {
    expect(sameIdentity(requester('Bob'), requester('Bob'))).toBe(true);
    expect(sameIdentity(requester('Bob'), approver('Bob'))).toBe(false);
    expect(sameIdentity(requester('Bob'), requester('Ellie'))).toBe(false);
  });
});
