import { Test, TestingModule } from '@nestjs/testing';
import { TradeController } from './trade.controller';
import { TradeHistoryController } from './trade-history.controller';
import { TradeService } from './trade.service';
import { TradeQueryService } from './trade-query.service';
import { TradeLifecycleService } from './trade-lifecycle.service';
import { TradeHistoryService } from './trade-history.service';
import { TRADE_ID_GENERATOR, TradeDirectoryService } from './trade-directory.service';
import { CurrencyModule } from '../currency/currency.module';
import { Direction } from './entities/trade-record.entity';
import { LifecycleState, TradeAction } from './entities/lifecycle-state.entity';
import { Capability } from './entities/identity.entity';
import { SubmitTradeDto } from './dto/submit-trade.dto';

describe('TradeController', () => {
  let controller: TradeController;
  let historyController: TradeHistoryController;
  let history: TradeHistoryService;
  let idCounter = 1;

  const submitDto = (amount = '1'): SubmitTradeDto => ({
    userId: 'Bob',
    details: {
      counterparty: 'Maggie',
      direction: Direction.BUY,
      style: 'Forward Contract Currency Exchange.',
      currencyCode: 840,
      currencyAmount: amount,
      underlyingCurrencyCodes: [840, 826],
      valueDate: '2099-01-01T00:00:00.000Z',
      deliveryDate: '2099-01-02T00:00:00.000Z',
    },
  });

  beforeEach(async () => {
    idCounter = 1;
    const module: TestingModule = await Test.createTestingModule({
      imports: [CurrencyModule],
      controllers: [TradeController, TradeHistoryController],
      providers: [
        TradeHistoryService,
        TradeLifecycleService,
        TradeDirectoryService,
        { provide: TRADE_ID_GENERATOR, useValue: () => `00000000-0000-4000-8000-00000000000${idCounter++}` },
        TradeService,
        TradeQueryService,
      ],
    }).compile();

    controller = module.get<TradeController>(TradeController);
    historyController = module.get<TradeHistoryController>(TradeHistoryController);
    history = module.get<TradeHistoryService>(TradeHistoryService);
  });

  afterEach(() => {
    history.clear();
  });

  describe('submit', () => {
    it('should return the new trade uuid', () => {
      expect(controller.submit(submitDto())).toEqual({ uuid: '00000000-0000-4000-8000-000000000001' });
    });

    it('should hand out a fresh uuid per trade', () => {
      const first = controller.submit(submitDto());
      const second = controller.submit(submitDto());

      expect(second.uuid).not.toBe(first.uuid);
    });
  });

  describe('status', () => {
    it('should report a submitted trade as pending approval', () => {
      const { uuid } = controller.submit(submitDto());

      const status = controller.status(uuid);

      expect(status.state).toBe(LifecycleState.PendingApproval);
      expect(status.status).toBe(1);
      expect(status.details.currencyAmount).toBe('1');
    });
  });

  describe('act', () => {
    it('should return the trade in its new state', () => {
      const { uuid } = controller.submit(submitDto());

      const status = controller.act(uuid, {
        action: TradeAction.Update,
        userId: 'Ellie',
        capability: Capability.Approver,
        details: submitDto('1000').details,
      });

      expect(status).toMatchObject({
        uuid,
        state: LifecycleState.NeedsReapproval,
        status: 2,
        availableActions: [TradeAction.Cancel, TradeAction.Approve],
      });
      expect(status.details.currencyAmount).toBe('1000');
    });
  });

  describe('history', () => {
    it('should expose the ledger through the history controller', () => {
      const { uuid } = controller.submit(submitDto());
      controller.act(uuid, {
        action: TradeAction.Update,
        userId: 'Ellie',
        capability: Capability.Approver,
        details: submitDto('1000').details,
      });

      expect(historyController.count()).toEqual({ count: 2 });
      expect(historyController.record(1)).toMatchObject({
        index: 1,
        action: TradeAction.Update,
        userId: 'Ellie',
        changes: { currencyAmount: { before: '1', after: '1000' } },
      });
    });

    it('should reject an index past the end', () => {
      expect(() => historyController.record(0)).toThrow('No history record at index 0.');
    });
  });
});
