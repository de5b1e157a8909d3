import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { TradeHistoryService } from './trade/trade-history.service';
import { TRADE_ID_GENERATOR, TradeDirectoryService } from './trade/trade-directory.service';
import { LifecycleState, TradeAction } from './trade/entities/lifecycle-state.entity';

describe('AppController', () => {
  let controller: AppController;
  let history: TradeHistoryService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        TradeHistoryService,
        TradeDirectoryService,
        { provide: TRADE_ID_GENERATOR, useValue: () => 'trade-1' },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
    history = module.get<TradeHistoryService>(TradeHistoryService);
  });

  it('should report health with the ledger size', () => {
    history.append({
      timestamp: new Date(),
      action: TradeAction.Submit,
      userId: 'Bob',
      stateBefore: LifecycleState.Draft,
      stateAfter: LifecycleState.PendingApproval,
    });

    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.service).toBe('trade-lifecycle');
    expect(health.historyEntries).toBe(1);
    expect(health.trades).toBe(0);
  });

  it('should list the trade endpoints', () => {
    expect(controller.getRoot().endpoints).toMatchObject({
      submit: 'POST /trades',
      actions: 'POST /trades/:uuid/actions',
      currencies: 'GET /currencies',
    });
  });
});
