import { Test, TestingModule } from '@nestjs/testing';
import { CurrencyController } from './currency.controller';
import { CurrencyService } from './currency.service';

describe('CurrencyController', () => {
  let controller: CurrencyController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [CurrencyController],
      providers: [CurrencyService],
    }).compile();

    controller = module.get<CurrencyController>(CurrencyController);
  });

  it('should list the catalogue with numeric codes', () => {
    const currencies = controller.list();

    expect(currencies).toHaveLength(179);
    expect(currencies.find((currency) => currency.code === 'JPY')).toEqual({
      code: 'JPY',
      numeric: 392,
      name: 'Yen',
    });
  });
});
