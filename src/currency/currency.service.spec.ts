import { Test, TestingModule } from '@nestjs/testing';
import { CurrencyService } from './currency.service';

describe('CurrencyService', () => {
  let service: CurrencyService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CurrencyService],
    }).compile();

    service = module.get<CurrencyService>(CurrencyService);
  });

  describe('fromNumeric', () => {
    it('should resolve ISO numeric codes', () => {
      expect(service.fromNumeric(840)).toEqual({ code: 'USD', numeric: 840, name: 'US Dollar' });
      expect(service.fromNumeric(826)?.code).toBe('GBP');
      expect(service.fromNumeric(978)?.code).toBe('EUR');
    });

    it('should resolve codes beyond the major currencies', () => {
      expect(service.fromNumeric(643)?.code).toBe('RUB');
      expect(service.fromNumeric(818)?.code).toBe('EGP');
      expect(service.fromNumeric(32)?.code).toBe('ARS');
      expect(service.fromNumeric(959)?.code).toBe('XAU');
    });

    it('should return undefined for codes ISO 4217 does not assign', () => {
      expect(service.fromNumeric(0)).toBeUndefined();
      expect(service.fromNumeric(1)).toBeUndefined();
      expect(service.fromNumeric(998)).toBeUndefined();
    });

    it('should hand out frozen entries', () => {
      expect(Object.isFrozen(service.fromNumeric(840))).toBe(true);
    });
  });

  describe('list', () => {
    it('should return the whole table sorted by code', () => {
      const codes = service.list().map((currency) => currency.code);

      expect(codes[0]).toBe('AED');
      expect(codes[codes.length - 1]).toBe('ZWG');
      expect(codes).toHaveLength(179);
      expect([...codes].sort()).toEqual(codes);
    });

    it('should keep numeric codes unique', () => {
      const numerics = service.list().map((currency) => currency.numeric);
      expect(new Set(numerics).size).toBe(numerics.length);
    });
  });
});
