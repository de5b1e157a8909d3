import { Injectable, Logger } from '@nestjs/common';
import { isRFC3339 } from 'class-validator';
import { CurrencyService } from '../currency/currency.service';
import { Currency } from '../currency/entities/currency.entity';
import { AnyTradeRecord, MutableTradeFields } from './entities/trade-record.entity';
import { Capability, approver, requester } from './entities/identity.entity';
import { TradeAction } from './entities/lifecycle-state.entity';
import { SubmitTradeDto } from './dto/submit-trade.dto';
import { TradeActionDto } from './dto/trade-action.dto';
import { TradeDetailsDto } from './dto/trade-details.dto';
import { TradeCommand, TradeLifecycleService } from './trade-lifecycle.service';
import { TradeDirectoryService } from './trade-directory.service';
import { unwrapOrThrow } from './trade-http.errors';
import { malformedInput } from '../common/pipes/validation.pipe';
import { isUnsignedIntegerString, toDecimal } from '../common/utils/decimal.util';

// Request-facing mutations: parse wire input, drive the lifecycle engine,
// keep the directory pointing at each trade's current record.
@Injectable()
export class TradeService {
  private readonly logger = new Logger(TradeService.name);

  constructor(
    private readonly lifecycle: TradeLifecycleService,
    private readonly directory: TradeDirectoryService,
    private readonly currencies: CurrencyService,
  ) {}

  /**
   * Creates a draft for dto.userId, submits it as that requester and stores
   * the pending trade.
   * @returns the new trade's uuid
   */
  submit(dto: SubmitTradeDto): string {
    const owner = requester(dto.userId);
    const fields = this.toTradeFields(dto.details);

    const draft = unwrapOrThrow(this.lifecycle.createDraft(owner, fields));
    const pending = unwrapOrThrow(this.lifecycle.submit(draft, owner));
    const uuid = unwrapOrThrow(this.directory.create(pending));

    this.logger.log(`Trade ${uuid} submitted by ${owner.id}`);
    return uuid;
  }

  /**
   * Applies one lifecycle action to a stored trade and stores the result.
   * A rejected action leaves the stored record as it was.
   */
  act(uuid: string, dto: TradeActionDto): AnyTradeRecord {
    const current = unwrapOrThrow(this.directory.get(uuid));
    const next = unwrapOrThrow(this.lifecycle.apply(current, this.toCommand(dto)));
    return unwrapOrThrow(this.directory.replace(uuid, next));
  }

  private toCommand(dto: TradeActionDto): TradeCommand {
    const actor = dto.capability === Capability.Requester ? requester(dto.userId) : approver(dto.userId);

    switch (dto.action) {
      case TradeAction.Update:
        if (!dto.details) {
          throw malformedInput('details are required to update a trade');
        }
        return { action: dto.action, actor, fields: this.toTradeFields(dto.details) };
      case TradeAction.Book:
        if (dto.strike === undefined || !isUnsignedIntegerString(dto.strike)) {
          throw malformedInput('strike must be an unsigned integer');
        }
        return { action: dto.action, actor, strike: toDecimal(dto.strike) };
      default:
        return { action: dto.action, actor };
    }
  }

  private toTradeFields(details: TradeDetailsDto): MutableTradeFields {
    if (!isUnsignedIntegerString(details.currencyAmount)) {
      throw malformedInput('currencyAmount must be an unsigned integer');
    }

    const notionalCurrency = this.resolveCurrency(details.currencyCode, "Currency doesn't follow ISO standard.");
    const underlying = details.underlyingCurrencyCodes.map((code) =>
      this.resolveCurrency(code, "Underlying currency codes don't follow ISO standard."),
    );

    return {
      counterparty: details.counterparty,
      direction: details.direction,
      style: details.style,
      notionalCurrency,
      notionalAmount: toDecimal(details.currencyAmount),
      underlying: underlying.filter(
        (currency, index) => underlying.findIndex((other) => other.code === currency.code) === index,
      ),
      valueDate: this.parseDate(details.valueDate, "Value Date doesn't follow the UTC standard."),
      deliveryDate: this.parseDate(details.deliveryDate, "Delivery Date doesn't follow the UTC standard."),
    };
  }

  private resolveCurrency(numeric: number, message: string): Currency {
    const currency = this.currencies.fromNumeric(numeric);
    if (!currency) {
      throw malformedInput(message);
    }
    return currency;
  }

  // Offset-less strings would be read in local time, so they are refused.
  private parseDate(value: string, message: string): Date {
    const date = new Date(value);
    if (!isRFC3339(value) || Number.isNaN(date.getTime())) {
      throw malformedInput(message);
    }
    return date;
  }
}
