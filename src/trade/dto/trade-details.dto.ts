import {
  ArrayNotEmpty,
  IsArray,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsRFC3339,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { Direction } from '../entities/trade-record.entity';
import { UNSIGNED_INTEGER } from '../../common/utils/decimal.util';

// Mutable trade fields as they arrive on the wire.
// Currencies are ISO 4217 numeric codes; amounts are digit strings so that
// values past Number.MAX_SAFE_INTEGER survive JSON. Dates are RFC 3339
// date-times with an explicit offset, never read in the host's time zone.
export class TradeDetailsDto {
  @IsString()
  @IsNotEmpty()
  counterparty!: string;

  @IsEnum(Direction)
  direction!: Direction;

  @IsString()
  @IsNotEmpty()
  style!: string;

  @IsInt()
  @Min(1)
  @Max(999)
  currencyCode!: number;

  @IsString()
  @Matches(UNSIGNED_INTEGER, { message: 'currencyAmount must be an unsigned integer' })
  currencyAmount!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(1, { each: true })
  @Max(999, { each: true })
  underlyingCurrencyCodes!: number[];

  @IsRFC3339({ message: "Value Date doesn't follow the UTC standard." })
  valueDate!: string;

  @IsRFC3339({ message: "Delivery Date doesn't follow the UTC standard." })
  deliveryDate!: string;
}
