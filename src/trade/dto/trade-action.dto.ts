import { Type } from 'class-transformer';
import {
  IsDefined,
  IsEnum,
  IsNotEmpty,
  IsString,
  Matches,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Capability } from '../entities/identity.entity';
import { TradeAction } from '../entities/lifecycle-state.entity';
import { TradeDetailsDto } from './trade-details.dto';
import { UNSIGNED_INTEGER } from '../../common/utils/decimal.util';

// One lifecycle step on a stored trade.
// details is required for Update, strike for Book.
export class TradeActionDto {
  @IsEnum(TradeAction)
  action!: TradeAction;

  @IsString()
  @IsNotEmpty()
  userId!: string;

  @IsEnum(Capability)
  capability!: Capability;

  @ValidateIf((dto: TradeActionDto) => dto.action === TradeAction.Update)
  @IsDefined()
  @ValidateNested()
  @Type(() => TradeDetailsDto)
  details?: TradeDetailsDto;

  @ValidateIf((dto: TradeActionDto) => dto.action === TradeAction.Book)
  @IsString()
  @Matches(UNSIGNED_INTEGER, { message: 'strike must be an unsigned integer' })
  strike?: string;
}
