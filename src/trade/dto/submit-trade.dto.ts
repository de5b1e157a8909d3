import { Type } from 'class-transformer';
import { IsNotEmpty, IsString, ValidateNested } from 'class-validator';
import { TradeDetailsDto } from './trade-details.dto';

// Creates a draft owned by userId and submits it for approval in one call.
export class SubmitTradeDto {
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @ValidateNested()
  @Type(() => TradeDetailsDto)
  details!: TradeDetailsDto;
}

export interface SubmitTradeResponseDto {
  uuid: string;
}
