import { Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe } from '@nestjs/common';
import { TradeQueryService } from './trade-query.service';
import { HistoricalRecordResponseDto, HistoryCountResponseDto } from './dto/historical-record-response.dto';
import { malformedInput } from '../common/pipes/validation.pipe';

@Controller('history')
export class TradeHistoryController {
  constructor(private readonly queryService: TradeQueryService) {}

  /**
   * Number of audited transitions.
   *
   * GET /history
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  count(): HistoryCountResponseDto {
    return this.queryService.getHistoryCount();
  }

  /**
   * One audited transition by position, oldest first.
   *
   * GET /history/:index
   */
  @Get(':index')
  @HttpCode(HttpStatus.OK)
  record(
    @Param('index', new ParseIntPipe({ exceptionFactory: (error: string) => malformedInput(error) }))
    index: number,
  ): HistoricalRecordResponseDto {
    return this.queryService.getHistoryRecord(index);
  }
}
