import { Body, Controller, Get, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { TradeService } from './trade.service';
import { TradeQueryService } from './trade-query.service';
import { SubmitTradeDto, SubmitTradeResponseDto } from './dto/submit-trade.dto';
import { TradeActionDto } from './dto/trade-action.dto';
import { TradeStatusResponseDto } from './dto/trade-status-response.dto';
import { toTradeStatusResponse } from './trade-response.mapper';
import { malformedInput } from '../common/pipes/validation.pipe';

const tradeIdPipe = new ParseUUIDPipe({
  version: '4',
  exceptionFactory: (error: string) => malformedInput(error),
});

@Controller('trades')
export class TradeController {
  constructor(
    private readonly tradeService: TradeService,
    private readonly queryService: TradeQueryService,
  ) {}

  /**
   * Creates a draft for the requester and submits it for approval.
   *
   * POST /trades
   * @returns 201 with the trade uuid
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  submit(@Body() submitTradeDto: SubmitTradeDto): SubmitTradeResponseDto {
    return { uuid: this.tradeService.submit(submitTradeDto) };
  }

  /**
   * Current lifecycle state and field snapshot.
   *
   * GET /trades/:uuid
   */
  @Get(':uuid')
  @HttpCode(HttpStatus.OK)
  status(@Param('uuid', tradeIdPipe) uuid: string): TradeStatusResponseDto {
    return this.queryService.getStatus(uuid);
  }

  /**
   * Moves a trade along its lifecycle (accept, update, approve, book, ...).
   *
   * POST /trades/:uuid/actions
   * @returns 200 with the trade in its new state
   */
  @Post(':uuid/actions')
  @HttpCode(HttpStatus.OK)
  act(
    @Param('uuid', tradeIdPipe) uuid: string,
    @Body() tradeActionDto: TradeActionDto,
  ): TradeStatusResponseDto {
    const record = this.tradeService.act(uuid, tradeActionDto);
    return toTradeStatusResponse(uuid, record);
  }
}
