import { Injectable, NotFoundException } from '@nestjs/common';
import { TradeDirectoryService } from './trade-directory.service';
import { TradeHistoryService } from './trade-history.service';
import { TradeStatusResponseDto } from './dto/trade-status-response.dto';
import { HistoricalRecordResponseDto, HistoryCountResponseDto } from './dto/historical-record-response.dto';
import { toHistoricalRecordResponse, toTradeStatusResponse } from './trade-response.mapper';
import { unwrapOrThrow } from './trade-http.errors';
import { HttpExceptionResponse } from '../common/interfaces/http-exception.interface';

// Read-only views over the directory and the audit ledger.
// CQRS pattern - queries separated from mutations.
@Injectable()
export class TradeQueryService {
  constructor(
    private readonly directory: TradeDirectoryService,
    private readonly history: TradeHistoryService,
  ) {}

  /** Current state and full snapshot of one trade */
  getStatus(uuid: string): TradeStatusResponseDto {
    const record = unwrapOrThrow(this.directory.get(uuid));
    return toTradeStatusResponse(uuid, record);
  }

  /** Total ledger entries */
  getHistoryCount(): HistoryCountResponseDto {
    return { count: this.history.count() };
  }

  /**
   * Ledger entry at a fixed position.
   * @throws NotFoundException when index >= count
   */
  getHistoryRecord(index: number): HistoricalRecordResponseDto {
    const record = this.history.get(index);
    if (!record) {
      const body: HttpExceptionResponse = {
        statusCode: 404,
        message: `No history record at index ${index}.`,
        error: 'HISTORY_RECORD_NOT_FOUND',
        timestamp: new Date().toISOString(),
      };
      throw new NotFoundException(body);
    }
    return toHistoricalRecordResponse(index, record);
  }
}
