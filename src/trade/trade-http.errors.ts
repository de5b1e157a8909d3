import { HttpException, HttpStatus } from '@nestjs/common';
import { HttpExceptionResponse } from '../common/interfaces/http-exception.interface';
import { Result } from '../common/utils/result.util';
import { TradeError, TradeErrorCode } from './errors/trade.errors';

// Each domain failure maps to its own status so clients can tell them apart.
// A duplicate id is our fault, not the caller's.
const STATUS_BY_CODE: Record<TradeErrorCode, HttpStatus> = {
  [TradeErrorCode.InvalidDetails]: HttpStatus.UNPROCESSABLE_ENTITY,
  [TradeErrorCode.UnauthorisedRequester]: HttpStatus.UNAUTHORIZED,
  [TradeErrorCode.InvalidTransition]: HttpStatus.CONFLICT,
  [TradeErrorCode.ForbiddenCapability]: HttpStatus.FORBIDDEN,
  [TradeErrorCode.TradeNotFound]: HttpStatus.NOT_FOUND,
  [TradeErrorCode.DuplicateIdentifier]: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function toHttpException(error: TradeError): HttpException {
  const statusCode = STATUS_BY_CODE[error.code];
  const body: HttpExceptionResponse = {
    statusCode,
    message: error.message,
    error: error.code,
    timestamp: new Date().toISOString(),
  };
  return new HttpException(body, statusCode);
}

/** Boundary helper: value on success, mapped HttpException thrown on failure */
export function unwrapOrThrow<T>(result: Result<T, TradeError>): T {
  if (!result.ok) {
    throw toHttpException(result.error);
  }
  return result.value;
}
