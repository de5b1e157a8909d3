// Body of every error response. `error` carries a machine-readable category
// (MALFORMED_INPUT, INVALID_DETAILS, TRADE_NOT_FOUND, ...).
export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  timestamp?: string;
  path?: string;
  details?: ValidationError[];
}

export interface ValidationError {
  property: string;
  constraints: Record<string, string>;
}
