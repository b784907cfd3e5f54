import type { APIGatewayProxyResult } from 'aws-lambda';
import type { GameError, GameErrorKind, GameResult } from '../../types/result';

// ============================================
// Response Envelope
//
//   { success: true, data }
//   { success: false, error: { code, message } }
// ============================================

const headers = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type',
};

export const ErrorCodes = {
  VALIDATION_ERROR: { code: 'VALIDATION_ERROR', status: 400 },
  INSUFFICIENT_FUNDS: { code: 'INSUFFICIENT_FUNDS', status: 402 },
  NOT_FOUND: { code: 'NOT_FOUND', status: 404 },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500 },
  PERSISTENCE_FAILURE: { code: 'PERSISTENCE_FAILURE', status: 500 },
  GENERATION_UNAVAILABLE: { code: 'GENERATION_UNAVAILABLE', status: 502 },
  GENERATION_MALFORMED: { code: 'GENERATION_MALFORMED', status: 502 },
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

const ERROR_CODES_BY_KIND: Record<GameErrorKind, ErrorCode> = {
  InvalidRequest: ErrorCodes.VALIDATION_ERROR,
  InsufficientFunds: ErrorCodes.INSUFFICIENT_FUNDS,
  NotFound: ErrorCodes.NOT_FOUND,
  PersistenceFailure: ErrorCodes.PERSISTENCE_FAILURE,
  GatewayUnavailable: ErrorCodes.GENERATION_UNAVAILABLE,
  GatewayMalformedResponse: ErrorCodes.GENERATION_MALFORMED,
};

export function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers,
    body: JSON.stringify({ success: true, data }),
  };
}

export function errorResponse(code: string, message: string, statusCode: number): APIGatewayProxyResult {
  return {
    statusCode,
    headers,
    body: JSON.stringify({ success: false, error: { code, message } }),
  };
}

export function gameErrorResponse(error: GameError): APIGatewayProxyResult {
  const { code, status } = ERROR_CODES_BY_KIND[error.kind];
  return errorResponse(code, error.message, status);
}

/** Passes a service result through as the HTTP response. */
export function resultResponse<T>(result: GameResult<T>, statusCode = 200): APIGatewayProxyResult {
  return result.success ? successResponse(result.data, statusCode) : gameErrorResponse(result.error);
}
