/**
 * Outward result shape for every public game operation.
 *
 * Mirrors the API envelope ({ success, data } | { success, error }) so a
 * handler can pass results through without reshaping them.
 */

export type GameErrorKind =
  | 'InsufficientFunds'
  | 'NotFound'
  | 'InvalidRequest'
  | 'GatewayUnavailable'
  | 'GatewayMalformedResponse'
  | 'PersistenceFailure';

export interface GameError {
  kind: GameErrorKind;
  message: string;
}

export type GameResult<T> =
  | { success: true; data: T }
  | { success: false; error: GameError };

export function ok<T>(data: T): GameResult<T> {
  return { success: true, data };
}

export function fail<T = never>(kind: GameErrorKind, message: string): GameResult<T> {
  return { success: false, error: { kind, message } };
}
