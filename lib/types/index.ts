/**
 * Barrel export for all shared types.
 *
 * Usage:
 *   import type { PlayerProgress, StoryNode } from '../types';
 */

export type { CurrencyKind, CurrencyAmounts } from './currency';
export { CURRENCY_KINDS, PREMIUM_CURRENCY, isCurrencyKind } from './currency';
export type { Tier, Timestamp } from './common';
export { TIERS, isTier } from './common';
export type { Character } from './character';
export type { PlayerProgress, ChoiceHistoryEntry, SessionState } from './player';
export type { Mission, MissionStatus } from './mission';
export type {
  StoryGeneration,
  StoryNode,
  StoryChoice,
  BranchMetadata,
  ChoiceMetadata,
  NodeType,
} from './story';
export type { LedgerEntry, TransactionType } from './transaction';
export type { GameResult, GameError, GameErrorKind } from './result';
export { ok, fail } from './result';
