/**
 * LedgerEntry -- an immutable audit record of a currency movement.
 *
 * The ledger is write-only history. Balances live on PlayerProgress and are
 * never recomputed from these entries.
 */

import type { CurrencyKind } from './currency';
import type { Timestamp } from './common';

export type TransactionType =
  | 'choice'
  | 'custom_choice'
  | 'mission_reward'
  | 'purchase'
  | 'session_merge';

export interface LedgerEntry {
  /** Sort key; time-ordered within a player */
  transactionId: string;
  playerId: string;
  transactionType: TransactionType;
  currency: CurrencyKind;

  /** Always positive; direction follows from the transaction type */
  amount: number;

  description: string;
  storyNodeId?: string;
  createdAt: Timestamp;
}
