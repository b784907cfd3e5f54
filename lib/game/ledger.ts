import {
  CURRENCY_KINDS,
  isCurrencyKind,
  type CurrencyAmounts,
  type CurrencyKind,
} from '../types/currency';
import type { LedgerEntry, TransactionType } from '../types/transaction';

/**
 * Currency Ledger
 *
 * Pure functions over a player's balance mapping. Nothing here persists;
 * callers stage the returned balances on a progress copy and commit them
 * together with the matching ledger entries.
 */

/** Starting balances for every new player record. */
export const STARTING_BALANCES: Readonly<CurrencyAmounts> = {
  '💎': 50,
  '💵': 50,
  '💷': 40,
  '💶': 45,
  '💴': 500,
};

/** Present, known-kind entries of an amounts mapping, in CURRENCY_KINDS order. */
export function amountEntries(amounts: CurrencyAmounts): [CurrencyKind, number][] {
  const entries: [CurrencyKind, number][] = [];
  for (const kind of CURRENCY_KINDS) {
    const amount = amounts[kind];
    if (amount !== undefined) entries.push([kind, amount]);
  }
  return entries;
}

/** A mapping holding one kind. */
export function singleAmount(kind: CurrencyKind, amount: number): CurrencyAmounts {
  const amounts: CurrencyAmounts = {};
  amounts[kind] = amount;
  return amounts;
}

export function balance(balances: CurrencyAmounts, kind: CurrencyKind): number {
  return balances[kind] ?? 0;
}

/** True iff every required kind is covered. An empty requirement is always affordable. */
export function canAfford(balances: CurrencyAmounts, requirement: CurrencyAmounts): boolean {
  return amountEntries(requirement).every(([kind, amount]) => balance(balances, kind) >= amount);
}

/**
 * Subtracts a cost, flooring each kind at zero. Does not check affordability;
 * the caller gates with canAfford first.
 */
export function debit(balances: CurrencyAmounts, requirement: CurrencyAmounts): CurrencyAmounts {
  const next: CurrencyAmounts = { ...balances };
  for (const [kind, amount] of amountEntries(requirement)) {
    next[kind] = Math.max(0, balance(balances, kind) - amount);
  }
  return next;
}

export function credit(balances: CurrencyAmounts, kind: CurrencyKind, amount: number): CurrencyAmounts {
  if (amount < 0) {
    throw new RangeError(`credit amount must be non-negative, got ${amount}`);
  }
  const next: CurrencyAmounts = { ...balances };
  next[kind] = balance(balances, kind) + amount;
  return next;
}

/** Kind-wise sum of two balance mappings. */
export function mergeBalances(a: CurrencyAmounts, b: CurrencyAmounts): CurrencyAmounts {
  let merged: CurrencyAmounts = { ...a };
  for (const [kind, amount] of amountEntries(b)) {
    merged = credit(merged, kind, amount);
  }
  return merged;
}

/**
 * Reads a stored balance mapping, dropping unknown kinds and clamping bad
 * values to zero. Stored data predates the current currency set in places.
 */
export function normalizeBalances(raw: unknown): CurrencyAmounts {
  const balances: CurrencyAmounts = {};
  if (typeof raw !== 'object' || raw === null) return balances;
  for (const [key, value] of Object.entries(raw)) {
    if (!isCurrencyKind(key)) continue;
    const amount = typeof value === 'number' && Number.isFinite(value) ? Math.floor(value) : 0;
    balances[key] = Math.max(0, amount);
  }
  return balances;
}

// ============================================
// Ledger entries
// ============================================

export interface LedgerEntryInput {
  playerId: string;
  transactionType: TransactionType;
  amounts: CurrencyAmounts;
  description: string;
  storyNodeId?: string;
  now: Date;
  newId: () => string;
}

/**
 * Builds one ledger entry per currency kind in `amounts`. Zero amounts are
 * skipped; there is nothing to audit.
 */
export function ledgerEntries(input: LedgerEntryInput): LedgerEntry[] {
  const createdAt = input.now.toISOString();
  return amountEntries(input.amounts)
    .filter(([, amount]) => amount > 0)
    .map(([currency, amount]) => ({
      transactionId: `${createdAt}#${input.newId()}`,
      playerId: input.playerId,
      transactionType: input.transactionType,
      currency,
      amount,
      description: input.description,
      storyNodeId: input.storyNodeId,
      createdAt,
    }));
}

/** Shortens player-visible text for ledger descriptions. */
export function describeChoice(prefix: string, text: string): string {
  return text.length > 50 ? `${prefix}: ${text.slice(0, 50)}...` : `${prefix}: ${text}`;
}
