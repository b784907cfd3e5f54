/**
 * Currency -- the in-game money a player spends to unlock story choices.
 *
 * Four everyday currencies price the AI-authored choices by risk tier; the
 * diamond is the premium currency that pays for custom (free-text) actions
 * and is awarded for completed missions.
 */

export const CURRENCY_KINDS = ['💎', '💵', '💷', '💶', '💴'] as const;

export type CurrencyKind = typeof CURRENCY_KINDS[number];

/** The premium currency. */
export const PREMIUM_CURRENCY: CurrencyKind = '💎';

/**
 * A mapping of currency kind to a non-negative integer amount.
 * Used both for balances and for costs (an empty cost is free).
 */
export type CurrencyAmounts = Partial<Record<CurrencyKind, number>>;

export function isCurrencyKind(value: string): value is CurrencyKind {
  return (CURRENCY_KINDS as readonly string[]).includes(value);
}
