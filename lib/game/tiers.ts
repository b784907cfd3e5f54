import type { Tier } from '../types/common';
import { isTier, TIERS } from '../types/common';
import type { CurrencyAmounts, CurrencyKind } from '../types/currency';
import { amountEntries, singleAmount } from './ledger';

/**
 * Static price table for AI-authored choices. Each tier lists the currency
 * kinds it may be priced in and the fixed amount for each kind; a choice is
 * charged in exactly one of them.
 */
export const CHOICE_PRICE_TIERS: Readonly<Record<Tier, CurrencyAmounts>> = {
  low: { '💵': 5, '💷': 4, '💶': 4, '💴': 50 },
  medium: { '💵': 15, '💷': 12, '💶': 13, '💴': 150 },
  high: { '💵': 25, '💷': 20, '💶': 22, '💴': 250 },
};

/** Flat price of a custom (free-text) action. */
export const CUSTOM_CHOICE_COST: Readonly<CurrencyAmounts> = { '💎': 1 };

/**
 * Tier for the choice at `index`: the declared risk level when it is one of
 * low/medium/high, otherwise by position (low, medium, high in order;
 * anything past the third is medium).
 */
export function tierForChoice(declaredRisk: unknown, index: number): Tier {
  if (isTier(declaredRisk)) return declaredRisk;
  return TIERS[index] ?? 'medium';
}

/**
 * Picks one of the tier's currency kinds uniformly at random and returns the
 * single-kind cost for it.
 */
export function priceForTier(tier: Tier, random: () => number): CurrencyAmounts {
  const options = amountEntries(CHOICE_PRICE_TIERS[tier]);
  const pick = Math.min(options.length - 1, Math.floor(random() * options.length));
  const [kind, amount]: [CurrencyKind, number] = options[pick];
  return singleAmount(kind, amount);
}
