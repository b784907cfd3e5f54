/**
 * Common types shared across the data model.
 */

/** Cost bracket for a choice; also the difficulty scale of a mission. */
export type Tier = 'low' | 'medium' | 'high';

export const TIERS: readonly Tier[] = ['low', 'medium', 'high'];

export function isTier(value: unknown): value is Tier {
  return typeof value === 'string' && (TIERS as readonly string[]).includes(value);
}

/** ISO-8601 timestamp string */
export type Timestamp = string;
