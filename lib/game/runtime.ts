import { randomUUID } from 'node:crypto';

/**
 * Sources of nondeterminism the game services draw on. Production uses the
 * defaults; tests pass fixed clocks, seeded randoms and counting ids.
 */
export interface Runtime {
  now: () => Date;
  /** Uniform in [0, 1) */
  random: () => number;
  newId: () => string;
}

export const defaultRuntime: Runtime = {
  now: () => new Date(),
  random: Math.random,
  newId: randomUUID,
};

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.min(max - min, Math.floor(random() * (max - min + 1)));
}

/**
 * Up to `count` distinct items, drawn without replacement in random order.
 */
export function sample<T>(items: readonly T[], count: number, random: () => number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const i = randomInt(random, 0, pool.length - 1);
    picked.push(pool.splice(i, 1)[0]);
  }
  return picked;
}
