/**
 * In-process keyed lock. Operations on the same player run one after
 * another; different players never wait on each other.
 *
 * This only serializes within one process. Across processes the version
 * condition on the progress record catches lost updates.
 */
export class PlayerLocks {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(playerId: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(playerId) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(playerId, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      if (this.tails.get(playerId) === tail) {
        this.tails.delete(playerId);
      }
    }
  }

  /** Number of players with a held or queued lock */
  get size(): number {
    return this.tails.size;
  }
}
