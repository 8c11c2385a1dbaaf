/**
 * Serializes async work per key. Used to keep one writer per
 * `(tenantId, senderId)` while a lead's flow state is read and written.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  get heldKeys() {
    return this.tails.size;
  }

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export const leadLockKey = (tenantId: string, senderId: string) => `${tenantId}:${senderId}`;
