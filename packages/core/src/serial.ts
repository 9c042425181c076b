export type SerialTask<T> = () => Promise<T> | T;

const noop = (): void => undefined;

/**
 * Runs tasks one at a time in submission order. Once closed, tasks that have
 * not started yet reject with the close reason.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private closeReason: Error | null = null;

  public get closed(): boolean {
    return this.closeReason !== null;
  }

  public run<T>(task: SerialTask<T>): Promise<T> {
    const result = this.tail.then(() => {
      if (this.closeReason) {
        throw this.closeReason;
      }
      return task();
    });
    this.tail = result.then(noop, noop);
    return result;
  }

  public close(reason: Error): void {
    if (!this.closeReason) {
      this.closeReason = reason;
    }
  }

  public drain(): Promise<void> {
    return this.tail;
  }
}

/**
 * Per-key promise chain: tasks sharing a key run in arrival order, tasks for
 * different keys run independently. Chains are dropped once they settle.
 */
export class KeyedSerialQueue {
  private readonly chains = new Map<string, Promise<void>>();

  public run<T>(key: string, task: SerialTask<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());
    const chain = result.then(noop, noop);
    this.chains.set(key, chain);

    void chain.then(() => {
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    });

    return result;
  }

  public get size(): number {
    return this.chains.size;
  }
}
