/**
 * FIFO async mutex. Only one `lock` body runs at a time; later callers queue in arrival order.
 */
export class Mutex {
  private queue: (() => void)[] = [];
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  async lock<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = async () => {
        this.locked = true;
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        } finally {
          this.locked = false;
          const next = this.queue.shift();
          if (next) next();
        }
      };

      if (this.locked) {
        this.queue.push(() => void run());
      } else {
        void run();
      }
    });
  }
}
