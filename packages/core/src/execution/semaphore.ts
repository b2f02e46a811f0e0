/** Counting semaphore with FIFO hand-off to waiters. */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError('Semaphore capacity must be >= 1');
    }
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // The slot passes straight to the waiter; `available` stays unchanged.
      next();
      return;
    }
    this.available = Math.min(this.capacity, this.available + 1);
  }
}
