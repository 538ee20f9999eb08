/**
 * Fixed-capacity counting semaphore. Waiters are admitted FIFO.
 */

export type Release = () => void;

export class AdmissionGate {
  private held = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Admission gate capacity must be a positive integer (got ${capacity})`);
    }
  }

  /** Slots currently held */
  get active(): number {
    return this.held;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<Release> {
    if (this.held < this.capacity) {
      this.held++;
    } else {
      // the releasing task hands its slot straight over, so held stays put
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  /** Run fn while holding one slot; the slot is returned on every exit path. */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.held--;
    }
  }
}
