/**
 * Wall-clock source for `t`: seconds since the clock started or was reset.
 */
export class Clock {
  private readonly now: () => number;
  private start: number;

  /**
   * @param now - millisecond time source (default: Date.now)
   */
  constructor(now: () => number = Date.now) {
    this.now = now;
    this.start = now();
  }

  get seconds(): number {
    return (this.now() - this.start) / 1000;
  }

  reset(): void {
    this.start = this.now();
  }
}
