import { TimeoutError } from './errors.js';

/**
 * Per-request compute budget. Analytics are synchronous, so the budget is
 * enforced at checkpoints: between storage pages and between stages.
 */
export class Deadline {
  private readonly expiresAt: number;

  constructor(
    public readonly budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + budgetMs;
  }

  static unbounded(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY);
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.now() >= this.expiresAt;
  }

  check(stage: string): void {
    if (this.expired()) {
      throw new TimeoutError(this.budgetMs, stage);
    }
  }
}
