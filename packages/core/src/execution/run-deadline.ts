import { DeadlineExceededError } from '@ideaweaver/shared/src/utils/errors.js';

/** Global wall-clock budget for a run. `undefined` budget means no deadline. */
export class RunDeadline {
  private readonly expiresAt: number | undefined;

  constructor(
    budgetMs: number | undefined,
    private readonly now: () => number = Date.now,
  ) {
    this.expiresAt = budgetMs === undefined ? undefined : now() + budgetMs;
  }

  static none(): RunDeadline {
    return new RunDeadline(undefined);
  }

  get expired(): boolean {
    return this.expiresAt !== undefined && this.now() >= this.expiresAt;
  }

  remainingMs(): number {
    return this.expiresAt === undefined ? Infinity : Math.max(0, this.expiresAt - this.now());
  }

  throwIfExpired(): void {
    if (this.expired) {
      throw new DeadlineExceededError();
    }
  }
}
