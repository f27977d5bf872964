/**
 * Reasoning iterations shared by every task of a run. Resumed runs start from
 * the persisted `used` count.
 */
export class IterationBudget {
  constructor(
    readonly limit: number,
    private consumed = 0
  ) {}

  /** Take one iteration; false once the budget is spent. */
  tryConsume(): boolean {
    if (this.consumed >= this.limit) return false;
    this.consumed++;
    return true;
  }

  get used(): number {
    return this.consumed;
  }

  get remaining(): number {
    return Math.max(0, this.limit - this.consumed);
  }
}
