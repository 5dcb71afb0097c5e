/**
 * Deadline
 * Absolute point in time threaded through bounded work such as recursive searches.
 */

export type Clock = () => number;

export class Deadline {
  private constructor(private readonly expiresAt: number, private readonly clock: Clock) {}

  public static after(budgetMs: number, clock: Clock = Date.now): Deadline {
    return new Deadline(clock() + budgetMs, clock);
  }

  public expired(): boolean {
    return this.clock() >= this.expiresAt;
  }

  public remainingMs(): number {
    return Math.max(0, this.expiresAt - this.clock());
  }
}
