/**
 * Counts consecutive hook failures per addon inside a sliding window.
 * A success clears the addon's count.
 */
export class FailureTracker {
  private readonly failures: Map<string, number[]> = new Map();

  constructor(
    private readonly threshold: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * @returns true when this failure reaches the threshold; the count resets
   */
  recordFailure(addonId: string): boolean {
    const at = this.now();
    const recent = (this.failures.get(addonId) ?? []).filter((time) => at - time < this.windowMs);
    recent.push(at);

    if (recent.length >= this.threshold) {
      this.failures.delete(addonId);
      return true;
    }
    this.failures.set(addonId, recent);
    return false;
  }

  recordSuccess(addonId: string): void {
    this.failures.delete(addonId);
  }

  count(addonId: string): number {
    const at = this.now();
    return (this.failures.get(addonId) ?? []).filter((time) => at - time < this.windowMs).length;
  }

  reset(addonId?: string): void {
    if (addonId === undefined) {
      this.failures.clear();
    } else {
      this.failures.delete(addonId);
    }
  }
}
