/**
 * Visited Set
 * Deduplication ledger keyed by normalized URL
 */

export class VisitedSet {
  private claimed: Set<string> = new Set();
  private duplicatesCount: number = 0;

  /**
   * Claim a key. True only the first time the key is presented.
   */
  tryClaim(key: string): boolean {
    if (this.claimed.has(key)) {
      this.duplicatesCount++;
      return false;
    }

    this.claimed.add(key);
    return true;
  }

  /**
   * Check if key has already been claimed
   */
  has(key: string): boolean {
    return this.claimed.has(key);
  }

  /**
   * Get statistics
   */
  getStats(): { total: number; duplicates: number } {
    return {
      total: this.claimed.size,
      duplicates: this.duplicatesCount,
    };
  }

  size(): number {
    return this.claimed.size;
  }
}
