/**
 * In-memory fare history for the current process.
 * Oldest entries are dropped once `capacity` is reached.
 */

import type { PriceQuote, ProviderId } from "@shared/schema";

export interface FareHistoryEntry {
  provider: ProviderId;
  rideType: string;
  price: number;
  recordedAt: string;
}

export const DEFAULT_HISTORY_CAPACITY = 100;

export class FareHistory {
  private entries: FareHistoryEntry[] = [];

  constructor(
    private readonly capacity: number = DEFAULT_HISTORY_CAPACITY,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(quote: PriceQuote): void {
    this.entries.push({
      provider: quote.provider,
      rideType: quote.rideType,
      price: quote.price,
      recordedAt: this.now().toISOString(),
    });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** Mean recorded price, optionally narrowed to one ride type. Null when nothing matches. */
  averagePrice(provider: ProviderId, rideType?: string): number | null {
    const matching = this.entries.filter(
      (entry) => entry.provider === provider && (rideType === undefined || entry.rideType === rideType)
    );
    if (matching.length === 0) return null;

    const total = matching.reduce((sum, entry) => sum + entry.price, 0);
    return total / matching.length;
  }

  list(): readonly FareHistoryEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
