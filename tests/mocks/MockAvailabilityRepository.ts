/**
 * In-memory mock for IAvailabilityRepository.
 */

import type {
  DateRange,
  IAvailabilityRepository,
} from '../../src/repositories/IAvailabilityRepository.js';

export class MockAvailabilityRepository implements IAvailabilityRepository {
  private avails = new Map<string, number>();
  public failWith: Error | null = null;
  public delayMs = 0;
  public calls: Array<{ productId: string; range: DateRange }> = [];

  async availableImpressions(productId: string, range: DateRange): Promise<number> {
    this.calls.push({ productId, range });
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failWith) throw this.failWith;
    return this.avails.get(productId) ?? 0;
  }

  set(productId: string, impressions: number): void {
    this.avails.set(productId, impressions);
  }
}
