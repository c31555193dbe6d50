/**
 * Inventory availability (avails) source.
 */

export interface DateRange {
  /** ISO-8601 date. */
  start: string;
  /** ISO-8601 date. */
  end: string;
}

export interface IAvailabilityRepository {
  /** Impressions still sellable for the product over the flight. */
  availableImpressions(productId: string, range: DateRange): Promise<number>;
}
