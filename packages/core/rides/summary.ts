/**
 * CHEAPEST SELECTION & SUMMARIES
 *
 * Pure helpers over a set of quotes keyed by provider.
 */

import { DEFAULT_CURRENCY, type BookingConfirmation, type PriceQuote, type ProviderId } from "@shared/schema";
import { etaToMinutes, formatCurrency } from "./format";

const RULE = "=".repeat(50);

// ============================================
// SELECTION
// ============================================

/**
 * Provider with the lowest price. Ties go to the provider listed first in `order`.
 */
export function selectCheapest(
  prices: ReadonlyMap<ProviderId, PriceQuote>,
  order: readonly ProviderId[]
): ProviderId | null {
  let best: ProviderId | null = null;
  let bestPrice = Number.POSITIVE_INFINITY;

  for (const provider of order) {
    const quote = prices.get(provider);
    if (quote && quote.price < bestPrice) {
      best = provider;
      bestPrice = quote.price;
    }
  }

  return best;
}

/**
 * Provider with the shortest pickup ETA, ties in `order`. Quotes whose ETA has no
 * number in it are skipped.
 */
export function selectFastest(
  prices: ReadonlyMap<ProviderId, PriceQuote>,
  order: readonly ProviderId[]
): ProviderId | null {
  let best: ProviderId | null = null;
  let bestMinutes = Number.POSITIVE_INFINITY;

  for (const provider of order) {
    const quote = prices.get(provider);
    const minutes = quote ? etaToMinutes(quote.eta) : null;
    if (minutes !== null && minutes < bestMinutes) {
      best = provider;
      bestMinutes = minutes;
    }
  }

  return best;
}

/**
 * Quotes sorted by price ascending, ties kept in provider order.
 */
export function rankQuotes(
  prices: ReadonlyMap<ProviderId, PriceQuote>,
  order: readonly ProviderId[]
): PriceQuote[] {
  const quotes: PriceQuote[] = [];
  for (const provider of order) {
    const quote = prices.get(provider);
    if (quote) quotes.push(quote);
  }
  // Array.prototype.sort is stable
  return quotes.sort((a, b) => a.price - b.price);
}

export interface Savings {
  provider: ProviderId;
  /** How much more this provider charges than the cheapest */
  amount: number;
  /** amount as a percentage of this provider's price */
  percent: number;
}

export function computeSavings(
  prices: ReadonlyMap<ProviderId, PriceQuote>,
  order: readonly ProviderId[]
): Savings[] {
  const ranked = rankQuotes(prices, order);
  if (ranked.length < 2) return [];

  const cheapest = ranked[0].price;
  return ranked.slice(1).map((quote) => ({
    provider: quote.provider,
    amount: quote.price - cheapest,
    percent: quote.price > 0 ? ((quote.price - cheapest) / quote.price) * 100 : 0,
  }));
}

/**
 * Quotes at or under the budget, in provider order.
 */
export function applyBudgetFilter(
  prices: ReadonlyMap<ProviderId, PriceQuote>,
  order: readonly ProviderId[],
  budget: number | undefined
): PriceQuote[] {
  const quotes: PriceQuote[] = [];
  for (const provider of order) {
    const quote = prices.get(provider);
    if (quote && (budget === undefined || quote.price <= budget)) {
      quotes.push(quote);
    }
  }
  return quotes;
}

// ============================================
// TEXT SUMMARIES
// ============================================

export function buildComparisonSummary(
  prices: ReadonlyMap<ProviderId, PriceQuote>,
  order: readonly ProviderId[]
): string {
  const ranked = rankQuotes(prices, order);
  if (ranked.length === 0) return "No quotes available";

  const lines: string[] = ["Price Comparison Results", RULE];

  ranked.forEach((quote, index) => {
    lines.push("");
    lines.push(`#${index + 1} ${quote.provider.toUpperCase()}`);
    lines.push(`   Ride Type: ${quote.rideType}`);
    lines.push(`   Fare: ${formatCurrency(quote.price, quote.currency)}`);
    lines.push(`   ETA: ${quote.eta}`);
    if (quote.distance) lines.push(`   Distance: ${quote.distance}`);
    if (quote.extraCharges) lines.push(`   Extra Charges: ${quote.extraCharges}`);
    if (!quote.available) lines.push("   Availability: not available right now");
  });

  const cheapest = ranked[0];
  lines.push("");
  lines.push(RULE);
  lines.push(
    `Cheapest Option: ${cheapest.provider.toUpperCase()} (${formatCurrency(cheapest.price, cheapest.currency)})`
  );

  const [runnerUp] = computeSavings(prices, order);
  if (runnerUp) {
    lines.push(
      `Savings: ${formatCurrency(runnerUp.amount, cheapest.currency)} (${runnerUp.percent.toFixed(1)}%) vs ${runnerUp.provider.toUpperCase()}`
    );
  }

  return lines.join("\n");
}

export function formatBookingSummary(
  booking: BookingConfirmation,
  currency: string = DEFAULT_CURRENCY
): string {
  const lines = [
    "Ride Booked Successfully!",
    `   App: ${booking.provider.toUpperCase()}`,
    `   Booking ID: ${booking.bookingId}`,
    `   Ride Type: ${booking.rideType}`,
    `   Fare: ${formatCurrency(booking.price, currency)}`,
  ];

  if (booking.driverName) {
    const rating = booking.driverRating !== undefined ? ` (${booking.driverRating}★)` : "";
    lines.push(`   Driver: ${booking.driverName}${rating}`);
  }
  lines.push(`   Arrival: ${booking.arrivalEstimate}`);
  if (booking.vehicleDetails) lines.push(`   Vehicle: ${booking.vehicleDetails}`);
  lines.push(`   Status: ${booking.status}`);

  return lines.join("\n");
}
