/**
 * Terminal rendering for the ride-compare CLI.
 */

import {
  applyBudgetFilter,
  formatCurrency,
  formatEtaEstimate,
  selectFastest,
  type ComparisonResult,
  type OrchestratorFailure,
  type ProviderError,
} from "@core/rides";
import { DEFAULT_DESTINATIONS } from "@core/skills";
import { RideCategorySchema, type ProviderId, type RidePreferences } from "@shared/schema";

const FAILURE_LABELS: Record<OrchestratorFailure["code"], string> = {
  NO_QUOTES_AVAILABLE: "No quotes available",
  TIMEOUT: "Comparison timed out",
  BOOKING_FAILED: "Booking failed",
};

export const BANNER = [
  "=".repeat(50),
  "Ride Fare Compare",
  "Compares fares across your ride apps and books the cheapest.",
  "=".repeat(50),
].join("\n");

export function renderHelp(providers: readonly ProviderId[]): string {
  return [
    "Describe your ride in plain words, for example:",
    '  "Go to jiit sec 62 by rickshaw"',
    '  "Take me to the airport, we are 3 people with luggage"',
    '  "Head to station in a non-ac auto under 150"',
    "",
    `Known destinations: ${DEFAULT_DESTINATIONS.map((d) => d.name).join(", ")}`,
    `Ride categories: ${RideCategorySchema.options.join(", ")}`,
    `Providers: ${providers.join(", ")}`,
    "",
    "Commands: last (show the last comparison), help, quit",
  ].join("\n");
}

export function renderPreferences(preferences: RidePreferences): string {
  const parts = [
    `Destination: ${preferences.destination}`,
    `Ride: ${preferences.rideCategory}`,
    `Passengers: ${preferences.passengers}`,
    `Luggage: ${preferences.luggage ? "yes" : "no"}`,
    `AC: ${preferences.acPreference.replace("_", " ")}`,
  ];
  if (preferences.budget !== undefined) {
    parts.push(`Budget: ${formatCurrency(preferences.budget)}`);
  }
  return parts.join(" | ");
}

function row(marker: string, provider: string, rideType: string, fare: string, eta: string): string {
  return `${marker} ${provider.padEnd(8)} ${rideType.padEnd(12)} ${fare.padEnd(10)} ${eta}`;
}

/**
 * One row per quoted provider, in provider order. The cheapest is marked with `*`.
 */
export function renderComparisonTable(comparison: ComparisonResult): string {
  const lines = [row(" ", "PROVIDER", "RIDE TYPE", "FARE", "ETA")];

  for (const [provider, quote] of comparison.prices) {
    lines.push(
      row(
        provider === comparison.cheapest ? "*" : " ",
        provider,
        quote.rideType,
        formatCurrency(quote.price, quote.currency),
        formatEtaEstimate(quote.eta)
      )
    );
  }

  return lines.join("\n");
}

/**
 * Points out a quicker pickup when the cheapest ride is not also the fastest.
 */
export function renderFastestNote(comparison: ComparisonResult): string | null {
  const fastest = selectFastest(comparison.prices, comparison.providerOrder);
  if (!fastest || fastest === comparison.cheapest) return null;

  const quote = comparison.prices.get(fastest);
  if (!quote) return null;
  return `Fastest pickup: ${fastest} (${formatEtaEstimate(quote.eta)}, ${formatCurrency(quote.price, quote.currency)})`;
}

export function renderProviderErrors(errors: readonly ProviderError[]): string | null {
  if (errors.length === 0) return null;
  return errors.map((e) => `  ! ${e.provider}: ${e.error}`).join("\n");
}

export function renderBudgetWarning(comparison: ComparisonResult, budget: number | undefined): string | null {
  if (budget === undefined) return null;

  const within = applyBudgetFilter(comparison.prices, comparison.providerOrder, budget);
  if (within.length === 0) {
    return `No fare is within your budget of ${formatCurrency(budget)} (cheapest is ${formatCurrency(comparison.cheapestPrice)})`;
  }
  if (within.length < comparison.prices.size) {
    return `${within.length} of ${comparison.prices.size} fares are within your budget of ${formatCurrency(budget)}`;
  }
  return null;
}

export function renderFailure(failure: OrchestratorFailure): string {
  return `✗ ${FAILURE_LABELS[failure.code]}: ${failure.message}`;
}
