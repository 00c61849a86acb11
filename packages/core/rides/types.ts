/**
 * RIDES — DOMAIN TYPES
 *
 * Provider-agent contract, provider profiles and the typed outcomes
 * the comparison orchestrator hands back to its callers.
 */

import { z } from "zod";
import type {
  BookingConfirmation,
  PriceQuote,
  ProviderId,
  RideCategory,
  RidePreferences,
} from "@shared/schema";
import type { AutomationClient } from "../automation";
import type { Logger } from "../logging";
import type { PhaseTimeouts } from "../config";

// ============================================
// PROVIDER PROFILE (config + templates per provider)
// ============================================

export interface ProviderProfile {
  id: ProviderId;
  appName: string;
  packageName: string;

  /** Preference category => label shown in the provider app */
  rideTypes: Record<RideCategory, string>;

  hints: {
    /** Where the destination box lives on the home screen */
    searchField: string;
    /** How to pick the destination out of the autocomplete list */
    suggestion: string;
    /** Sample option names, shown to the automation agent */
    rideTypeExamples: string[];
    etaExample: string;
  };

  /** Provider-specific steps inserted before the final booking confirmation */
  bookingExtraSteps: string[];
}

// ============================================
// PROVIDER AGENT
// ============================================

export type SessionState = "closed" | "open" | "quote_fetched" | "booking_confirmed";

export interface ProviderAgent {
  readonly provider: ProviderId;
  readonly state: SessionState;

  /** Bring the provider app to the foreground. False on any failure. */
  open(): Promise<boolean>;

  /** Null on timeout, automation failure or an unusable reading */
  fetchQuote(
    pickup: string,
    destination: string,
    preferences: RidePreferences
  ): Promise<PriceQuote | null>;

  book(
    pickup: string,
    destination: string,
    preferences: RidePreferences,
    quote: PriceQuote
  ): Promise<BookingConfirmation | null>;

  /** Best-effort teardown, never throws */
  close(): Promise<boolean>;
}

export interface ProviderAgentDeps {
  automation: AutomationClient;
  logger: Logger;
  timeouts: Pick<PhaseTimeouts, "openSeconds" | "quoteSeconds" | "bookSeconds">;
  /** Aborts in-flight automation calls (comparison deadline) */
  signal?: AbortSignal;
}

export type ProviderAgentFactory = (profile: ProviderProfile, deps: ProviderAgentDeps) => ProviderAgent;

// ============================================
// FAILURES
// ============================================

export const FailureCodeSchema = z.enum([
  "NO_QUOTES_AVAILABLE", // every provider failed
  "TIMEOUT",             // comparison deadline exceeded
  "BOOKING_FAILED",      // winner's booking call failed
]);

export type FailureCode = z.infer<typeof FailureCodeSchema>;

export interface OrchestratorFailure {
  code: FailureCode;
  message: string;
  provider?: ProviderId;
}

/** A provider that produced no quote during a comparison */
export interface ProviderError {
  provider: ProviderId;
  code: "PROVIDER_UNAVAILABLE";
  error: string;
}

// ============================================
// COMPARISON
// ============================================

export interface ComparisonResult {
  /** Iteration order follows providerOrder */
  prices: ReadonlyMap<ProviderId, PriceQuote>;
  /** Providers as requested; decides price ties */
  providerOrder: readonly ProviderId[];
  cheapest: ProviderId;
  cheapestPrice: number;
  summary: string;
  errors: ProviderError[];
  comparedAt: string;
}

export type ComparisonOutcome =
  | { success: true; comparison: ComparisonResult }
  | { success: false; failure: OrchestratorFailure };

export type BookingOutcome =
  | { success: true; booking: BookingConfirmation; comparison: ComparisonResult }
  | { success: false; failure: OrchestratorFailure; comparison?: ComparisonResult };
