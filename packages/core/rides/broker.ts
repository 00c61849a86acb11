/**
 * COMPARISON ORCHESTRATOR
 *
 * Fans quote requests out to every requested provider at once, waits for
 * all of them, picks the cheapest and books it on request.
 * Main entry point of the ride comparison system.
 */

import {
  DEFAULT_PROVIDER_ORDER,
  type BookingConfirmation,
  type PriceQuote,
  type ProviderId,
  type RidePreferences,
} from "@shared/schema";
import type { AutomationClient } from "../automation";
import { DEFAULT_TIMEOUTS, type PhaseTimeouts } from "../config";
import { describeError, type Logger } from "../logging";
import type { FareHistory } from "./history";
import { createDefaultProviderRegistry, type ProviderRegistry } from "./profiles";
import { createProviderAgent } from "./provider-agent";
import { buildComparisonSummary, formatBookingSummary, selectCheapest } from "./summary";
import { DeadlineExceededError, withDeadline } from "./timeout";
import type {
  BookingOutcome,
  ComparisonOutcome,
  ComparisonResult,
  ProviderAgent,
  ProviderAgentFactory,
  ProviderError,
} from "./types";

export interface ComparisonOrchestratorDeps {
  automation: AutomationClient;
  logger: Logger;
  registry?: ProviderRegistry;
  timeouts?: Partial<PhaseTimeouts>;
  /** Used when comparePrices is called without a provider list */
  defaultProviders?: readonly ProviderId[];
  agentFactory?: ProviderAgentFactory;
  /** Every successful quote is recorded here when set */
  history?: FareHistory;
  now?: () => Date;
}

type UnitResult =
  | { provider: ProviderId; quote: PriceQuote }
  | { provider: ProviderId; quote: null; error: string };

// ============================================
// ORCHESTRATOR
// ============================================

export class ComparisonOrchestrator {
  private readonly registry: ProviderRegistry;
  private readonly timeouts: PhaseTimeouts;
  private readonly defaultProviders: readonly ProviderId[];
  private readonly agentFactory: ProviderAgentFactory;
  private readonly now: () => Date;

  private lastComparison: ComparisonResult | null = null;
  private lastBooking: BookingConfirmation | null = null;

  constructor(private readonly deps: ComparisonOrchestratorDeps) {
    this.registry = deps.registry ?? createDefaultProviderRegistry();
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
    this.defaultProviders = deps.defaultProviders ?? DEFAULT_PROVIDER_ORDER;
    this.agentFactory = deps.agentFactory ?? createProviderAgent;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Quote every requested provider concurrently and select the cheapest.
   * Providers that fail are left out of `prices` and listed in `errors`.
   */
  async comparePrices(
    pickup: string,
    destination: string,
    preferences: RidePreferences,
    providers: readonly ProviderId[] = this.defaultProviders
  ): Promise<ComparisonOutcome> {
    const order = this.resolveProviders(providers);
    const { logger } = this.deps;

    if (order.length === 0) {
      return {
        success: false,
        failure: { code: "NO_QUOTES_AVAILABLE", message: "No registered providers requested" },
      };
    }

    if (!this.deps.automation.isAvailable()) {
      logger.warn("[orchestrator] Automation unavailable, no provider can be quoted");
      return {
        success: false,
        failure: { code: "NO_QUOTES_AVAILABLE", message: "Automation is not available" },
      };
    }

    logger.info(`[orchestrator] Comparing ${order.join(", ")}`, { pickup, destination });

    let settled: PromiseSettledResult<UnitResult>[];
    try {
      settled = await withDeadline(
        (signal) =>
          Promise.allSettled(
            order.map((provider) => this.quoteUnit(provider, pickup, destination, preferences, signal))
          ),
        this.timeouts.comparisonSeconds * 1000
      );
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        logger.error(`[orchestrator] Comparison exceeded ${this.timeouts.comparisonSeconds}s, discarding results`);
        return {
          success: false,
          failure: {
            code: "TIMEOUT",
            message: `Comparison did not finish within ${this.timeouts.comparisonSeconds}s`,
          },
        };
      }
      throw error;
    }

    const prices = new Map<ProviderId, PriceQuote>();
    const errors: ProviderError[] = [];

    settled.forEach((result, index) => {
      const provider = order[index];
      if (result.status === "fulfilled" && result.value.quote) {
        prices.set(provider, result.value.quote);
        return;
      }
      const error =
        result.status === "rejected"
          ? describeError(result.reason)
          : "error" in result.value
            ? result.value.error
            : "No quote returned";
      errors.push({ provider, code: "PROVIDER_UNAVAILABLE", error });
    });

    const cheapest = selectCheapest(prices, order);
    const cheapestQuote = cheapest ? prices.get(cheapest) : undefined;
    if (!cheapest || !cheapestQuote) {
      const detail = errors.map((e) => `${e.provider}: ${e.error}`).join("; ");
      logger.error("[orchestrator] No quotes available", { errors: detail });
      return {
        success: false,
        failure: { code: "NO_QUOTES_AVAILABLE", message: `No provider returned a quote (${detail})` },
      };
    }

    const comparison: ComparisonResult = {
      prices,
      providerOrder: order,
      cheapest,
      cheapestPrice: cheapestQuote.price,
      summary: buildComparisonSummary(prices, order),
      errors,
      comparedAt: this.now().toISOString(),
    };

    for (const quote of prices.values()) {
      this.deps.history?.record(quote);
    }
    this.lastComparison = comparison;

    logger.info(`[orchestrator] Cheapest: ${cheapest} at ${cheapestQuote.price}`, {
      quoted: prices.size,
      failed: errors.length,
    });
    return { success: true, comparison };
  }

  /**
   * Book the cheapest provider of `comparison` (a fresh comparison when none is given).
   * Only the winner is tried; a failed booking is reported, never retried elsewhere.
   */
  async bookCheapest(
    pickup: string,
    destination: string,
    preferences: RidePreferences,
    comparison?: ComparisonResult
  ): Promise<BookingOutcome> {
    let current = comparison;
    if (!current) {
      const outcome = await this.comparePrices(pickup, destination, preferences);
      if (!outcome.success) return outcome;
      current = outcome.comparison;
    }

    const provider = current.cheapest;
    const quote = current.prices.get(provider);
    const { logger } = this.deps;

    if (!quote) {
      return {
        success: false,
        failure: { code: "BOOKING_FAILED", provider, message: `No quote held for ${provider}` },
        comparison: current,
      };
    }

    if (!this.deps.automation.isAvailable()) {
      return {
        success: false,
        failure: { code: "BOOKING_FAILED", provider, message: "Automation is not available" },
        comparison: current,
      };
    }

    logger.info(`[orchestrator] Booking ${provider} (${quote.rideType})`);

    let agent: ProviderAgent | undefined;
    try {
      agent = this.createAgent(provider);
      const opened = await agent.open();
      const booking = opened ? await agent.book(pickup, destination, preferences, quote) : null;

      if (!booking) {
        logger.error(`[orchestrator] Booking with ${provider} failed`);
        return {
          success: false,
          failure: { code: "BOOKING_FAILED", provider, message: `Booking with ${provider} failed` },
          comparison: current,
        };
      }

      this.lastBooking = booking;
      return { success: true, booking, comparison: current };
    } catch (error) {
      logger.error(`[orchestrator] Booking with ${provider} failed: ${describeError(error)}`);
      return {
        success: false,
        failure: { code: "BOOKING_FAILED", provider, message: describeError(error) },
        comparison: current,
      };
    } finally {
      await this.closeQuietly(agent);
    }
  }

  getLastComparison(): ComparisonResult | null {
    return this.lastComparison;
  }

  getLastBooking(): BookingConfirmation | null {
    return this.lastBooking;
  }

  getLastComparisonSummary(): string | null {
    return this.lastComparison?.summary ?? null;
  }

  getLastBookingSummary(): string | null {
    if (!this.lastBooking) return null;
    const quote = this.lastComparison?.prices.get(this.lastBooking.provider);
    return formatBookingSummary(this.lastBooking, quote?.currency);
  }

  // ============================================
  // INTERNALS
  // ============================================

  /** Dedupe, keep first-seen order, drop providers nobody registered */
  private resolveProviders(requested: readonly ProviderId[]): ProviderId[] {
    const order: ProviderId[] = [];
    for (const provider of requested) {
      if (order.includes(provider)) continue;
      if (!this.registry.has(provider)) {
        this.deps.logger.warn(`[orchestrator] Skipping unregistered provider ${provider}`);
        continue;
      }
      order.push(provider);
    }
    return order;
  }

  private createAgent(provider: ProviderId, signal?: AbortSignal): ProviderAgent {
    return this.agentFactory(this.registry.require(provider), {
      automation: this.deps.automation,
      logger: this.deps.logger,
      timeouts: this.timeouts,
      signal,
    });
  }

  /** open -> fetchQuote -> close for one provider; never rejects */
  private async quoteUnit(
    provider: ProviderId,
    pickup: string,
    destination: string,
    preferences: RidePreferences,
    signal: AbortSignal
  ): Promise<UnitResult> {
    let agent: ProviderAgent | undefined;
    try {
      agent = this.createAgent(provider, signal);
      if (!(await agent.open())) {
        return { provider, quote: null, error: "Could not open app" };
      }

      const quote = await agent.fetchQuote(pickup, destination, preferences);
      return quote ? { provider, quote } : { provider, quote: null, error: "No quote returned" };
    } catch (error) {
      this.deps.logger.error(`[orchestrator] ${provider} quote failed: ${describeError(error)}`);
      return { provider, quote: null, error: describeError(error) };
    } finally {
      await this.closeQuietly(agent);
    }
  }

  private async closeQuietly(agent: ProviderAgent | undefined): Promise<void> {
    if (!agent) return;
    try {
      await agent.close();
    } catch (error) {
      this.deps.logger.warn(`[orchestrator] ${agent.provider} close failed: ${describeError(error)}`);
    }
  }
}

export function createComparisonOrchestrator(deps: ComparisonOrchestratorDeps): ComparisonOrchestrator {
  return new ComparisonOrchestrator(deps);
}
