/**
 * RIDES — EXPORTS
 *
 * Provider agents, registry and the comparison orchestrator.
 */

// Types
export * from "./types";

// Provider profiles & registry
export {
  ProviderRegistry,
  createDefaultProviderRegistry,
  BUILT_IN_PROFILES,
  UBER_PROFILE,
  OLA_PROFILE,
  RAPIDO_PROFILE,
} from "./profiles";

// Provider agent
export { AutomatedProviderAgent, createProviderAgent } from "./provider-agent";
export {
  buildOpenGoal,
  buildQuoteGoal,
  buildBookingGoal,
  rideTypeFor,
  QUOTE_RESULT_SHAPE,
  BOOKING_RESULT_SHAPE,
  type TripRequest,
} from "./goals";

// Orchestrator
export {
  ComparisonOrchestrator,
  createComparisonOrchestrator,
  type ComparisonOrchestratorDeps,
} from "./broker";

// Helpers
export {
  selectCheapest,
  selectFastest,
  rankQuotes,
  computeSavings,
  applyBudgetFilter,
  buildComparisonSummary,
  formatBookingSummary,
  type Savings,
} from "./summary";
export { formatCurrency, formatEtaEstimate, etaToMinutes, parseFareRange } from "./format";
export { FareHistory, DEFAULT_HISTORY_CAPACITY, type FareHistoryEntry } from "./history";
export {
  saveComparisonSnapshot,
  saveBookingSnapshot,
  toComparisonSnapshot,
  toBookingSnapshot,
} from "./snapshot";
export { withDeadline, DeadlineExceededError, OperationAbortedError } from "./timeout";
