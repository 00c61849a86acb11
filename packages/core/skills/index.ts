/**
 * SKILL SYSTEM — EXPORTS
 */

// Types and runner
export * from "./types";

// Preference extraction
export {
  extractPreferencesSkill,
  createExtractPreferencesSkill,
  parseRideRequest,
  classifyRideCategory,
  detectAcPreference,
  defaultPreferences,
  DEFAULT_DESTINATION_TEXT,
  type ExtractInput,
  type ExtractionResult,
  type ExtractionDiagnostic,
} from "./extractPreferences.skill";
export {
  DEFAULT_DESTINATIONS,
  matchDestination,
  isSpecificKeyword,
  type CanonicalDestination,
  type DestinationMatch,
} from "./destinations";
export { normalizeLocation } from "./locations";
