/**
 * RIDE COMPARE CORE — MAIN EXPORTS
 *
 * Preference extraction, provider agents and the comparison orchestrator.
 */

// Skills (preference extraction)
export * from "./skills";

// Automation capability clients
export * from "./automation";

// Rides (provider agents + orchestrator)
export * from "./rides";

// Ambient
export * from "./logging";
export { loadConfig, ConfigError, DEFAULT_TIMEOUTS, MAX_TIMEOUT_SECONDS, type AppConfig, type PhaseTimeouts, type Platform } from "./config";
