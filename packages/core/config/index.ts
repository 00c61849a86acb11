/**
 * APP CONFIGURATION
 *
 * Parsed from environment variables with Zod. The CLI loads `.env`
 * through dotenv before calling loadConfig().
 */

import { z } from "zod";
import { DEFAULT_PROVIDER_ORDER, ProviderIdSchema, type ProviderId } from "@shared/schema";

// ============================================
// HELPERS
// ============================================

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase()));

// setTimeout holds a signed 32-bit millisecond delay
export const MAX_TIMEOUT_SECONDS = 2_147_483;

function seconds(defaultValue: number) {
  return z.coerce.number().finite().positive().max(MAX_TIMEOUT_SECONDS).default(defaultValue);
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const providerList = z
  .string()
  .optional()
  .transform((value, ctx): ProviderId[] => {
    if (!value || !value.trim()) return [...DEFAULT_PROVIDER_ORDER];

    const ids: ProviderId[] = [];
    for (const raw of value.split(",")) {
      const name = raw.trim().toLowerCase();
      if (!name) continue;
      const parsed = ProviderIdSchema.safeParse(name);
      if (!parsed.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown provider "${name}" (expected one of ${ProviderIdSchema.options.join(", ")})`,
        });
        return z.NEVER;
      }
      if (!ids.includes(parsed.data)) ids.push(parsed.data);
    }
    return ids.length > 0 ? ids : [...DEFAULT_PROVIDER_ORDER];
  });

// ============================================
// SCHEMA
// ============================================

const EnvSchema = z.object({
  RIDE_COMPARE_DEBUG: booleanFlag,
  DEVICE_SERIAL: optionalString,
  PLATFORM: z
    .string()
    .optional()
    .transform((value) => (value ?? "android").trim().toLowerCase())
    .pipe(z.enum(["android", "ios"])),
  AUTOMATION_URL: optionalString.pipe(z.string().url().optional()),
  AUTOMATION_API_KEY: optionalString,
  OPEN_TIMEOUT_SECONDS: seconds(30),
  QUOTE_TIMEOUT_SECONDS: seconds(120),
  BOOK_TIMEOUT_SECONDS: seconds(180),
  COMPARISON_TIMEOUT_SECONDS: seconds(300),
  DEFAULT_PROVIDERS: providerList,
  SNAPSHOT_DIR: optionalString,
});

export type Platform = "android" | "ios";

export interface PhaseTimeouts {
  /** Bringing the provider app to the foreground */
  openSeconds: number;
  /** Destination entry + fare read-out */
  quoteSeconds: number;
  /** Full booking flow */
  bookSeconds: number;
  /** Wall-clock deadline for a whole comparison */
  comparisonSeconds: number;
}

export interface AppConfig {
  debug: boolean;
  deviceSerial?: string;
  platform: Platform;
  automation: {
    url?: string;
    apiKey?: string;
  };
  timeouts: PhaseTimeouts;
  defaultProviders: ProviderId[];
  snapshotDir?: string;
}

export const DEFAULT_TIMEOUTS: PhaseTimeouts = {
  openSeconds: 30,
  quoteSeconds: 120,
  bookSeconds: 180,
  comparisonSeconds: 300,
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

// ============================================
// LOADER
// ============================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    debug: parsed.RIDE_COMPARE_DEBUG,
    deviceSerial: parsed.DEVICE_SERIAL,
    platform: parsed.PLATFORM,
    automation: {
      url: parsed.AUTOMATION_URL,
      apiKey: parsed.AUTOMATION_API_KEY,
    },
    timeouts: {
      openSeconds: parsed.OPEN_TIMEOUT_SECONDS,
      quoteSeconds: parsed.QUOTE_TIMEOUT_SECONDS,
      bookSeconds: parsed.BOOK_TIMEOUT_SECONDS,
      comparisonSeconds: parsed.COMPARISON_TIMEOUT_SECONDS,
    },
    defaultProviders: parsed.DEFAULT_PROVIDERS,
    snapshotDir: parsed.SNAPSHOT_DIR,
  };
}
