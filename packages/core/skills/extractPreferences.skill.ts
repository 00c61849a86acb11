/**
 * EXTRACT PREFERENCES SKILL
 *
 * Turns a free-text ride request into structured RidePreferences.
 *
 * DETERMINISTIC: keyword tables and regexes only, no LLM.
 * Never fails the caller: anything it cannot resolve falls back to a
 * safe default and is reported as a PARSE_DEFAULTED diagnostic.
 *
 * Examples:
 * - "Go to jiit sec 62 by rickshaw" => jiit sec 62 campus, rickshaw
 * - "Take me to the mall, we are 3 people with luggage" => "the mall", 3 pax, luggage
 * - "Head to station in a non-ac auto under 150" => "station", auto, AC not needed, budget 150
 */

import { z } from "zod";
import type { Skill } from "./types";
import {
  RidePreferencesSchema,
  type AcPreference,
  type RideCategory,
  type RidePreferences,
} from "@shared/schema";
import {
  DEFAULT_DESTINATIONS,
  matchDestination,
  type CanonicalDestination,
} from "./destinations";

// ============================================
// SCHEMAS
// ============================================

const ExtractInputSchema = z.object({
  text: z.string(),
});

export const ExtractionDiagnosticSchema = z.object({
  code: z.literal("PARSE_DEFAULTED"),
  field: z.string(),
  message: z.string(),
});

const ExtractOutputSchema = z
  .object({
    preferences: RidePreferencesSchema,
    diagnostics: z.array(ExtractionDiagnosticSchema),
  })
  .transform((out) => ({ ...out, preferences: Object.freeze(out.preferences) }));

export type ExtractInput = z.infer<typeof ExtractInputSchema>;
export type ExtractionDiagnostic = z.infer<typeof ExtractionDiagnosticSchema>;

export interface ExtractionResult {
  preferences: RidePreferences;
  diagnostics: ExtractionDiagnostic[];
}

// ============================================
// KEYWORD TABLES
// ============================================

export const DEFAULT_DESTINATION_TEXT = "current location";

// Checked in this order; the first group with a hit wins
const RIDE_CATEGORY_RULES: Array<{ category: RideCategory; tokens: string[] }> = [
  { category: "rickshaw", tokens: ["rick", "rickshaw", "auto-rickshaw"] },
  { category: "bike", tokens: ["bike", "motorcycle", "two-wheeler"] },
  { category: "auto", tokens: ["auto", "auto rickshaw"] },
  { category: "premium", tokens: ["premium", "comfortable", "xl", "suv"] },
];

const LUGGAGE_TOKENS = ["luggage", "bag", "baggage", "suitcase"];

const AC_NEGATION = /\b(?:no ac|without ac|non-ac)\b/;
const AC_MENTION = /\b(?:ac|air)\b/;

const GROUP_WORD = /\b(?:we|us)\b/;
const GROUP_SIZE = /(\d+)\s+(?:of us|people|passengers|persons)/;

// A number followed by a time or distance unit is not a fare
const BUDGET =
  /\b(?:under|below|within|max(?:imum)?|budget(?:\s+of)?)\s*(?:rs\.?|₹|inr)?\s*(\d+(?:\.\d+)?)(?![\d.]|\s*(?:min|mins|minutes?|hrs?|hours?|km|kms)\b)/;

const LEADING_MARKER = /^(?:take me to|go to|head to|towards?|to|near)\s+/;

const DIRECTION_PHRASE =
  /\b(?:take me to|go to|head to|towards?|to|near)\s+([a-z][a-z\s]*?)(?=\s+(?:in|by|using|with|as|please|now|under|below|within)\b|\s*[^a-z\s]|\s*$)/;

// ============================================
// FIELD EXTRACTORS
// ============================================

export function classifyRideCategory(lower: string): RideCategory {
  for (const rule of RIDE_CATEGORY_RULES) {
    if (rule.tokens.some((token) => lower.includes(token))) {
      return rule.category;
    }
  }
  return "car";
}

export function detectAcPreference(lower: string): AcPreference {
  if (AC_NEGATION.test(lower)) return "not_needed";
  if (AC_MENTION.test(lower)) return "preferred";
  return "unspecified";
}

function extractDirectionPhrase(lower: string): string | null {
  const match = DIRECTION_PHRASE.exec(lower);
  let phrase = match?.[1]?.trim() ?? "";
  // "want to go to the mall" matches on the first "to"
  while (LEADING_MARKER.test(phrase)) {
    phrase = phrase.replace(LEADING_MARKER, "").trim();
  }
  return phrase ? phrase : null;
}

function extractBudget(lower: string): number | undefined {
  const match = BUDGET.exec(lower);
  if (!match) return undefined;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : undefined;
}

// ============================================
// PARSING LOGIC
// ============================================

export function defaultPreferences(): RidePreferences {
  return Object.freeze(
    RidePreferencesSchema.parse({ destination: DEFAULT_DESTINATION_TEXT, rideCategory: "car" })
  );
}

function parseUnsafe(
  text: string,
  destinations: readonly CanonicalDestination[]
): ExtractionResult {
  const lower = text.toLowerCase();
  const diagnostics: ExtractionDiagnostic[] = [];

  // Destination: canonical table first, then a directional phrase
  let destination = matchDestination(lower, destinations)?.name ?? extractDirectionPhrase(lower);
  if (!destination) {
    destination = DEFAULT_DESTINATION_TEXT;
    diagnostics.push({
      code: "PARSE_DEFAULTED",
      field: "destination",
      message: `No destination found, using "${DEFAULT_DESTINATION_TEXT}"`,
    });
  }

  let passengers = 1;
  if (GROUP_WORD.test(lower)) {
    const sizeMatch = GROUP_SIZE.exec(lower);
    if (sizeMatch) {
      const count = Number.parseInt(sizeMatch[1], 10);
      if (count > 0) {
        passengers = count;
      } else {
        diagnostics.push({
          code: "PARSE_DEFAULTED",
          field: "passengers",
          message: `Ignored passenger count ${sizeMatch[1]}, using 1`,
        });
      }
    }
  }

  const preferences = RidePreferencesSchema.parse({
    destination,
    rideCategory: classifyRideCategory(lower),
    passengers,
    luggage: LUGGAGE_TOKENS.some((token) => lower.includes(token)),
    acPreference: detectAcPreference(lower),
    budget: extractBudget(lower),
  });

  return { preferences: Object.freeze(preferences), diagnostics };
}

/**
 * Parse a ride request. Never throws; a parser failure yields the
 * default record plus a diagnostic.
 */
export function parseRideRequest(
  text: string,
  destinations: readonly CanonicalDestination[] = DEFAULT_DESTINATIONS
): ExtractionResult {
  try {
    return parseUnsafe(text, destinations);
  } catch (error) {
    return {
      preferences: defaultPreferences(),
      diagnostics: [
        {
          code: "PARSE_DEFAULTED",
          field: "*",
          message: `Could not parse request (${error instanceof Error ? error.message : String(error)})`,
        },
      ],
    };
  }
}

// ============================================
// SKILL DEFINITION
// ============================================

export function createExtractPreferencesSkill(
  destinations: readonly CanonicalDestination[] = DEFAULT_DESTINATIONS
): Skill<ExtractInput, ExtractionResult> {
  return {
    name: "extractPreferences",

    inputSchema: ExtractInputSchema,
    outputSchema: ExtractOutputSchema,

    async run(ctx, input) {
      const result = parseRideRequest(input.text, destinations);
      const notes = result.diagnostics.map((d) => `${d.field}: ${d.message}`);

      for (const diagnostic of result.diagnostics) {
        ctx.logger.warn(`[extractPreferences] ${diagnostic.message}`, { field: diagnostic.field });
      }
      ctx.logger.info("[extractPreferences] Preferences extracted", { ...result.preferences });

      return {
        output: result,
        meta: {
          ok: true,
          usedFallback: result.diagnostics.length > 0,
          notes: notes.length > 0 ? notes : undefined,
        },
      };
    },

    fallback() {
      return {
        preferences: defaultPreferences(),
        diagnostics: [
          {
            code: "PARSE_DEFAULTED",
            field: "*",
            message: "Extraction failed, using default preferences",
          },
        ],
      };
    },
  };
}

export const extractPreferencesSkill = createExtractPreferencesSkill();
