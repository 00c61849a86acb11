/**
 * SHARED DOMAIN SCHEMAS
 *
 * Zod schemas for the records that flow between the extractor,
 * the provider agents and the comparison orchestrator.
 */

import { z } from "zod";

// ============================================
// PROVIDERS
// ============================================

export const ProviderIdSchema = z.enum(["uber", "ola", "rapido"]);
export type ProviderId = z.infer<typeof ProviderIdSchema>;

export const DEFAULT_PROVIDER_ORDER: readonly ProviderId[] = ["uber", "ola", "rapido"];

// ============================================
// RIDE PREFERENCES
// ============================================

export const RideCategorySchema = z.enum(["car", "rickshaw", "bike", "auto", "premium"]);
export type RideCategory = z.infer<typeof RideCategorySchema>;

export const AcPreferenceSchema = z.enum([
  "preferred",   // AC asked for
  "not_needed",  // explicitly declined ("no ac", "non-ac")
  "unspecified",
]);
export type AcPreference = z.infer<typeof AcPreferenceSchema>;

export const RidePreferencesSchema = z.object({
  destination: z.string().min(1),
  rideCategory: RideCategorySchema.default("car"),
  passengers: z.number().int().positive().default(1),
  luggage: z.boolean().default(false),
  acPreference: AcPreferenceSchema.default("unspecified"),
  budget: z.number().finite().nonnegative().optional(),
});

export type RidePreferences = Readonly<z.infer<typeof RidePreferencesSchema>>;

// ============================================
// PRICE QUOTE
// ============================================

export const DEFAULT_CURRENCY = "INR";

export const PriceQuoteSchema = z.object({
  provider: ProviderIdSchema,
  rideType: z.string().min(1),
  price: z.number().finite().nonnegative(),
  eta: z.string(),
  distance: z.string().optional(),
  currency: z.string().default(DEFAULT_CURRENCY),
  extraCharges: z.string().optional(),
  available: z.boolean().default(true),
});

export type PriceQuote = Readonly<z.infer<typeof PriceQuoteSchema>>;

// ============================================
// BOOKING CONFIRMATION
// ============================================

export const BookingConfirmationSchema = z.object({
  bookingId: z.string().min(1),
  provider: ProviderIdSchema,
  rideType: z.string(),
  price: z.number().finite().nonnegative(),
  arrivalEstimate: z.string(),
  driverName: z.string().optional(),
  driverRating: z.number().min(0).max(5).optional(),
  vehicleDetails: z.string().optional(),
  status: z.string().default("confirmed"),
  pickup: z.string(),
  destination: z.string(),
});

export type BookingConfirmation = Readonly<z.infer<typeof BookingConfirmationSchema>>;

// ============================================
// AUTOMATION RESULT SHAPES (wire format)
// ============================================

// Field names the automation agent fills in from the provider app screen.
export const QuoteReadingSchema = z.object({
  ride_type: z.string().min(1),
  // Some apps only show a range ("₹120-150")
  estimated_price: z.union([z.number().finite().nonnegative(), z.string().min(1)]),
  estimated_time: z.string(),
  distance: z.string().nullish(),
  currency: z.string().nullish(),
  extra_charges: z.string().nullish(),
  available: z.boolean().nullish(),
});

export type QuoteReading = z.infer<typeof QuoteReadingSchema>;

export const BookingReadingSchema = z.object({
  booking_id: z.string().min(1),
  ride_type: z.string().nullish(),
  estimated_price: z.number().finite().nonnegative().nullish(),
  estimated_arrival: z.string().nullish(),
  driver_name: z.string().nullish(),
  driver_rating: z.number().min(0).max(5).nullish(),
  vehicle_details: z.string().nullish(),
  status: z.string().nullish(),
  pickup_location: z.string().nullish(),
  destination: z.string().nullish(),
});

export type BookingReading = z.infer<typeof BookingReadingSchema>;

// ============================================
// SNAPSHOT FILES
// ============================================

export const ComparisonSnapshotSchema = z.object({
  timestamp: z.string(),
  comparison: z.record(
    z.object({
      ride_type: z.string(),
      estimated_price: z.number(),
      estimated_time: z.string(),
      distance: z.string().nullable(),
      available: z.boolean(),
    })
  ),
});

export type ComparisonSnapshot = z.infer<typeof ComparisonSnapshotSchema>;

export const BookingSnapshotSchema = z.object({
  timestamp: z.string(),
  booking: z.object({
    booking_id: z.string(),
    app_name: z.string(),
    ride_type: z.string(),
    estimated_price: z.number(),
    estimated_arrival: z.string(),
    driver_name: z.string().nullable(),
    driver_rating: z.number().nullable(),
    vehicle_details: z.string().nullable(),
    status: z.string(),
    pickup_location: z.string(),
    destination: z.string(),
  }),
});

export type BookingSnapshot = z.infer<typeof BookingSnapshotSchema>;
