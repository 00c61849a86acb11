/**
 * AUTOMATION GOAL TEMPLATES
 *
 * Natural-language instructions handed to the device automation agent,
 * filled in from a provider profile and the rider's preferences.
 */

import type { PriceQuote, RidePreferences } from "@shared/schema";
import type { ResultShape } from "../automation";
import { formatCurrency } from "./format";
import type { ProviderProfile } from "./types";

export interface TripRequest {
  pickup: string;
  destination: string;
  preferences: RidePreferences;
}

// ============================================
// RESULT SHAPES
// ============================================

export const QUOTE_RESULT_SHAPE: ResultShape = {
  name: "RideQuote",
  fields: {
    ride_type: "Name of the ride option selected",
    estimated_price: "Fare as a number, or the fare text as shown when it is a range",
    estimated_time: "Driver arrival time as shown",
    distance: "Trip distance if shown",
    currency: "Currency code if not INR",
    extra_charges: "Surge, toll or other extras if shown",
    available: "false if the option is unavailable right now",
  },
};

export const BOOKING_RESULT_SHAPE: ResultShape = {
  name: "RideBooking",
  fields: {
    booking_id: "Booking or trip identifier",
    ride_type: "Ride option that was booked",
    estimated_price: "Final fare as a number",
    estimated_arrival: "Driver arrival time",
    driver_name: "Driver name if shown",
    driver_rating: "Driver rating (0-5) if shown",
    vehicle_details: "Vehicle model and number plate if shown",
    status: "Booking status as shown",
    pickup_location: "Pickup shown on the confirmation screen",
    destination: "Destination shown on the confirmation screen",
  },
};

// ============================================
// HELPERS
// ============================================

function numbered(steps: string[]): string[] {
  return steps.map((step, index) => `${index + 1}. ${step}`);
}

function tripNotes(preferences: RidePreferences): string[] {
  const notes = [`- Passengers: ${preferences.passengers}`];
  if (preferences.luggage) notes.push("- Luggage: needs boot space");
  if (preferences.acPreference === "preferred") notes.push("- AC: preferred");
  if (preferences.acPreference === "not_needed") notes.push("- AC: not needed");
  if (preferences.budget !== undefined) {
    notes.push(`- Budget: up to ${formatCurrency(preferences.budget)}`);
  }
  return notes;
}

export function rideTypeFor(profile: ProviderProfile, preferences: RidePreferences): string {
  return profile.rideTypes[preferences.rideCategory];
}

// ============================================
// TEMPLATES
// ============================================

export function buildOpenGoal(profile: ProviderProfile): string {
  return `Open the ${profile.appName} app and wait until its home screen is ready`;
}

export function buildQuoteGoal(profile: ProviderProfile, request: TripRequest): string {
  const rideType = rideTypeFor(profile, request.preferences);
  const examples = profile.hints.rideTypeExamples.map((name) => `"${name}"`).join(", ");

  return [
    `Open ${profile.appName} and read the fare estimate.`,
    "",
    "STEPS:",
    ...numbered([
      `Make sure ${profile.appName} is open and ready`,
      `Tap the destination field (${profile.hints.searchField})`,
      `Type the destination: ${request.destination}`,
      profile.hints.suggestion,
      `On the fare screen, find the ${rideType} ride option`,
      "Read its fare, arrival time, distance and any extra charges",
    ]),
    "",
    "TRIP:",
    `- Pickup: ${request.pickup}`,
    ...tripNotes(request.preferences),
    "",
    "RETURN:",
    `- ride_type: the option name (e.g. ${examples})`,
    "- estimated_price: fare as a number, or the range as shown (e.g. 120-150)",
    `- estimated_time: arrival time like "${profile.hints.etaExample}"`,
    "- distance: if shown",
    "- extra_charges: if shown",
  ].join("\n");
}

export function buildBookingGoal(
  profile: ProviderProfile,
  request: TripRequest,
  quote: PriceQuote
): string {
  return [
    `Complete the ${profile.appName} ride booking.`,
    "",
    "TRIP:",
    `- Pickup: ${request.pickup}`,
    `- Destination: ${request.destination}`,
    `- Ride type: ${quote.rideType}`,
    `- Quoted fare: ${formatCurrency(quote.price, quote.currency)}`,
    ...tripNotes(request.preferences),
    "",
    "STEPS:",
    ...numbered([
      `Set or confirm the pickup location: ${request.pickup}`,
      `Enter the destination: ${request.destination}`,
      `Select the ${quote.rideType} option`,
      ...profile.bookingExtraSteps,
      "Confirm the booking",
      "Wait for the driver assignment screen",
    ]),
    "",
    "RETURN:",
    "- booking_id",
    "- driver_name, driver_rating, vehicle_details if shown",
    "- estimated_arrival",
    "- estimated_price: final fare as a number",
    "- status",
  ].join("\n");
}
