/**
 * SNAPSHOT FILES
 *
 * Optional flat JSON record of the last comparison / booking.
 * One file per call; the caller picks the path.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { BookingConfirmation, BookingSnapshot, ComparisonSnapshot } from "@shared/schema";
import type { ComparisonResult } from "./types";

export function toComparisonSnapshot(comparison: ComparisonResult, now: Date = new Date()): ComparisonSnapshot {
  const entries: ComparisonSnapshot["comparison"] = {};
  for (const [provider, quote] of comparison.prices) {
    entries[provider] = {
      ride_type: quote.rideType,
      estimated_price: quote.price,
      estimated_time: quote.eta,
      distance: quote.distance ?? null,
      available: quote.available,
    };
  }
  return { timestamp: now.toISOString(), comparison: entries };
}

export function toBookingSnapshot(booking: BookingConfirmation, now: Date = new Date()): BookingSnapshot {
  return {
    timestamp: now.toISOString(),
    booking: {
      booking_id: booking.bookingId,
      app_name: booking.provider,
      ride_type: booking.rideType,
      estimated_price: booking.price,
      estimated_arrival: booking.arrivalEstimate,
      driver_name: booking.driverName ?? null,
      driver_rating: booking.driverRating ?? null,
      vehicle_details: booking.vehicleDetails ?? null,
      status: booking.status,
      pickup_location: booking.pickup,
      destination: booking.destination,
    },
  };
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

export async function saveComparisonSnapshot(
  comparison: ComparisonResult,
  filePath: string,
  now?: Date
): Promise<ComparisonSnapshot> {
  const snapshot = toComparisonSnapshot(comparison, now);
  await writeJson(filePath, snapshot);
  return snapshot;
}

export async function saveBookingSnapshot(
  booking: BookingConfirmation,
  filePath: string,
  now?: Date
): Promise<BookingSnapshot> {
  const snapshot = toBookingSnapshot(booking, now);
  await writeJson(filePath, snapshot);
  return snapshot;
}
