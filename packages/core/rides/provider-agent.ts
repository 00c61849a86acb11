/**
 * PROVIDER AGENT
 *
 * Drives one provider app through the automation capability:
 *
 *   closed -> open -> (quote_fetched | booking_confirmed) -> closed
 *
 * Every failure (timeout, automation error, unusable reading) is logged,
 * returns the session to `closed`, and comes back as false / null.
 */

import {
  BookingConfirmationSchema,
  BookingReadingSchema,
  PriceQuoteSchema,
  QuoteReadingSchema,
  type BookingConfirmation,
  type PriceQuote,
  type ProviderId,
  type RidePreferences,
} from "@shared/schema";
import type { AutomationPhase, AutomationRunResult, ResultShape } from "../automation";
import { describeError, scopedLogger, type Logger } from "../logging";
import {
  BOOKING_RESULT_SHAPE,
  QUOTE_RESULT_SHAPE,
  buildBookingGoal,
  buildOpenGoal,
  buildQuoteGoal,
} from "./goals";
import { parseFareRange } from "./format";
import { withDeadline } from "./timeout";
import type { ProviderAgent, ProviderAgentDeps, ProviderProfile, SessionState } from "./types";

/** Ranged fares compare on their lower bound. */
function readFare(value: number | string): number | null {
  if (typeof value === "number") return value;
  return parseFareRange(value)?.[0] ?? null;
}

export class AutomatedProviderAgent implements ProviderAgent {
  private _state: SessionState = "closed";
  private readonly logger: Logger;

  constructor(
    private readonly profile: ProviderProfile,
    private readonly deps: ProviderAgentDeps
  ) {
    this.logger = scopedLogger(deps.logger, profile.id);
  }

  get provider(): ProviderId {
    return this.profile.id;
  }

  get state(): SessionState {
    return this._state;
  }

  async open(): Promise<boolean> {
    const result = await this.run("open", buildOpenGoal(this.profile), this.deps.timeouts.openSeconds);
    if (!result.success) {
      return this.fail("open", result.failureReason, false);
    }

    this._state = "open";
    this.logger.info(`${this.profile.appName} ready`);
    return true;
  }

  async fetchQuote(
    pickup: string,
    destination: string,
    preferences: RidePreferences
  ): Promise<PriceQuote | null> {
    if (this._state === "closed") {
      this.logger.warn("fetchQuote called on a closed session");
      return null;
    }

    const goal = buildQuoteGoal(this.profile, { pickup, destination, preferences });
    const result = await this.run("quote", goal, this.deps.timeouts.quoteSeconds, QUOTE_RESULT_SHAPE);
    if (!result.success) {
      return this.fail("quote", result.failureReason, null);
    }
    if (result.structuredResult === undefined) {
      return this.fail("quote", "No structured result", null);
    }

    const reading = QuoteReadingSchema.safeParse(result.structuredResult);
    if (!reading.success) {
      return this.fail("quote", `Unusable quote reading: ${reading.error.message}`, null);
    }

    const price = readFare(reading.data.estimated_price);
    if (price === null) {
      return this.fail("quote", `Unreadable fare "${reading.data.estimated_price}"`, null);
    }

    const parsed = PriceQuoteSchema.safeParse({
      provider: this.profile.id,
      rideType: reading.data.ride_type,
      price,
      eta: reading.data.estimated_time,
      distance: reading.data.distance ?? undefined,
      currency: reading.data.currency ?? undefined,
      extraCharges: reading.data.extra_charges ?? undefined,
      available: reading.data.available ?? undefined,
    });
    if (!parsed.success) {
      return this.fail("quote", parsed.error.message, null);
    }

    const quote = Object.freeze(parsed.data);
    this._state = "quote_fetched";
    this.logger.info(`Quote: ${quote.rideType} at ${quote.price}`, { eta: quote.eta });
    return quote;
  }

  async book(
    pickup: string,
    destination: string,
    preferences: RidePreferences,
    quote: PriceQuote
  ): Promise<BookingConfirmation | null> {
    if (this._state === "closed") {
      this.logger.warn("book called on a closed session");
      return null;
    }

    const goal = buildBookingGoal(this.profile, { pickup, destination, preferences }, quote);
    const result = await this.run("book", goal, this.deps.timeouts.bookSeconds, BOOKING_RESULT_SHAPE);
    if (!result.success) {
      return this.fail("book", result.failureReason, null);
    }
    if (result.structuredResult === undefined) {
      return this.fail("book", "No structured result", null);
    }

    const reading = BookingReadingSchema.safeParse(result.structuredResult);
    if (!reading.success) {
      return this.fail("book", `Unusable booking reading: ${reading.error.message}`, null);
    }

    const booking = BookingConfirmationSchema.safeParse({
      bookingId: reading.data.booking_id,
      provider: this.profile.id,
      rideType: reading.data.ride_type ?? quote.rideType,
      price: reading.data.estimated_price ?? quote.price,
      arrivalEstimate: reading.data.estimated_arrival ?? quote.eta,
      driverName: reading.data.driver_name ?? undefined,
      driverRating: reading.data.driver_rating ?? undefined,
      vehicleDetails: reading.data.vehicle_details ?? undefined,
      status: reading.data.status ?? undefined,
      pickup: reading.data.pickup_location ?? pickup,
      destination: reading.data.destination ?? destination,
    });
    if (!booking.success) {
      return this.fail("book", booking.error.message, null);
    }

    this._state = "booking_confirmed";
    this.logger.info(`Booked ${booking.data.bookingId}`);
    return Object.freeze(booking.data);
  }

  async close(): Promise<boolean> {
    this._state = "closed";
    this.logger.debug("Session closed");
    return true;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async run(
    phase: AutomationPhase,
    goal: string,
    timeoutSeconds: number,
    resultShape?: ResultShape
  ): Promise<AutomationRunResult> {
    try {
      return await withDeadline(
        (signal) =>
          this.deps.automation.execute({
            goal,
            phase,
            target: { appName: this.profile.appName, packageName: this.profile.packageName },
            resultShape,
            timeoutSeconds,
            signal,
          }),
        timeoutSeconds * 1000,
        this.deps.signal
      );
    } catch (error) {
      return { success: false, failureReason: describeError(error) };
    }
  }

  private fail<T>(phase: AutomationPhase, reason: string | undefined, value: T): T {
    this._state = "closed";
    this.logger.warn(`${phase} failed: ${reason ?? "unknown reason"}`);
    return value;
  }
}

export function createProviderAgent(profile: ProviderProfile, deps: ProviderAgentDeps): ProviderAgent {
  return new AutomatedProviderAgent(profile, deps);
}
