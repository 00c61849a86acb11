/**
 * SUMMARY, FORMAT & HISTORY TESTS
 */

import { describe, it, expect } from "vitest";
import type { PriceQuote, ProviderId } from "@shared/schema";
import { etaToMinutes, formatCurrency, formatEtaEstimate, parseFareRange } from "../format";
import { FareHistory } from "../history";
import {
  applyBudgetFilter,
  buildComparisonSummary,
  computeSavings,
  formatBookingSummary,
  rankQuotes,
  selectCheapest,
  selectFastest,
} from "../summary";

const ORDER: ProviderId[] = ["uber", "ola", "rapido"];

function quote(provider: ProviderId, price: number, extra: Partial<PriceQuote> = {}): PriceQuote {
  return { provider, rideType: "Auto", price, eta: "5 mins", currency: "INR", available: true, ...extra };
}

function pricesOf(...quotes: PriceQuote[]): Map<ProviderId, PriceQuote> {
  return new Map(quotes.map((q) => [q.provider, q]));
}

describe("format", () => {
  it("formats currency", () => {
    expect(formatCurrency(99)).toBe("₹99.00");
    expect(formatCurrency(1234.5, "USD")).toBe("$1,234.50");
    expect(formatCurrency(10, "GBP")).toBe("GBP 10.00");
  });

  it("formats ETA estimates", () => {
    expect(formatEtaEstimate("5 mins")).toBe("~5 min");
    expect(formatEtaEstimate("7-10 mins")).toBe("7-10 min");
    expect(formatEtaEstimate("soon")).toBe("soon");
  });

  it("reads minutes from an ETA", () => {
    expect(etaToMinutes("12 min")).toBe(12);
    expect(etaToMinutes("n/a")).toBeNull();
  });

  it("parses fare ranges", () => {
    expect(parseFareRange("₹100-150")).toEqual([100, 150]);
    expect(parseFareRange("₹1,200")).toEqual([1200, 1200]);
    expect(parseFareRange("free")).toBeNull();
  });
});

describe("selection", () => {
  it("picks the lowest price", () => {
    const prices = pricesOf(quote("uber", 120), quote("ola", 150), quote("rapido", 99));
    expect(selectCheapest(prices, ORDER)).toBe("rapido");
  });

  it("breaks ties by the given order, not by map order", () => {
    const prices = pricesOf(quote("rapido", 80), quote("uber", 80));

    expect(selectCheapest(prices, ORDER)).toBe("uber");
    expect(selectCheapest(prices, ["rapido", "uber"])).toBe("rapido");
  });

  it("returns null for no quotes", () => {
    expect(selectCheapest(new Map(), ORDER)).toBeNull();
  });

  it("picks the shortest ETA and skips ETAs without a number", () => {
    const prices = pricesOf(
      quote("uber", 120, { eta: "7-10 mins" }),
      quote("ola", 150, { eta: "4 mins" }),
      quote("rapido", 99, { eta: "soon" })
    );

    expect(selectFastest(prices, ORDER)).toBe("ola");
    expect(selectFastest(pricesOf(quote("rapido", 99, { eta: "soon" })), ORDER)).toBeNull();
  });

  it("ranks by price with ties in provider order", () => {
    const prices = pricesOf(quote("rapido", 100), quote("ola", 90), quote("uber", 100));
    expect(rankQuotes(prices, ORDER).map((q) => q.provider)).toEqual(["ola", "uber", "rapido"]);
  });

  it("computes savings against each dearer provider", () => {
    const savings = computeSavings(pricesOf(quote("uber", 120), quote("ola", 150), quote("rapido", 99)), ORDER);

    expect(savings.map((s) => [s.provider, s.amount])).toEqual([
      ["uber", 21],
      ["ola", 51],
    ]);
    expect(savings[0].percent).toBeCloseTo(17.5);
    expect(savings[1].percent).toBeCloseTo(34);
  });

  it("filters quotes by budget", () => {
    const prices = pricesOf(quote("uber", 120), quote("ola", 150), quote("rapido", 99));

    expect(applyBudgetFilter(prices, ORDER, 120).map((q) => q.provider)).toEqual(["uber", "rapido"]);
    expect(applyBudgetFilter(prices, ORDER, 50)).toEqual([]);
    expect(applyBudgetFilter(prices, ORDER, undefined)).toHaveLength(3);
  });
});

describe("summaries", () => {
  it("renders the ranked comparison", () => {
    const prices = pricesOf(
      quote("uber", 120, { rideType: "UberGo", distance: "8 km" }),
      quote("rapido", 99, { eta: "3 mins" })
    );

    expect(buildComparisonSummary(prices, ORDER)).toBe(
      [
        "Price Comparison Results",
        "=".repeat(50),
        "",
        "#1 RAPIDO",
        "   Ride Type: Auto",
        "   Fare: ₹99.00",
        "   ETA: 3 mins",
        "",
        "#2 UBER",
        "   Ride Type: UberGo",
        "   Fare: ₹120.00",
        "   ETA: 5 mins",
        "   Distance: 8 km",
        "",
        "=".repeat(50),
        "Cheapest Option: RAPIDO (₹99.00)",
        "Savings: ₹21.00 (17.5%) vs UBER",
      ].join("\n")
    );
  });

  it("omits the savings line for a single quote", () => {
    const summary = buildComparisonSummary(pricesOf(quote("ola", 75)), ORDER);
    expect(summary.split("\n").at(-1)).toBe("Cheapest Option: OLA (₹75.00)");
  });

  it("handles an empty comparison", () => {
    expect(buildComparisonSummary(new Map(), ORDER)).toBe("No quotes available");
  });

  it("renders a booking", () => {
    expect(
      formatBookingSummary({
        bookingId: "UB-7",
        provider: "uber",
        rideType: "UberGo",
        price: 240,
        arrivalEstimate: "6 mins",
        driverName: "Test Driver",
        driverRating: 4.9,
        status: "confirmed",
        pickup: "Home",
        destination: "Office",
      })
    ).toBe(
      [
        "Ride Booked Successfully!",
        "   App: UBER",
        "   Booking ID: UB-7",
        "   Ride Type: UberGo",
        "   Fare: ₹240.00",
        "   Driver: Test Driver (4.9★)",
        "   Arrival: 6 mins",
        "   Status: confirmed",
      ].join("\n")
    );
  });
});

describe("FareHistory", () => {
  it("averages prices per provider and ride type", () => {
    const history = new FareHistory();
    history.record(quote("uber", 100, { rideType: "UberGo" }));
    history.record(quote("uber", 140, { rideType: "UberGo" }));
    history.record(quote("uber", 60, { rideType: "Uber Moto" }));

    expect(history.averagePrice("uber", "UberGo")).toBe(120);
    expect(history.averagePrice("uber")).toBeCloseTo(100);
    expect(history.averagePrice("ola")).toBeNull();
  });

  it("drops the oldest entries past capacity", () => {
    const history = new FareHistory(2, () => new Date("2026-01-01T00:00:00.000Z"));
    history.record(quote("uber", 100));
    history.record(quote("ola", 110));
    history.record(quote("rapido", 90));

    expect(history.size).toBe(2);
    expect(history.list().map((e) => e.provider)).toEqual(["ola", "rapido"]);
    expect(history.list()[0].recordedAt).toBe("2026-01-01T00:00:00.000Z");
  });
});
