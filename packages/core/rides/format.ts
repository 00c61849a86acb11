/**
 * Fare and ETA formatting helpers.
 */

import { DEFAULT_CURRENCY } from "@shared/schema";

const CURRENCY_SYMBOLS: Record<string, string> = {
  INR: "₹",
  USD: "$",
  EUR: "€",
};

export function formatCurrency(amount: number, currency: string = DEFAULT_CURRENCY): string {
  const formatted = amount.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  const symbol = CURRENCY_SYMBOLS[currency.toUpperCase()];
  return symbol ? `${symbol}${formatted}` : `${currency} ${formatted}`;
}

/**
 * "5 mins" => "~5 min", "7-10 mins" => "7-10 min". Unparseable text is returned as is.
 */
export function formatEtaEstimate(eta: string): string {
  const match = /(\d+)(?:\s*-\s*(\d+))?/.exec(eta);
  if (!match) return eta;

  const start = Number.parseInt(match[1], 10);
  const end = match[2] ? Number.parseInt(match[2], 10) : start;
  return start === end ? `~${start} min` : `${start}-${end} min`;
}

export function etaToMinutes(eta: string): number | null {
  const match = /(\d+)/.exec(eta);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * "₹100-150" => [100, 150], "₹1,200" => [1200, 1200]
 */
export function parseFareRange(text: string): [number, number] | null {
  const numbers = text.replace(/,/g, "").match(/\d+(?:\.\d+)?/g);
  if (!numbers || numbers.length === 0) return null;

  const low = Number(numbers[0]);
  const high = numbers.length >= 2 ? Number(numbers[1]) : low;
  return [low, high];
}
