/**
 * In-process automation stand-in for rides tests.
 */

import { vi } from "vitest";
import type { ProviderId } from "@shared/schema";
import type { AutomationClient, AutomationPhase, AutomationTask } from "../../automation";
import type { Logger } from "../../logging";
import { BUILT_IN_PROFILES } from "../profiles";

export interface FakeProviderScript {
  /** Defaults to true */
  open?: boolean;
  /** Structured result for the quote phase; null/undefined = automation failure */
  quote?: unknown;
  book?: unknown;
  delayMs?: number;
  /** Delay only this phase (every phase when unset) */
  delayOn?: AutomationPhase;
  throwOn?: AutomationPhase;
}

export interface FakeAutomation extends AutomationClient {
  calls: AutomationTask[];
  callsFor(phase: AutomationPhase): AutomationTask[];
}

export function quoteReading(price: number, rideType = "Auto", eta = "5 mins") {
  return { ride_type: rideType, estimated_price: price, estimated_time: eta };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true }
    );
  });
}

function providerFor(task: AutomationTask): ProviderId | undefined {
  return BUILT_IN_PROFILES.find((p) => p.packageName === task.target.packageName)?.id;
}

export function createFakeAutomation(
  scripts: Partial<Record<ProviderId, FakeProviderScript>>
): FakeAutomation {
  const calls: AutomationTask[] = [];

  return {
    calls,
    callsFor: (phase) => calls.filter((task) => task.phase === phase),
    isAvailable: () => true,

    async execute(task) {
      calls.push(task);
      const provider = providerFor(task);
      const script = provider ? scripts[provider] : undefined;
      if (!script) {
        return { success: false, failureReason: "not scripted" };
      }

      if (script.delayMs && (!script.delayOn || script.delayOn === task.phase)) {
        await sleep(script.delayMs, task.signal);
      }
      if (script.throwOn === task.phase) throw new Error("device disconnected");

      switch (task.phase) {
        case "open":
          return script.open === false
            ? { success: false, failureReason: "app did not start" }
            : { success: true };
        case "quote":
          return script.quote === undefined || script.quote === null
            ? { success: false, failureReason: "quote not found" }
            : { success: true, structuredResult: script.quote };
        case "book":
          return script.book === undefined || script.book === null
            ? { success: false, failureReason: "booking not confirmed" }
            : { success: true, structuredResult: script.book };
      }
    },
  };
}

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}
