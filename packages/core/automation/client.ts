/**
 * AUTOMATION CLIENTS
 *
 * - HTTP client: forwards tasks to an automation service over fetch
 * - Null client: for when no service is configured
 */

import { z } from "zod";
import type { Logger } from "../logging";
import { describeError } from "../logging";
import type { AutomationClient, AutomationRunResult, AutomationTask } from "./types";

export type { AutomationClient, AutomationRunResult, AutomationTask };

// ============================================
// HTTP CLIENT
// ============================================

export interface HttpAutomationConfig {
  baseUrl: string;
  apiKey?: string;
  deviceSerial?: string;
  platform: "android" | "ios";
  logger: Logger;
}

const ExecuteResponseSchema = z.object({
  success: z.boolean(),
  structured_result: z.unknown().optional(),
  failure_reason: z.string().nullish(),
});

export function createHttpAutomationClient(config: HttpAutomationConfig): AutomationClient {
  const endpoint = `${config.baseUrl.replace(/\/+$/, "")}/execute`;

  const execute = async (task: AutomationTask): Promise<AutomationRunResult> => {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (config.apiKey) {
      headers["X-API-Key"] = config.apiKey;
    }

    try {
      const response = await fetch(endpoint, {
        method: "POST",
        headers,
        signal: task.signal,
        body: JSON.stringify({
          goal: task.goal,
          phase: task.phase,
          app: task.target.appName,
          package_name: task.target.packageName,
          result_shape: task.resultShape ?? null,
          timeout_seconds: task.timeoutSeconds,
          device_serial: config.deviceSerial ?? null,
          platform: config.platform,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        config.logger.error(`[automation] API error ${response.status}`, { body: errorText.slice(0, 200) });
        return { success: false, failureReason: `Automation service returned ${response.status}` };
      }

      const parsed = ExecuteResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { success: false, failureReason: `Malformed automation response: ${parsed.error.message}` };
      }

      return {
        success: parsed.data.success,
        structuredResult: parsed.data.structured_result,
        failureReason: parsed.data.failure_reason ?? undefined,
      };
    } catch (error) {
      if (task.signal?.aborted) {
        return { success: false, failureReason: "Aborted" };
      }
      config.logger.error(`[automation] Request failed: ${describeError(error)}`);
      return { success: false, failureReason: describeError(error) };
    }
  };

  return {
    execute,
    isAvailable: () => true,
  };
}

// ============================================
// NULL CLIENT
// ============================================

export function createNullAutomationClient(reason: string = "Automation disabled"): AutomationClient {
  return {
    execute: async () => ({ success: false, failureReason: reason }),
    isAvailable: () => false,
  };
}
