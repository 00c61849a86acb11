/**
 * AUTOMATION CAPABILITY — CONTRACT
 *
 * The device automation agent takes a natural-language goal, drives the
 * provider app on the phone, and reports back a structured reading.
 * This package only consumes it.
 */

export type AutomationPhase = "open" | "quote" | "book";

export interface AutomationTarget {
  appName: string;
  /** Android package / iOS bundle id */
  packageName: string;
}

/**
 * Description of the record the agent should fill in: field name -> hint.
 */
export interface ResultShape {
  name: string;
  fields: Record<string, string>;
}

export interface AutomationTask {
  goal: string;
  phase: AutomationPhase;
  target: AutomationTarget;
  resultShape?: ResultShape;
  timeoutSeconds: number;
  /** Aborted when the caller gives up (phase timeout or comparison deadline) */
  signal?: AbortSignal;
}

export interface AutomationRunResult {
  success: boolean;
  /** Unvalidated; callers check it against their own schema */
  structuredResult?: unknown;
  failureReason?: string;
}

export interface AutomationClient {
  execute(task: AutomationTask): Promise<AutomationRunResult>;

  isAvailable(): boolean;
}
