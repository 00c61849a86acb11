/**
 * SKILL SYSTEM — TYPE DEFINITIONS
 *
 * A skill is a small, testable, deterministic module with:
 * - Clear input/output contract (Zod validated)
 * - Fallback behavior when it fails
 * - Instrumentation for debugging
 */

import { z } from "zod";
import type { Logger } from "../logging";

// ============================================
// SKILL CONTEXT — shared dependencies
// ============================================

export type SkillLogger = Logger;

export interface SkillContext {
  logger: SkillLogger;

  flags: {
    debugMode: boolean;
  };
}

export function createSkillContext(logger: SkillLogger, debugMode = false): SkillContext {
  return {
    logger,
    flags: { debugMode },
  };
}

// ============================================
// SKILL RESULT METADATA — instrumentation
// ============================================

export interface SkillResultMeta {
  skillName: string;
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
  ok: boolean;
  usedFallback: boolean;
  error?: string;
  notes?: string[];
}

// ============================================
// SKILL INTERFACE
// ============================================

export interface Skill<TInput, TOutput> {
  name: string;

  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  outputSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;

  /**
   * Execute the skill
   * @param ctx Shared context (logger, flags)
   * @param input Validated input
   */
  run(ctx: SkillContext, input: TInput): Promise<{
    output: TOutput;
    meta: Omit<SkillResultMeta, "skillName" | "startedAt" | "endedAt" | "durationMs">;
  }>;

  /**
   * Output used when the skill fails. With a fallback, runSkill never throws.
   */
  fallback?: (input: unknown) => TOutput;
}

// ============================================
// SKILL RUNNER — validates, executes, logs
// ============================================

export interface SkillRunResult<TOutput> {
  output: TOutput;
  meta: SkillResultMeta;
}

/**
 * Run a skill with validation, error handling, and instrumentation
 */
export async function runSkill<TInput, TOutput>(
  skill: Skill<TInput, TOutput>,
  ctx: SkillContext,
  rawInput: unknown
): Promise<SkillRunResult<TOutput>> {
  const startedAt = new Date();
  const notes: string[] = [];

  try {
    // 1. Validate input
    const inputResult = skill.inputSchema.safeParse(rawInput);
    if (!inputResult.success) {
      const errorMsg = `Input validation failed: ${inputResult.error.message}`;
      ctx.logger.error(`[${skill.name}] ${errorMsg}`);

      if (skill.fallback) {
        notes.push("Input validation failed, using fallback");
        return {
          output: skill.fallback(rawInput),
          meta: buildMeta(skill.name, startedAt, false, true, notes, errorMsg),
        };
      }
      throw new Error(errorMsg);
    }

    const input = inputResult.data;

    // 2. Execute skill
    if (ctx.flags.debugMode) {
      ctx.logger.debug(`[${skill.name}] Starting execution`, { input });
    }
    const result = await skill.run(ctx, input);

    // 3. Validate output
    const outputResult = skill.outputSchema.safeParse(result.output);
    if (!outputResult.success) {
      const errorMsg = `Output validation failed: ${outputResult.error.message}`;
      ctx.logger.error(`[${skill.name}] ${errorMsg}`);

      if (skill.fallback) {
        notes.push("Output validation failed, using fallback");
        return {
          output: skill.fallback(input),
          meta: buildMeta(skill.name, startedAt, false, true, notes, errorMsg),
        };
      }
      throw new Error(errorMsg);
    }

    // 4. Success
    const allNotes = [...notes, ...(result.meta.notes || [])];
    if (ctx.flags.debugMode) {
      ctx.logger.debug(`[${skill.name}] Completed`, {
        usedFallback: result.meta.usedFallback,
      });
    }

    return {
      output: outputResult.data,
      meta: buildMeta(
        skill.name,
        startedAt,
        result.meta.ok,
        result.meta.usedFallback,
        allNotes.length > 0 ? allNotes : undefined,
        result.meta.error
      ),
    };
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : "Unknown error";
    ctx.logger.error(`[${skill.name}] Execution failed: ${errorMsg}`);

    if (skill.fallback) {
      notes.push(`Execution failed (${errorMsg}), using fallback`);
      return {
        output: skill.fallback(rawInput),
        meta: buildMeta(skill.name, startedAt, false, true, notes, errorMsg),
      };
    }

    throw error;
  }
}

function buildMeta(
  skillName: string,
  startedAt: Date,
  ok: boolean,
  usedFallback: boolean,
  notes?: string[],
  error?: string
): SkillResultMeta {
  const endedAt = new Date();
  return {
    skillName,
    startedAt,
    endedAt,
    durationMs: endedAt.getTime() - startedAt.getTime(),
    ok,
    usedFallback,
    notes,
    error,
  };
}
