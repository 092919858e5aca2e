/**
 * Practice configuration validation.
 *
 * CLI flags and JSON config files are untrusted; they pass through the zod
 * schema below before the engine sees them. Every problem is collected into
 * a single PracticeConfigError so the user can fix them in one go.
 */

import { z } from 'zod';
import { PracticeConfigError } from '../engine/errors';
import { noteNameToPitchClass, resolveModeName } from '../engine/pitchClass';
import { DEFAULT_PRACTICE_CONFIG, type PracticeConfig } from '../types/practiceConfig';

// ============================================================================
// Field Schemas
// ============================================================================

const modeNameSchema = z.string().transform((value, ctx) => {
  const mode = resolveModeName(value);
  if (mode === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown mode '${value}'` });
    return z.NEVER;
  }
  return mode;
});

/** A root is a pitch class number (0-11) or a note name ("Bb", "F#") */
const rootSchema = z.union([z.number().int().min(0).max(11), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  const pc = noteNameToPitchClass(value);
  if (pc === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown note name '${value}'` });
    return z.NEVER;
  }
  return pc;
});

const promptsPerRootSchema = z
  .object({
    min: z.number().int().min(1),
    max: z.number().int().min(1),
  })
  .strict()
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

function unique<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

export const practiceConfigSchema = z
  .object({
    practiceType: z.enum(['scale-degree', 'mode']).default(DEFAULT_PRACTICE_CONFIG.practiceType),
    enabledModes: z
      .array(modeNameSchema)
      .min(1, 'at least one mode must be enabled')
      .transform(unique)
      .default([...DEFAULT_PRACTICE_CONFIG.enabledModes]),
    timePressure: z.enum(['none', 'low', 'medium', 'hard']).default(DEFAULT_PRACTICE_CONFIG.timePressure),
    rootPool: z
      .array(rootSchema)
      .min(1, 'at least one root is required')
      .transform(unique)
      .default([...DEFAULT_PRACTICE_CONFIG.rootPool]),
    promptsPerRoot: promptsPerRootSchema.default({ ...DEFAULT_PRACTICE_CONFIG.promptsPerRoot }),
    rootRepeatPolicy: z.enum(['avoid-repeat', 'allow-repeat']).default(DEFAULT_PRACTICE_CONFIG.rootRepeatPolicy),
    includeUnison: z.boolean().default(DEFAULT_PRACTICE_CONFIG.includeUnison),
    coincidenceWindowMs: z.number().min(0).max(1000).default(DEFAULT_PRACTICE_CONFIG.coincidenceWindowMs),
    roundGapMs: z.number().min(0).default(DEFAULT_PRACTICE_CONFIG.roundGapMs),
    seed: z.number().int().optional(),
    verbose: z.boolean().default(DEFAULT_PRACTICE_CONFIG.verbose),
  })
  .strict();

// ============================================================================
// Parsing
// ============================================================================

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
  return `${path}: ${issue.message}`;
}

/**
 * Validates untrusted input into a PracticeConfig, filling in defaults.
 *
 * @throws PracticeConfigError listing every problem found
 */
export function parsePracticeConfig(input: unknown): PracticeConfig {
  const result = practiceConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new PracticeConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
