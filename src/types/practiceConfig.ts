/**
 * Practice configuration consumed by the engine.
 *
 * Untrusted input (CLI flags, JSON files) goes through parsePracticeConfig()
 * in utils/configValidation before it reaches the engine.
 */

import type { ModeName, TimePressure } from '../engine/models';
import type { PitchClass, PracticeType } from './practice';

/**
 * Whether Scale-Degree mode may pick the same root twice in a row.
 */
export type RootRepeatPolicy = 'avoid-repeat' | 'allow-repeat';

export interface PromptsPerRoot {
  /** Minimum interval prompts per root (>= 1) */
  min: number;
  /** Maximum interval prompts per root (>= min) */
  max: number;
}

export interface PracticeConfig {
  practiceType: PracticeType;
  /** Modes drawn in Mode practice. Must not be empty. */
  enabledModes: ModeName[];
  timePressure: TimePressure;
  /** Roots drawn from. Defaults to all 12 pitch classes. */
  rootPool: PitchClass[];
  promptsPerRoot: PromptsPerRoot;
  rootRepeatPolicy: RootRepeatPolicy;
  /** Whether interval label "1" can be prompted in Scale-Degree mode */
  includeUnison: boolean;
  /** Two note-ons closer than this (ms) count as one gesture for the escape chord */
  coincidenceWindowMs: number;
  /** Pause between a completed Round and the next prompt (ms). Notes in the gap are ignored. */
  roundGapMs: number;
  /** Seed for the deterministic RNG. Omit for Math.random. */
  seed?: number;
  /** Enables debug logging */
  verbose: boolean;
}

export const ALL_PITCH_CLASSES: readonly PitchClass[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

export const DEFAULT_PRACTICE_CONFIG: PracticeConfig = {
  practiceType: 'scale-degree',
  enabledModes: ['Ionian', 'Aeolian'],
  timePressure: 'medium',
  rootPool: [...ALL_PITCH_CLASSES],
  promptsPerRoot: { min: 5, max: 7 },
  rootRepeatPolicy: 'avoid-repeat',
  includeUnison: false,
  coincidenceWindowMs: 60,
  roundGapMs: 750,
  verbose: false,
};

/**
 * Creates a config from the defaults plus overrides.
 * Arrays are copied so callers cannot mutate the defaults.
 */
export function createPracticeConfig(overrides: Partial<PracticeConfig> = {}): PracticeConfig {
  return {
    ...DEFAULT_PRACTICE_CONFIG,
    ...overrides,
    enabledModes: [...(overrides.enabledModes ?? DEFAULT_PRACTICE_CONFIG.enabledModes)],
    rootPool: [...(overrides.rootPool ?? DEFAULT_PRACTICE_CONFIG.rootPool)],
    promptsPerRoot: { ...(overrides.promptsPerRoot ?? DEFAULT_PRACTICE_CONFIG.promptsPerRoot) },
  };
}
