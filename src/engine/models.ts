/**
 * Music theory tables and engine constants for the practice engine.
 * These values define the supported interval labels, modes and time pressure levels.
 */

/**
 * Interval label enumeration.
 * Seven natural degrees plus five alterations, one label per semitone.
 */
export type IntervalLabel = '1' | 'b2' | '2' | 'b3' | '3' | '4' | '#4' | '5' | 'b6' | '6' | 'b7' | '7';

/**
 * Mode enumeration.
 * The seven diatonic rotations of the major scale.
 */
export type ModeName = 'Ionian' | 'Dorian' | 'Phrygian' | 'Lydian' | 'Mixolydian' | 'Aeolian' | 'Locrian';

/**
 * Time pressure level for the per-position response deadline.
 */
export type TimePressure = 'none' | 'low' | 'medium' | 'hard';

/**
 * Semitone offset from the root for each interval label.
 */
export const INTERVAL_SEMITONES: Readonly<Record<IntervalLabel, number>> = {
  '1': 0,
  'b2': 1,
  '2': 2,
  'b3': 3,
  '3': 4,
  '4': 5,
  '#4': 6,
  '5': 7,
  'b6': 8,
  '6': 9,
  'b7': 10,
  '7': 11,
};

/** Interval labels in ascending semitone order */
export const INTERVAL_LABELS: readonly IntervalLabel[] = [
  '1', 'b2', '2', 'b3', '3', '4', '#4', '5', 'b6', '6', 'b7', '7',
];

/**
 * Whole/half step pattern for each mode (W = 2, H = 1). Each pattern sums to 12.
 */
export const MODE_STEPS: Readonly<Record<ModeName, readonly number[]>> = {
  Ionian: [2, 2, 1, 2, 2, 2, 1],     // W-W-H-W-W-W-H (major)
  Dorian: [2, 1, 2, 2, 2, 1, 2],     // W-H-W-W-W-H-W
  Phrygian: [1, 2, 2, 2, 1, 2, 2],   // H-W-W-W-H-W-W
  Lydian: [2, 2, 2, 1, 2, 2, 1],     // W-W-W-H-W-W-H
  Mixolydian: [2, 2, 1, 2, 2, 1, 2], // W-W-H-W-W-H-W
  Aeolian: [2, 1, 2, 2, 1, 2, 2],    // W-H-W-W-H-W-W (natural minor)
  Locrian: [1, 2, 2, 1, 2, 2, 2],    // H-W-W-H-W-W-W
};

/** Modes in rotation order (Ionian = degree 1 of the parent major scale) */
export const MODE_NAMES: readonly ModeName[] = [
  'Ionian', 'Dorian', 'Phrygian', 'Lydian', 'Mixolydian', 'Aeolian', 'Locrian',
];

/**
 * Response deadline per position in seconds. null = no deadline.
 */
export const TIME_PRESSURE_SECONDS: Readonly<Record<TimePressure, number | null>> = {
  none: null,
  low: 15,
  medium: 10,
  hard: 5,
};

export const TIME_PRESSURE_LEVELS: readonly TimePressure[] = ['none', 'low', 'medium', 'hard'];

/**
 * Engine constants for timing and bookkeeping.
 */
export interface EngineConstants {
  /** How often the session loop polls deadlines (ms) */
  tickIntervalMs: number;
  /** Mistakes kept for the exit summary */
  maxRecentMistakes: number;
}

export const DEFAULT_ENGINE_CONSTANTS: EngineConstants = {
  tickIntervalMs: 100,
  maxRecentMistakes: 20,
};
