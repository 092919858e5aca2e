/**
 * Unified data models for the scale trainer.
 * This is the single source of truth for note events, rounds, results and session statistics.
 *
 * TERMINOLOGY:
 * - Pitch class: a note identity modulo octave (0 = C ... 11 = B)
 * - Raw pitch: the MIDI note number as played (0-127)
 * - Round: one prompt-and-response unit (a single interval, or a full ascending + descending scale)
 * - Position: one expected note within a Round
 * - Leg: a run of positions inside a Round (the ascending or descending half of a scale)
 */

import type { IntervalLabel, ModeName } from '../engine/models';

// ============================================================================
// Note Events (input boundary)
// ============================================================================

/**
 * PitchClass: integer in [0, 11]. Octave is discarded.
 */
export type PitchClass = number;

/**
 * Whether a key went down or came up.
 */
export type NoteEventKind = 'on' | 'off';

/**
 * NoteEvent: a normalized, timestamped key event delivered by a note event source.
 *
 * Sources MUST deliver events in timestamp order.
 */
export interface NoteEvent {
  /** Pitch class of the key (0-11). Malformed input is normalized to -1 and never matches. */
  pitchClass: PitchClass;
  /** MIDI note number as played */
  rawPitch: number;
  /** MIDI velocity (0-127). A note-on with velocity 0 is normalized to 'off'. */
  velocity: number;
  kind: NoteEventKind;
  /** Milliseconds on the session clock */
  timestamp: number;
}

/**
 * A key event as a source reads it, before normalization.
 * Payload fields are not trusted; createNoteEvent() turns them into a NoteEvent.
 */
export interface RawNoteEvent {
  rawPitch: number;
  velocity: number;
  kind: NoteEventKind;
  timestamp: number;
}

/**
 * A live supply of raw note events (MIDI file replay, typed notes, a device bridge).
 */
export interface NoteEventSource extends AsyncIterable<RawNoteEvent> {
  /** Human-readable name for logging */
  readonly name: string;
  /** Stops the stream; a pending iteration finishes without error. */
  close(): void;
}

/**
 * Millisecond clock. Injected so tests can drive time explicitly.
 */
export type Clock = () => number;

// ============================================================================
// Rounds
// ============================================================================

export type PracticeType = 'scale-degree' | 'mode';

/**
 * Which accidental a note name is spelled with.
 */
export type Spelling = 'sharp' | 'flat';

/**
 * Role of a position within a Round.
 * - root: the root-confirmation note that opens a new root in Scale-Degree mode (not scored)
 * - target: the interval prompt of Scale-Degree mode
 * - scale: one note of a Mode scale
 */
export type PositionRole = 'root' | 'target' | 'scale';

export type LegName = 'root' | 'target' | 'ascending' | 'descending';

/**
 * When per-position verdicts are revealed to the player.
 * - immediate: as soon as each position is played (Scale-Degree mode)
 * - deferred: all at once when the Round completes (Mode mode); progress is echoed live
 */
export type FeedbackPolicy = 'immediate' | 'deferred';

/**
 * One expected note of a Round.
 */
export interface PositionSpec {
  /** 0-based index in the Round's expected sequence */
  index: number;
  expected: PitchClass;
  /** Display spelling of the expected note (e.g. "Bb") */
  expectedName: string;
  role: PositionRole;
  leg: LegName;
  /** 1-based number within the leg (1..8 for scale legs) */
  noteNumber: number;
  /** Whether the verdict counts toward accuracy */
  scored: boolean;
}

/**
 * A run of positions shown to the player as one phrase.
 */
export interface LegSpec {
  name: LegName;
  /** Index of the leg's first position */
  start: number;
  length: number;
}

/**
 * What a prompt strategy produces for the next Round.
 */
export interface RoundPlan {
  kind: PracticeType;
  /** Prompt line, e.g. "Play the b7 (from D)" or "Dorian in F#" */
  prompt: string;
  root: PitchClass;
  rootName: string;
  spelling: Spelling;
  positions: PositionSpec[];
  legs: LegSpec[];
  feedback: FeedbackPolicy;
  /** Scale-Degree mode: the interval being prompted */
  intervalLabel?: IntervalLabel;
  /** Mode mode: the mode being prompted */
  mode?: ModeName;
  /** Scale-Degree mode: true when this Round opens a new root with the root gate */
  newRoot?: boolean;
}

/**
 * Round: one unit of practice with an immutable expected sequence.
 */
export interface Round extends RoundPlan {
  id: string;
  /** 1-based counter within the session */
  number: number;
  /** Expected pitch classes in position order (frozen) */
  expected: readonly PitchClass[];
}

// ============================================================================
// Results
// ============================================================================

/**
 * Verdict for one position.
 * - excluded: never played because the Round was escaped
 */
export type PositionOutcome = 'correct' | 'incorrect' | 'excluded';

export interface PositionResult extends PositionSpec {
  outcome: PositionOutcome;
  /** Pitch class that was played; null when excluded or when the event payload was malformed */
  observed: PitchClass | null;
  /** Display spelling of the played note ("?" for malformed input, null when excluded) */
  observedName: string | null;
  /** Raw pitch that was played, when known */
  observedRawPitch: number | null;
  /** Whether a timeout hint was shown for this position */
  hinted: boolean;
  /** Session-clock time the position was resolved */
  playedAt: number | null;
}

/**
 * RoundResult: outcome of a terminal Round.
 */
export interface RoundResult {
  roundId: string;
  roundNumber: number;
  kind: PracticeType;
  prompt: string;
  positions: PositionResult[];
  /** True when every scored, non-excluded position was correct (and at least one was played) */
  passed: boolean;
  /** True when the Round ended through the escape chord */
  escaped: boolean;
  startedAt: number;
  completedAt: number;
  elapsedMs: number;
  hintCount: number;
}

/**
 * Timeout hint for an open position.
 */
export interface TimeoutHint {
  roundId: string;
  position: number;
  noteNumber: number;
  leg: LegName;
  expected: PitchClass;
  expectedName: string;
  /** Time the deadline expired */
  deadline: number;
}

// ============================================================================
// Session Statistics
// ============================================================================

/**
 * A missed position kept for the exit summary.
 */
export interface MistakeRecord {
  roundNumber: number;
  prompt: string;
  leg: LegName;
  noteNumber: number;
  expectedName: string;
  /** "?" when the event was malformed */
  playedName: string;
}

/**
 * SessionStats: cumulative counters for the process lifetime.
 * Written only by the StatisticsAggregator.
 */
export interface SessionStats {
  roundsAttempted: number;
  roundsCorrect: number;
  roundsEscaped: number;
  positionsCorrect: number;
  positionsIncorrect: number;
  positionsExcluded: number;
  hintsShown: number;
  /** Error count keyed by note number within the leg */
  errorsByPosition: Record<number, number>;
  /** Most recent mistakes, oldest first */
  recentMistakes: MistakeRecord[];
}

// ============================================================================
// Display Events (output boundary)
// ============================================================================

export type DisplayEvent =
  | { type: 'round-start'; round: Round }
  | { type: 'echo'; roundId: string; position: number; leg: LegName; noteNumber: number; observedName: string }
  | { type: 'verdict'; roundId: string; result: PositionResult }
  | { type: 'verdicts'; roundId: string; results: PositionResult[] }
  | { type: 'hint'; hint: TimeoutHint }
  | { type: 'escape'; roundId: string; excludedCount: number }
  | { type: 'round-complete'; result: RoundResult }
  | { type: 'round-abandoned'; roundId: string }
  | { type: 'session-summary'; stats: SessionStats };

export type DisplayListener = (event: DisplayEvent) => void;
