/**
 * Engine module exports.
 * This is the main entry point for the practice session engine.
 */

// Engine facade and session loop
export { PracticeEngine, createPracticeEngine } from './core';
export type { EngineState, PracticeEngineOptions } from './core';
export { runPracticeSession } from './runSession';
export type { PracticeSessionOptions } from './runSession';

// Matching state machine
export { RoundMatcher } from './matcher';
export type { MatcherState, MatchOutcome, RoundMatcherOptions } from './matcher';
export { EscapeDetector } from './escapeDetector';

// Prompt generation
export { PromptGenerator } from './promptGenerator';
export {
  resolvePromptStrategy,
  getAvailablePracticeTypes,
  ScaleDegreeStrategy,
  createScaleDegreeStrategy,
  ModeStrategy,
  createModeStrategy,
} from './strategies';
export type { PromptStrategy, StrategyConfig, StrategyFactory } from './strategies';

// Statistics
export { StatisticsAggregator, createSessionStats, computeAccuracy } from './statistics';

// Pitch class model
export {
  mod12,
  isPitchClass,
  pitchClassOf,
  noteName,
  noteNameToPitchClass,
  isIntervalLabel,
  isModeName,
  resolveModeName,
  semitoneOffset,
  intervalToPitchClass,
  modeSteps,
  buildScale,
  spellingForKey,
  spellingForInterval,
  spellAbove,
  spellScale,
  spellingOf,
  intervalName,
} from './pitchClass';

// Engine models and constants
export type { IntervalLabel, ModeName, TimePressure, EngineConstants } from './models';
export {
  INTERVAL_SEMITONES,
  INTERVAL_LABELS,
  MODE_STEPS,
  MODE_NAMES,
  TIME_PRESSURE_SECONDS,
  TIME_PRESSURE_LEVELS,
  DEFAULT_ENGINE_CONSTANTS,
} from './models';

// Errors
export { PracticeConfigError, NoteSourceError } from './errors';

// Data model
export type {
  PitchClass,
  NoteEventKind,
  NoteEvent,
  RawNoteEvent,
  NoteEventSource,
  Clock,
  PracticeType,
  Spelling,
  PositionRole,
  LegName,
  FeedbackPolicy,
  PositionSpec,
  LegSpec,
  RoundPlan,
  Round,
  PositionOutcome,
  PositionResult,
  RoundResult,
  TimeoutHint,
  MistakeRecord,
  SessionStats,
  DisplayEvent,
  DisplayListener,
} from '../types/practice';
export type { PracticeConfig, PromptsPerRoot, RootRepeatPolicy } from '../types/practiceConfig';
export { DEFAULT_PRACTICE_CONFIG, ALL_PITCH_CLASSES, createPracticeConfig } from '../types/practiceConfig';
export { parsePracticeConfig } from '../utils/configValidation';
