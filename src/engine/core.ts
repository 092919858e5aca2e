/**
 * PracticeEngine - Practice session engine facade.
 *
 * Wires the PromptGenerator, the per-Round matching state machine and the
 * StatisticsAggregator behind one event-consumption interface:
 *
 *   engine.start(now)
 *   engine.submit(event)   -> RoundResult when the event ended a Round
 *   engine.tick(now)       -> settles a held Round, deadline checks, next prompt after the gap
 *   engine.finish()        -> discards the in-flight Round, returns SessionStats
 *
 * The note that answers a Round's last position is held for the escape
 * chord's coincidence window, so the verdict and RoundComplete for it arrive
 * from the next tick or event rather than from the submit that played it.
 *
 * Display output is pushed to listeners as DisplayEvents; the engine never
 * touches a terminal or a device, so it can be driven by a scripted event list.
 */

import type {
  DisplayEvent,
  DisplayListener,
  NoteEvent,
  PositionResult,
  Round,
  RoundResult,
  SessionStats,
} from '../types/practice';
import type { PracticeConfig } from '../types/practiceConfig';
import { parsePracticeConfig } from '../utils/configValidation';
import { createLogger } from '../utils/logger';
import { midiToNoteName } from '../utils/noteParser';
import { createRng, type Rng } from '../utils/rng';
import { RoundMatcher, type MatchOutcome, type MatcherState } from './matcher';
import { DEFAULT_ENGINE_CONSTANTS, TIME_PRESSURE_SECONDS, type EngineConstants } from './models';
import { PromptGenerator } from './promptGenerator';
import { StatisticsAggregator } from './statistics';

const log = createLogger('PracticeEngine');

/**
 * Session-level lifecycle.
 * - idle: constructed (or the last Round was abandoned), no prompt shown
 * - in-round: a Round is open
 * - between-rounds: a Round completed; the next prompt is due after the round gap
 * - finished: finish() was called; further input is ignored
 */
export type EngineState = 'idle' | 'in-round' | 'between-rounds' | 'finished';

export interface PracticeEngineOptions {
  /** Random source; defaults to a mulberry32 seeded from config.seed, or Math.random */
  rng?: Rng;
  constants?: EngineConstants;
  /** Statistics owner; one is created when omitted */
  aggregator?: StatisticsAggregator;
}

export class PracticeEngine {
  readonly config: PracticeConfig;
  readonly constants: EngineConstants;

  private readonly generator: PromptGenerator;
  private readonly aggregator: StatisticsAggregator;
  private readonly listeners = new Set<DisplayListener>();
  private readonly deadlineMs: number | null;

  private engineState: EngineState = 'idle';
  private matcher: RoundMatcher | null = null;
  private nextRoundAt: number | null = null;
  private finalStats: SessionStats | null = null;

  /**
   * @throws PracticeConfigError when the configuration is invalid; no Round is created
   */
  constructor(config: PracticeConfig, options: PracticeEngineOptions = {}) {
    this.config = parsePracticeConfig(config);
    this.constants = options.constants ?? DEFAULT_ENGINE_CONSTANTS;
    this.aggregator = options.aggregator ?? new StatisticsAggregator(undefined, this.constants.maxRecentMistakes);
    this.generator = new PromptGenerator(this.config, options.rng ?? createRng(this.config.seed));

    const seconds = TIME_PRESSURE_SECONDS[this.config.timePressure];
    this.deadlineMs = seconds === null ? null : seconds * 1000;

    log.debug('Engine created', {
      practiceType: this.config.practiceType,
      timePressure: this.config.timePressure,
      strategy: this.generator.strategyName,
    });
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  public get state(): EngineState {
    return this.engineState;
  }

  /** State of the open Round's matcher, or null between Rounds */
  public get matcherState(): MatcherState | null {
    return this.matcher?.state ?? null;
  }

  public get currentRound(): Round | null {
    return this.matcher?.round ?? null;
  }

  /** Read-only copy of the session statistics */
  public get stats(): SessionStats {
    return this.aggregator.snapshot();
  }

  /**
   * Subscribes to display events.
   *
   * @returns unsubscribe function
   */
  public on(listener: DisplayListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Session control
  // ==========================================================================

  /**
   * Shows the first prompt.
   *
   * @throws Error if the session already started or finished
   */
  public start(now: number): Round {
    if (this.engineState !== 'idle') {
      throw new Error(`Cannot start a session in state '${this.engineState}'`);
    }
    return this.beginRound(now);
  }

  /**
   * Consumes one normalized note event.
   *
   * A held Round that this event cannot escape is completed first. Events
   * between Rounds are ignored until the round gap has passed; an event after
   * it opens the next Round and is matched against it.
   *
   * @returns the RoundResult when this event ended a Round, else null
   */
  public submit(event: NoteEvent): RoundResult | null {
    const settled = this.settleHeld(event.timestamp, event);

    if (this.engineState === 'between-rounds') {
      if (this.nextRoundAt === null || event.timestamp < this.nextRoundAt) {
        log.debug('Ignoring note between rounds', { note: midiToNoteName(event.rawPitch), kind: event.kind });
        return settled;
      }
      this.beginRound(this.nextRoundAt);
    }

    const matcher = this.matcher;
    if (this.engineState !== 'in-round' || matcher === null) {
      return settled;
    }

    return this.apply(matcher.round, matcher.consume(event)) ?? settled;
  }

  /**
   * Cooperative timer check. Completes a held Round once its escape window
   * has passed, emits at most one hint per open position and shows the next
   * prompt once the round gap has passed.
   *
   * @returns the RoundResult of a Round completed by this tick, else null
   */
  public tick(now: number): RoundResult | null {
    const settled = this.settleHeld(now);

    if (this.engineState === 'between-rounds' && this.nextRoundAt !== null && now >= this.nextRoundAt) {
      this.beginRound(this.nextRoundAt);
    }

    if (this.engineState !== 'in-round' || this.matcher === null) return settled;

    const hint = this.matcher.tick(now);
    if (hint !== null) {
      log.debug('Timeout hint', { position: hint.position, expected: hint.expectedName });
      this.emit({ type: 'hint', hint });
    }
    return settled;
  }

  /**
   * Discards the in-flight Round without counting it.
   *
   * @returns true when a Round was discarded
   */
  public abandon(): boolean {
    const matcher = this.matcher;
    this.matcher = null;
    this.nextRoundAt = null;
    if (this.engineState === 'finished') return false;
    this.engineState = 'idle';

    if (matcher === null || matcher.isComplete) return false;

    log.info('Round abandoned', { round: matcher.round.number, played: matcher.responses.length });
    this.emit({ type: 'round-abandoned', roundId: matcher.round.id });
    return true;
  }

  /**
   * Ends the session: completes a held Round, abandons the in-flight one and
   * emits the summary once.
   */
  public finish(): SessionStats {
    if (this.finalStats !== null) {
      return this.aggregator.snapshot();
    }

    this.settleHeld(Number.POSITIVE_INFINITY);
    this.abandon();
    this.engineState = 'finished';
    this.finalStats = this.aggregator.snapshot();
    this.emit({ type: 'session-summary', stats: this.finalStats });
    return this.aggregator.snapshot();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private beginRound(startedAt: number): Round {
    const round = this.generator.nextRound();
    this.matcher = new RoundMatcher(round, {
      startedAt,
      deadlineMs: this.deadlineMs,
      coincidenceWindowMs: this.config.coincidenceWindowMs,
    });
    this.nextRoundAt = null;
    this.engineState = 'in-round';

    log.debug('Round started', { round: round.number, prompt: round.prompt, expected: round.expected });
    this.emit({ type: 'round-start', round });
    return round;
  }

  private settleHeld(now: number, next?: NoteEvent): RoundResult | null {
    const matcher = this.matcher;
    if (this.engineState !== 'in-round' || matcher === null) return null;

    const outcome = matcher.settle(now, next);
    return outcome === null ? null : this.apply(matcher.round, outcome);
  }

  /**
   * Turns a matcher outcome into display events and statistics.
   *
   * @returns the RoundResult when the outcome ended the Round
   */
  private apply(round: Round, outcome: MatchOutcome): RoundResult | null {
    switch (outcome.kind) {
      case 'ignored':
      case 'held':
        return null;

      case 'recorded':
        this.emitPosition(round, outcome.position);
        if (outcome.result !== null) {
          this.completeRound(round, outcome.result);
        }
        return outcome.result;

      case 'escaped':
        if (outcome.position !== null) {
          this.emitPosition(round, outcome.position);
        }
        this.emit({ type: 'escape', roundId: round.id, excludedCount: outcome.excluded.length });
        this.completeRound(round, outcome.result);
        return outcome.result;
    }
  }

  private emitPosition(round: Round, position: PositionResult): void {
    if (round.feedback === 'immediate') {
      this.emit({ type: 'verdict', roundId: round.id, result: position });
      return;
    }
    this.emit({
      type: 'echo',
      roundId: round.id,
      position: position.index,
      leg: position.leg,
      noteNumber: position.noteNumber,
      observedName: position.observedName ?? '?',
    });
  }

  private completeRound(round: Round, result: RoundResult): void {
    this.aggregator.record(result);

    if (round.feedback === 'deferred') {
      this.emit({ type: 'verdicts', roundId: round.id, results: result.positions });
    }
    this.emit({ type: 'round-complete', result });

    log.debug('Round complete', {
      round: result.roundNumber,
      passed: result.passed,
      escaped: result.escaped,
      elapsedMs: result.elapsedMs,
    });

    if (this.config.roundGapMs <= 0) {
      this.beginRound(result.completedAt);
      return;
    }
    this.matcher = null;
    this.engineState = 'between-rounds';
    this.nextRoundAt = result.completedAt + this.config.roundGapMs;
  }

  private emit(event: DisplayEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error('Display listener failed', { event: event.type, error });
      }
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Creates a PracticeEngine with the default engine constants.
 */
export function createPracticeEngine(config: PracticeConfig, rng?: Rng): PracticeEngine {
  return new PracticeEngine(config, { rng });
}
