/**
 * Matching State Machine
 *
 * Consumes note events against one Round's expected sequence.
 *
 * States:
 * - AwaitingRoot: the root gate of a new Scale-Degree root is pending
 * - AwaitingNote: a single-note prompt is pending
 * - AwaitingSequence: a multi-position scale is in progress
 * - RoundComplete: terminal; the result has been produced exactly once
 *
 * Matching is positional. Each note-on resolves the current position (correct
 * or incorrect) and advances, so a wrong note never blocks the player.
 * Timeouts only produce a hint; they never resolve or advance a position.
 * The escape chord ends the Round at once and excludes the positions left.
 *
 * The note-on that resolves the last position is held for the coincidence
 * window before the Round completes. If its octave partner arrives in time the
 * held note was half of the escape chord: the Round ends escaped and that
 * position is excluded. Otherwise settle() completes the Round as played.
 */

import type {
  NoteEvent,
  PositionResult,
  PositionSpec,
  Round,
  RoundResult,
  TimeoutHint,
} from '../types/practice';
import { EscapeDetector } from './escapeDetector';
import { isPitchClass, noteName } from './pitchClass';

export type MatcherState = 'AwaitingRoot' | 'AwaitingNote' | 'AwaitingSequence' | 'RoundComplete';

/**
 * What one consumed event did to the Round.
 */
export type MatchOutcome =
  | { kind: 'ignored'; reason: 'note-off' | 'round-complete' }
  | { kind: 'held'; position: PositionResult }
  | { kind: 'recorded'; position: PositionResult; result: RoundResult | null }
  | {
      kind: 'escaped';
      /** The position resolved by the chord's second note; null when the chord withdrew a held note */
      position: PositionResult | null;
      excluded: PositionResult[];
      result: RoundResult;
    };

interface HeldCompletion {
  position: PositionResult;
  playedAt: number;
  /** Last time the escape partner may arrive */
  until: number;
}

export interface RoundMatcherOptions {
  /** Session-clock time the prompt was shown */
  startedAt: number;
  /** Per-position response deadline in ms; null = no deadline */
  deadlineMs: number | null;
  /** Escape chord coincidence window in ms */
  coincidenceWindowMs: number;
}

export class RoundMatcher {
  readonly round: Round;
  private readonly options: RoundMatcherOptions;
  private readonly escapeDetector: EscapeDetector;
  private readonly resolved: PositionResult[] = [];
  private readonly hintedPositions = new Set<number>();
  private positionStartedAt: number;
  private held: HeldCompletion | null = null;
  private finalResult: RoundResult | null = null;

  constructor(round: Round, options: RoundMatcherOptions) {
    this.round = round;
    this.options = options;
    this.escapeDetector = new EscapeDetector(options.coincidenceWindowMs);
    this.positionStartedAt = options.startedAt;
  }

  public get state(): MatcherState {
    const position = this.currentPosition;
    if (this.finalResult !== null || position === null) return 'RoundComplete';
    if (position.role === 'root') return 'AwaitingRoot';
    return this.round.kind === 'mode' ? 'AwaitingSequence' : 'AwaitingNote';
  }

  /** The open position, or null once the Round is terminal */
  public get currentPosition(): PositionSpec | null {
    if (this.finalResult !== null) return null;
    return this.round.positions[this.resolved.length] ?? null;
  }

  public get isComplete(): boolean {
    return this.finalResult !== null;
  }

  public get result(): RoundResult | null {
    return this.finalResult;
  }

  /** Positions resolved so far, in order; a held last note is not included */
  public get responses(): readonly PositionResult[] {
    return this.resolved;
  }

  /** True while the last note waits out the coincidence window */
  public get isHeld(): boolean {
    return this.held !== null;
  }

  /**
   * Consumes one event and reports what happened.
   * Events after the Round is terminal are ignored. A note-on that cannot be
   * the escape partner of a held note settles the Round first; that outcome is
   * returned and the event itself is left unmatched.
   */
  public consume(event: NoteEvent): MatchOutcome {
    const settled = this.settle(event.timestamp, event);
    if (settled !== null) return settled;

    const position = this.currentPosition;
    if (position === null) {
      return { kind: 'ignored', reason: 'round-complete' };
    }

    const escaped = this.escapeDetector.observe(event);
    if (event.kind === 'off') {
      return { kind: 'ignored', reason: 'note-off' };
    }

    if (this.held !== null) {
      if (escaped) return this.escapeHeld(event.timestamp);
      return this.completeHeld(this.held);
    }

    const recorded = this.evaluate(position, event);
    const last = this.resolved.length + 1 === this.round.positions.length;

    if (last) {
      if (!escaped && this.canStartEscape(event)) {
        this.held = {
          position: recorded,
          playedAt: event.timestamp,
          until: event.timestamp + this.options.coincidenceWindowMs,
        };
        return { kind: 'held', position: recorded };
      }
      this.accept(recorded);
      return { kind: 'recorded', position: recorded, result: this.complete(event.timestamp, false) };
    }

    this.accept(recorded);
    if (escaped) {
      const excluded = this.excludeRemaining();
      return { kind: 'escaped', position: recorded, excluded, result: this.complete(event.timestamp, true) };
    }

    return { kind: 'recorded', position: recorded, result: null };
  }

  /**
   * Event-consumption interface: the RoundResult when this event ended the Round, else null.
   */
  public submit(event: NoteEvent): RoundResult | null {
    const outcome = this.consume(event);
    return outcome.kind === 'ignored' || outcome.kind === 'held' ? null : outcome.result;
  }

  /**
   * Completes a held Round once no escape partner can arrive: `now` is past
   * the coincidence window, or `next` is a note-on that cannot finish the chord.
   *
   * @returns the completing outcome, or null when nothing was held or the window is still open
   */
  public settle(now: number, next?: NoteEvent): MatchOutcome | null {
    const held = this.held;
    if (held === null) return null;

    const partnerPossible =
      now <= held.until && (next === undefined || next.kind === 'off' || this.escapeDetector.completes(next));
    if (partnerPossible) return null;

    return this.completeHeld(held);
  }

  /**
   * Deadline check for the open position. Returns a hint at most once per position.
   */
  public tick(now: number): TimeoutHint | null {
    const position = this.currentPosition;
    const { deadlineMs } = this.options;
    if (position === null || deadlineMs === null || this.held !== null) return null;
    if (this.hintedPositions.has(position.index)) return null;

    const deadline = this.positionStartedAt + deadlineMs;
    if (now < deadline) return null;

    this.hintedPositions.add(position.index);
    return {
      roundId: this.round.id,
      position: position.index,
      noteNumber: position.noteNumber,
      leg: position.leg,
      expected: position.expected,
      expectedName: position.expectedName,
      deadline,
    };
  }

  private evaluate(position: PositionSpec, event: NoteEvent): PositionResult {
    const observed = isPitchClass(event.pitchClass) ? event.pitchClass : null;
    const correct = observed !== null && observed === position.expected;

    const result: PositionResult = {
      ...position,
      outcome: correct ? 'correct' : 'incorrect',
      observed,
      observedName: correct
        ? position.expectedName
        : observed === null
          ? '?'
          : noteName(observed, this.round.spelling),
      observedRawPitch: Number.isInteger(event.rawPitch) ? event.rawPitch : null,
      hinted: this.hintedPositions.has(position.index),
      playedAt: event.timestamp,
    };
  }

  private accept(result: PositionResult): void {
    this.resolved.push(result);
    if (result.playedAt !== null) {
      this.positionStartedAt = result.playedAt;
    }
  }

  /** Only a well-formed note-on can be the first half of the chord */
  private canStartEscape(event: NoteEvent): boolean {
    return this.options.coincidenceWindowMs > 0 && isPitchClass(event.pitchClass) && Number.isInteger(event.rawPitch);
  }

  private completeHeld(held: HeldCompletion): MatchOutcome {
    this.held = null;
    this.accept(held.position);
    return { kind: 'recorded', position: held.position, result: this.complete(held.playedAt, false) };
  }

  private escapeHeld(timestamp: number): MatchOutcome {
    this.held = null;
    const excluded = this.excludeRemaining();
    return { kind: 'escaped', position: null, excluded, result: this.complete(timestamp, true) };
  }

  private excludeRemaining(): PositionResult[] {
    const excluded: PositionResult[] = [];
    for (let i = this.resolved.length; i < this.round.positions.length; i++) {
      const position = this.round.positions[i];
      const result: PositionResult = {
        ...position,
        outcome: 'excluded',
        observed: null,
        observedName: null,
        observedRawPitch: null,
        hinted: this.hintedPositions.has(position.index),
        playedAt: null,
      };
      excluded.push(result);
      this.resolved.push(result);
    }
    return excluded;
  }

  private complete(completedAt: number, escaped: boolean): RoundResult {
    this.escapeDetector.reset();
    const counted = this.resolved.filter((p) => p.scored && p.outcome !== 'excluded');
    const passed = counted.length > 0 && counted.every((p) => p.outcome === 'correct');

    this.finalResult = {
      roundId: this.round.id,
      roundNumber: this.round.number,
      kind: this.round.kind,
      prompt: this.round.prompt,
      positions: [...this.resolved],
      passed,
      escaped,
      startedAt: this.options.startedAt,
      completedAt,
      elapsedMs: completedAt - this.options.startedAt,
      hintCount: this.hintedPositions.size,
    };
    return this.finalResult;
  }
}
