/**
 * Shared builders for engine tests.
 */

import type {
  DisplayEvent,
  NoteEventSource,
  PitchClass,
  PositionSpec,
  RawNoteEvent,
  Round,
} from '../../types/practice';
import { noteName } from '../pitchClass';

/** Rng that always picks the first candidate */
export const firstChoice = (): number => 0;

/**
 * A Mode-style Round over an arbitrary expected sequence.
 * Positions past the 8th are on the descending leg.
 */
export function makeRound(expected: PitchClass[], overrides: Partial<Round> = {}): Round {
  const positions = expected.map((pc, index): PositionSpec => ({
    index,
    expected: pc,
    expectedName: noteName(pc, 'sharp'),
    role: 'scale',
    leg: index < 8 ? 'ascending' : 'descending',
    noteNumber: (index % 8) + 1,
    scored: true,
  }));

  return {
    kind: 'mode',
    prompt: 'Test scale',
    root: expected[0] ?? 0,
    rootName: noteName(expected[0] ?? 0, 'sharp'),
    spelling: 'sharp',
    positions,
    legs: [],
    feedback: 'deferred',
    id: 'round-1',
    number: 1,
    expected,
    ...overrides,
  };
}

/**
 * Scale-Degree Round that opens a new root: [root gate, target].
 */
export function makeRootGateRound(root: PitchClass, target: PitchClass): Round {
  const positions: PositionSpec[] = [
    { index: 0, expected: root, expectedName: noteName(root, 'sharp'), role: 'root', leg: 'root', noteNumber: 1, scored: false },
    { index: 1, expected: target, expectedName: noteName(target, 'sharp'), role: 'target', leg: 'target', noteNumber: 1, scored: true },
  ];
  return makeRound([root, target], {
    kind: 'scale-degree',
    prompt: 'Test interval',
    positions,
    feedback: 'immediate',
    newRoot: true,
  });
}

export function rawOn(rawPitch: number, timestamp: number): RawNoteEvent {
  return { rawPitch, velocity: 100, kind: 'on', timestamp };
}

export function rawOff(rawPitch: number, timestamp: number): RawNoteEvent {
  return { rawPitch, velocity: 0, kind: 'off', timestamp };
}

/**
 * In-process note source that replays a fixed list of events.
 */
export class ScriptedNoteSource implements NoteEventSource {
  readonly name = 'scripted';
  closed = false;

  constructor(private readonly events: RawNoteEvent[]) {}

  close(): void {
    this.closed = true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RawNoteEvent> {
    for (const event of this.events) {
      if (this.closed) return;
      yield event;
    }
  }
}

/**
 * Display events of one type, narrowed.
 */
export function eventsOfType<T extends DisplayEvent['type']>(
  events: DisplayEvent[],
  type: T
): Extract<DisplayEvent, { type: T }>[] {
  return events.filter((event): event is Extract<DisplayEvent, { type: T }> => event.type === type);
}
