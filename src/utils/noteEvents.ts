/**
 * Normalization of raw key events into NoteEvents.
 *
 * - pitch class = raw pitch mod 12
 * - a raw pitch that is not an integer in 0-127 gets pitch class -1, which never matches
 * - a note-on with velocity 0 is a note-off (running-status convention)
 */

import { pitchClassOf } from '../engine/pitchClass';
import type { NoteEvent, RawNoteEvent } from '../types/practice';

const MIDI_MAX = 127;

function isMidiNumber(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MIDI_MAX;
}

export function createNoteEvent(raw: RawNoteEvent): NoteEvent {
  const velocity = Number.isFinite(raw.velocity) ? Math.max(0, Math.min(MIDI_MAX, Math.round(raw.velocity))) : 0;
  const kind = raw.kind === 'on' && velocity > 0 ? 'on' : 'off';

  return {
    pitchClass: isMidiNumber(raw.rawPitch) ? pitchClassOf(raw.rawPitch) : -1,
    rawPitch: raw.rawPitch,
    velocity,
    kind,
    timestamp: raw.timestamp,
  };
}

/**
 * Shorthand for scripted input: a note-on of a MIDI number at a time.
 */
export function noteOn(rawPitch: number, timestamp: number, velocity = 100): NoteEvent {
  return createNoteEvent({ rawPitch, velocity, kind: 'on', timestamp });
}

export function noteOff(rawPitch: number, timestamp: number): NoteEvent {
  return createNoteEvent({ rawPitch, velocity: 0, kind: 'off', timestamp });
}
