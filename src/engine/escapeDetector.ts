/**
 * Escape chord detection.
 *
 * Two note-ons of the same pitch class, exactly one octave apart in raw pitch
 * and inside the coincidence window, form the escape chord. At most the two
 * most recent note-ons are buffered; older ones fall out of the window and
 * are discarded. A note-off drops its key from the buffer, since a released
 * key cannot be part of the same gesture as a later press.
 */

import type { NoteEvent } from '../types/practice';
import { isPitchClass } from './pitchClass';

const OCTAVE = 12;
const MAX_BUFFERED = 2;

interface BufferedNoteOn {
  rawPitch: number;
  pitchClass: number;
  timestamp: number;
}

export class EscapeDetector {
  private buffer: BufferedNoteOn[] = [];

  constructor(private readonly windowMs: number) {}

  /**
   * Feeds one event.
   *
   * @returns true when this event completes the escape chord
   */
  public observe(event: NoteEvent): boolean {
    if (event.kind === 'off') {
      this.buffer = this.buffer.filter((entry) => entry.rawPitch !== event.rawPitch);
      return false;
    }

    if (!isPitchClass(event.pitchClass) || !Number.isInteger(event.rawPitch)) {
      return false;
    }

    if (this.completes(event)) {
      this.buffer = [];
      return true;
    }

    this.buffer = this.buffer.filter((entry) => this.inWindow(entry, event));

    this.buffer.push({ rawPitch: event.rawPitch, pitchClass: event.pitchClass, timestamp: event.timestamp });
    if (this.buffer.length > MAX_BUFFERED) {
      this.buffer.shift();
    }
    return false;
  }

  /**
   * Whether a note-on would complete the chord, without buffering it.
   */
  public completes(event: NoteEvent): boolean {
    if (event.kind !== 'on' || !isPitchClass(event.pitchClass) || !Number.isInteger(event.rawPitch)) {
      return false;
    }
    return this.buffer.some(
      (entry) =>
        this.inWindow(entry, event) &&
        entry.pitchClass === event.pitchClass &&
        Math.abs(entry.rawPitch - event.rawPitch) === OCTAVE
    );
  }

  public reset(): void {
    this.buffer = [];
  }

  private inWindow(entry: BufferedNoteOn, event: NoteEvent): boolean {
    return event.timestamp - entry.timestamp <= this.windowMs;
  }
}
