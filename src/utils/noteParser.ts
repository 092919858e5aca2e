/**
 * Note name parsing for typed input.
 *
 * Scientific pitch notation: C4 = MIDI 60, octave -1 starts at MIDI 0.
 * A name without an octave ("Bb") is taken in octave 4.
 */

import { noteName } from '../engine/pitchClass';
import type { Spelling } from '../types/practice';

export const DEFAULT_OCTAVE = 4;

const LETTER_SEMITONES: Readonly<Record<string, number>> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

const NOTE_WITH_OCTAVE = /^([A-Ga-g](?:#{1,2}|b{1,2})?)(-?\d+)?$/;

/**
 * Parses "C4", "f#3", "Bb" or a bare MIDI number ("60") into a MIDI note number.
 *
 * @returns MIDI number in 0-127, or null if the token is not a note
 */
export function parseNoteToMidi(token: string): number | null {
  const text = token.trim();
  if (/^\d+$/.test(text)) {
    const value = Number(text);
    return value <= 127 ? value : null;
  }

  const match = NOTE_WITH_OCTAVE.exec(text);
  if (!match) return null;

  const octave = match[2] === undefined ? DEFAULT_OCTAVE : Number(match[2]);
  const accidentals = match[1].slice(1);
  const shift = accidentals.startsWith('#') ? accidentals.length : -accidentals.length;
  // Accidentals may cross the octave boundary: B#3 is C4, Cb4 is B3
  const midi = (octave + 1) * 12 + LETTER_SEMITONES[match[1][0].toUpperCase()] + shift;
  return midi >= 0 && midi <= 127 ? midi : null;
}

/**
 * Parses a chord token: notes joined with "+" ("C3+C4").
 *
 * @returns MIDI numbers in the order written, or null if any part is not a note
 */
export function parseChordToken(token: string): number[] | null {
  const parts = token.split('+').map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) return null;

  const notes: number[] = [];
  for (const part of parts) {
    const midi = parseNoteToMidi(part);
    if (midi === null) return null;
    notes.push(midi);
  }
  return notes;
}

/**
 * MIDI number to a name with octave ("Bb3").
 */
export function midiToNoteName(midi: number, spelling?: Spelling): string {
  if (!Number.isInteger(midi) || midi < 0 || midi > 127) return '?';
  const octave = Math.floor(midi / 12) - 1;
  return `${noteName(midi % 12, spelling)}${octave}`;
}
