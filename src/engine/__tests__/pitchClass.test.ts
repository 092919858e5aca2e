/**
 * Tests for the Pitch Class Model.
 */

import { describe, it, expect } from 'vitest';
import { PracticeConfigError } from '../errors';
import { INTERVAL_LABELS, INTERVAL_SEMITONES, MODE_NAMES, MODE_STEPS } from '../models';
import {
  buildScale,
  intervalToPitchClass,
  mod12,
  noteName,
  noteNameToPitchClass,
  pitchClassOf,
  resolveModeName,
  semitoneOffset,
  intervalName,
  spellAbove,
  spellScale,
  spellingForInterval,
  spellingForKey,
  spellingOf,
} from '../pitchClass';

const ROOTS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

describe('intervalToPitchClass', () => {
  it('is mod-12 addition for every root and label', () => {
    for (const root of ROOTS) {
      for (const label of INTERVAL_LABELS) {
        expect(intervalToPitchClass(root, label)).toBe((root + semitoneOffset(label)) % 12);
      }
    }
  });

  it('supports exactly 12 labels, one per semitone', () => {
    expect(INTERVAL_LABELS).toHaveLength(12);
    expect(new Set(Object.values(INTERVAL_SEMITONES)).size).toBe(12);
    expect(intervalToPitchClass(2, 'b7')).toBe(0);
    expect(intervalToPitchClass(0, '#4')).toBe(6);
  });

  it('rejects unknown labels as configuration errors', () => {
    expect(() => semitoneOffset('9')).toThrow(PracticeConfigError);
    expect(() => intervalToPitchClass(0, 'b9')).toThrow('Unsupported interval label: b9');
  });
});

describe('buildScale', () => {
  it('follows the step pattern of every mode on every root', () => {
    for (const mode of MODE_NAMES) {
      const steps = MODE_STEPS[mode];
      expect(steps.reduce((sum, step) => sum + step, 0)).toBe(12);

      for (const root of ROOTS) {
        const scale = buildScale(root, mode);
        expect(scale).toHaveLength(8);
        expect(scale[0]).toBe(scale[7]);
        for (let i = 0; i < 7; i++) {
          expect(mod12(scale[i + 1] - scale[i])).toBe(steps[i]);
        }
      }
    }
  });

  it('builds known scales', () => {
    expect(buildScale(0, 'Ionian')).toEqual([0, 2, 4, 5, 7, 9, 11, 0]);
    expect(buildScale(2, 'Dorian')).toEqual([2, 4, 5, 7, 9, 11, 0, 2]);
    expect(buildScale(9, 'Aeolian')).toEqual([9, 11, 0, 2, 4, 5, 7, 9]);
  });

  it('rejects unknown modes', () => {
    expect(() => buildScale(0, 'Blues')).toThrow(PracticeConfigError);
  });
});

describe('note names', () => {
  it('uses the canonical root table without context', () => {
    expect(ROOTS.map((pc) => noteName(pc))).toEqual([
      'C', 'Db', 'D', 'Eb', 'E', 'F', 'F#', 'G', 'Ab', 'A', 'Bb', 'B',
    ]);
  });

  it('spells with the requested accidental', () => {
    expect(noteName(10, 'sharp')).toBe('A#');
    expect(noteName(10, 'flat')).toBe('Bb');
    expect(noteName(6, 'flat')).toBe('Gb');
  });

  it('returns "?" for values that are not pitch classes', () => {
    expect(noteName(-1)).toBe('?');
    expect(noteName(12)).toBe('?');
    expect(noteName(1.5)).toBe('?');
  });

  it('parses names with sharps and flats', () => {
    expect(noteNameToPitchClass('A#')).toBe(10);
    expect(noteNameToPitchClass('Bb')).toBe(10);
    expect(noteNameToPitchClass('cb')).toBe(11);
    expect(noteNameToPitchClass('E#')).toBe(5);
    expect(noteNameToPitchClass('C##')).toBe(2);
    expect(noteNameToPitchClass(' G ')).toBe(7);
  });

  it('rejects names that are not notes', () => {
    expect(noteNameToPitchClass('H')).toBeNull();
    expect(noteNameToPitchClass('C#b')).toBeNull();
    expect(noteNameToPitchClass('')).toBeNull();
  });
});

describe('pitchClassOf', () => {
  it('discards the octave', () => {
    expect(pitchClassOf(60)).toBe(0);
    expect(pitchClassOf(61)).toBe(1);
    expect(pitchClassOf(47)).toBe(11);
  });

  it('marks non-integer pitches as -1', () => {
    expect(pitchClassOf(60.5)).toBe(-1);
    expect(pitchClassOf(Number.NaN)).toBe(-1);
  });
});

describe('spelling', () => {
  it('spells flat major keys with flats and F# with sharps', () => {
    expect(spellingForKey(5)).toBe('flat');
    expect(spellingForKey(1)).toBe('flat');
    expect(spellingForKey(6)).toBe('sharp');
    expect(spellingForKey(7)).toBe('sharp');
  });

  it('uses the parent major key of a mode', () => {
    // C Aeolian shares Eb major's key signature
    expect(spellingForKey(0, 'Aeolian')).toBe('flat');
    // A Aeolian shares C major's
    expect(spellingForKey(9, 'Aeolian')).toBe('sharp');
    // D Dorian shares C major's
    expect(spellingForKey(2, 'Dorian')).toBe('sharp');
  });

  it('spells altered interval targets by their accidental', () => {
    expect(spellingForInterval(0, 'b7')).toBe('flat');
    expect(spellingForInterval(0, '#4')).toBe('sharp');
    expect(spellingForInterval(5, '3')).toBe('flat');
    expect(spellingForInterval(7, '7')).toBe('sharp');
  });

  it('resolves mode names case-insensitively', () => {
    expect(resolveModeName('dorian')).toBe('Dorian');
    expect(resolveModeName(' LOCRIAN ')).toBe('Locrian');
    expect(resolveModeName('blues')).toBeNull();
  });
});

describe('scale spelling', () => {
  it('gives every degree its own letter', () => {
    expect(spellScale(6, 'Ionian')).toEqual(['F#', 'G#', 'A#', 'B', 'C#', 'D#', 'E#', 'F#']);
    expect(spellScale(3, 'Aeolian')).toEqual(['D#', 'E#', 'F#', 'G#', 'A#', 'B', 'C#', 'D#']);
  });

  it('spells F Locrian with flats', () => {
    expect(spellScale(5, 'Locrian')).toEqual(['F', 'Gb', 'Ab', 'Bb', 'Cb', 'Db', 'Eb', 'F']);
  });

  it('keeps the plain spelling of natural keys', () => {
    expect(spellScale(0, 'Ionian')).toEqual(['C', 'D', 'E', 'F', 'G', 'A', 'B', 'C']);
    expect(spellScale(0, 'Aeolian')).toEqual(['C', 'D', 'Eb', 'F', 'G', 'Ab', 'Bb', 'C']);
  });

  it('spells a note above a root by letter and distance', () => {
    expect(spellAbove('F#', 6, 11)).toBe('E#');
    expect(spellAbove('Db', 2, 3)).toBe('Fb');
    expect(spellAbove('C', 1, 2)).toBe('D');
    expect(spellAbove('H', 1, 2)).toBe('?');
  });

  it('derives the accidental preference from the names', () => {
    expect(spellingOf(['F', 'Gb', 'Ab'])).toBe('flat');
    expect(spellingOf(['B', 'C#', 'D#'])).toBe('sharp');
    expect(spellingOf(['C', 'D', 'E'])).toBe('sharp');
  });

  it('names natural interval targets in the root key', () => {
    expect(intervalName(6, '7')).toBe('E#');
    expect(intervalName(5, '4')).toBe('Bb');
    expect(intervalName(0, 'b7')).toBe('Bb');
    expect(intervalName(0, '#4')).toBe('F#');
  });
});
