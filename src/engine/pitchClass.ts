/**
 * Pitch Class Model
 *
 * Note-name <-> pitch-class arithmetic, interval lookup and mode/scale generation.
 * All functions are pure. Unknown interval or mode labels are configuration
 * errors and throw PracticeConfigError.
 */

import type { PitchClass, Spelling } from '../types/practice';
import { PracticeConfigError } from './errors';
import {
  INTERVAL_SEMITONES,
  MODE_NAMES,
  MODE_STEPS,
  type IntervalLabel,
  type ModeName,
} from './models';

const SHARP_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'] as const;
const FLAT_NAMES = ['C', 'Db', 'D', 'Eb', 'E', 'F', 'Gb', 'G', 'Ab', 'A', 'Bb', 'B'] as const;

/**
 * Canonical spelling when no key context is given.
 * Matches how each pitch class is spelled as the root of a major key.
 */
const ROOT_NAMES = ['C', 'Db', 'D', 'Eb', 'E', 'F', 'F#', 'G', 'Ab', 'A', 'Bb', 'B'] as const;

/** Major keys written with flats: F, Bb, Eb, Ab, Db. F#/Gb is written with sharps. */
const FLAT_MAJOR_KEYS: ReadonlySet<PitchClass> = new Set([5, 10, 3, 8, 1]);

const LETTER_PITCH_CLASSES: Readonly<Record<string, PitchClass>> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

const LETTERS: readonly string[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];

/**
 * Reduces any integer to the range 0-11.
 */
export function mod12(n: number): number {
  return ((n % 12) + 12) % 12;
}

export function isPitchClass(value: unknown): value is PitchClass {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 11;
}

/**
 * Pitch class of a raw MIDI pitch, or -1 when the pitch is not an integer.
 */
export function pitchClassOf(rawPitch: number): PitchClass {
  if (!Number.isInteger(rawPitch)) return -1;
  return mod12(rawPitch);
}

/**
 * Deterministic note name for a pitch class.
 *
 * @param pc - Pitch class (0-11)
 * @param spelling - Accidental preference; omitted = canonical root spelling
 * @returns Note name, or "?" when pc is not a valid pitch class
 */
export function noteName(pc: PitchClass, spelling?: Spelling): string {
  if (!isPitchClass(pc)) return '?';
  if (spelling === 'sharp') return SHARP_NAMES[pc];
  if (spelling === 'flat') return FLAT_NAMES[pc];
  return ROOT_NAMES[pc];
}

/**
 * Parses a note name without octave ("C", "f#", "Bb", "Ebb") into a pitch class.
 *
 * @returns Pitch class, or null if the name is not a note
 */
export function noteNameToPitchClass(name: string): PitchClass | null {
  const match = /^([A-Ga-g])(#{1,2}|b{1,2})?$/.exec(name.trim());
  if (!match) return null;
  const base = LETTER_PITCH_CLASSES[match[1].toUpperCase()];
  const accidentals = match[2] ?? '';
  const shift = accidentals.startsWith('#') ? accidentals.length : -accidentals.length;
  return mod12(base + shift);
}

export function isIntervalLabel(value: string): value is IntervalLabel {
  return Object.prototype.hasOwnProperty.call(INTERVAL_SEMITONES, value);
}

export function isModeName(value: string): value is ModeName {
  return Object.prototype.hasOwnProperty.call(MODE_STEPS, value);
}

/**
 * Resolves a mode name case-insensitively ("dorian" -> "Dorian").
 */
export function resolveModeName(value: string): ModeName | null {
  const wanted = value.trim().toLowerCase();
  return MODE_NAMES.find((mode) => mode.toLowerCase() === wanted) ?? null;
}

/**
 * Semitone offset of an interval label from the root.
 *
 * @throws PracticeConfigError if the label is not one of the 12 supported labels
 */
export function semitoneOffset(label: string): number {
  if (!isIntervalLabel(label)) {
    throw new PracticeConfigError(`Unsupported interval label: ${label}`);
  }
  return INTERVAL_SEMITONES[label];
}

/**
 * Pitch class an interval above the root (mod-12 addition).
 */
export function intervalToPitchClass(root: PitchClass, label: string): PitchClass {
  return mod12(root + semitoneOffset(label));
}

/**
 * Step pattern of a mode.
 *
 * @throws PracticeConfigError if the mode name is unknown
 */
export function modeSteps(mode: string): readonly number[] {
  if (!isModeName(mode)) {
    throw new PracticeConfigError(`Unsupported mode: ${mode}. Available: ${MODE_NAMES.join(', ')}`);
  }
  return MODE_STEPS[mode];
}

/**
 * Builds the 8-position scale of a mode on a root.
 *
 * Applies the mode's 7 steps cumulatively from the root. Position 7 is the
 * root an octave up, collapsed to its pitch class.
 */
export function buildScale(root: PitchClass, mode: string): PitchClass[] {
  const steps = modeSteps(mode);
  const scale: PitchClass[] = [mod12(root)];
  let offset = 0;
  for (const step of steps) {
    offset += step;
    scale.push(mod12(root + offset));
  }
  return scale;
}

/**
 * Semitones from the parent major key's tonic to the mode's tonic.
 */
function modeOffsetInParentMajor(mode: ModeName): number {
  const index = MODE_NAMES.indexOf(mode);
  let offset = 0;
  for (let i = 0; i < index; i++) {
    offset += MODE_STEPS.Ionian[i];
  }
  return offset;
}

/**
 * Key-signature-aware spelling for a mode on a root.
 *
 * A key is spelled with flats when its parent major key is F, Bb, Eb, Ab or Db.
 * C Aeolian (parent Eb major) is therefore spelled C D Eb F G Ab Bb C.
 */
export function spellingForKey(root: PitchClass, mode: ModeName = 'Ionian'): Spelling {
  const parentMajor = mod12(root - modeOffsetInParentMajor(mode));
  return FLAT_MAJOR_KEYS.has(parentMajor) ? 'flat' : 'sharp';
}

/**
 * Spelling for an interval target: altered labels follow their accidental,
 * natural degrees follow the root's major key.
 */
export function spellingForInterval(root: PitchClass, label: IntervalLabel): Spelling {
  if (label.startsWith('b')) return 'flat';
  if (label.startsWith('#')) return 'sharp';
  return spellingForKey(root, 'Ionian');
}

/**
 * Spells the note a number of letters and semitones above a spelled root.
 * The letter is fixed by the degree, so the accidental follows from the
 * semitone distance: E# in F# major, Cb in F Locrian.
 *
 * @returns Note name, or "?" when rootName is not a note
 */
export function spellAbove(rootName: string, letterSteps: number, semitones: number): string {
  const rootPc = noteNameToPitchClass(rootName);
  const rootLetter = LETTERS.indexOf(rootName.trim().charAt(0).toUpperCase());
  if (rootPc === null || rootLetter < 0) return '?';

  const letter = LETTERS[(rootLetter + letterSteps) % LETTERS.length];
  let shift = mod12(rootPc + semitones - LETTER_PITCH_CLASSES[letter]);
  if (shift > 6) shift -= 12;
  return shift >= 0 ? letter + '#'.repeat(shift) : letter + 'b'.repeat(-shift);
}

/**
 * Names of the 8 scale positions of a mode, one letter per degree.
 * The root takes the spelling of the mode's parent major key.
 */
export function spellScale(root: PitchClass, mode: ModeName): string[] {
  const rootName = noteName(root, spellingForKey(root, mode));
  const names = [rootName];
  let offset = 0;
  modeSteps(mode).forEach((step, i) => {
    offset += step;
    names.push(spellAbove(rootName, i + 1, offset));
  });
  return names;
}

/**
 * Accidental preference of a spelled scale, used to name notes outside it.
 */
export function spellingOf(names: readonly string[]): Spelling {
  return names.some((name) => name.length > 1 && name.endsWith('b')) ? 'flat' : 'sharp';
}

/**
 * Name of an interval target above a root. Natural degrees are spelled in
 * the root's major key; altered labels keep their own accidental.
 */
export function intervalName(root: PitchClass, label: IntervalLabel): string {
  const degree = Number(label);
  if (Number.isInteger(degree)) {
    return spellAbove(noteName(root, spellingForKey(root)), degree - 1, semitoneOffset(label));
  }
  return noteName(intervalToPitchClass(root, label), spellingForInterval(root, label));
}
