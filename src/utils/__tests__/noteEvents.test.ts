/**
 * Tests for raw event normalization.
 */

import { describe, it, expect } from 'vitest';
import { createNoteEvent, noteOff, noteOn } from '../noteEvents';

describe('createNoteEvent', () => {
  it('derives the pitch class from the raw pitch', () => {
    expect(noteOn(70, 5)).toEqual({ pitchClass: 10, rawPitch: 70, velocity: 100, kind: 'on', timestamp: 5 });
    expect(noteOff(70, 9)).toMatchObject({ pitchClass: 10, kind: 'off' });
  });

  it('treats a note-on with velocity 0 as a release', () => {
    expect(createNoteEvent({ rawPitch: 60, velocity: 0, kind: 'on', timestamp: 0 }).kind).toBe('off');
  });

  it('marks pitches outside 0-127 as malformed', () => {
    expect(createNoteEvent({ rawPitch: 128, velocity: 80, kind: 'on', timestamp: 0 }).pitchClass).toBe(-1);
    expect(createNoteEvent({ rawPitch: -3, velocity: 80, kind: 'on', timestamp: 0 }).pitchClass).toBe(-1);
    expect(createNoteEvent({ rawPitch: Number.NaN, velocity: 80, kind: 'on', timestamp: 0 }).pitchClass).toBe(-1);
  });

  it('clamps velocity', () => {
    expect(createNoteEvent({ rawPitch: 60, velocity: 300, kind: 'on', timestamp: 0 }).velocity).toBe(127);
  });
});
