/**
 * Tests for MIDI file replay.
 */

import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { NoteSourceError } from '../../engine/errors';
import type { RawNoteEvent } from '../../types/practice';
import { isVerboseLogging, setVerboseLogging } from '../../utils/logger';
import type { MidiNoteTimeline } from '../../utils/midiImport';
import { MidiFileNoteSource, type Sleeper } from '../MidiFileNoteSource';

const TIMELINE: MidiNoteTimeline = {
  events: [
    { rawPitch: 60, velocity: 90, kind: 'on', timestamp: 0 },
    { rawPitch: 60, velocity: 0, kind: 'off', timestamp: 500 },
    { rawPitch: 62, velocity: 90, kind: 'on', timestamp: 1000 },
  ],
  noteCount: 2,
  tempo: 120,
  name: 'drill',
  durationMs: 1000,
};

function fakeTime(start: number) {
  let now = start;
  const waits: number[] = [];
  const clock = (): number => now;
  const sleep: Sleeper = async (ms) => {
    waits.push(ms);
    now += ms;
    return true;
  };
  return { clock, sleep, waits };
}

describe('MidiFileNoteSource', () => {
  const verbose = isVerboseLogging();

  afterEach(() => {
    setVerboseLogging(verbose);
    vi.restoreAllMocks();
  });

  it('releases events on schedule at the given speed', async () => {
    const time = fakeTime(1000);
    const source = new MidiFileNoteSource(TIMELINE, { speed: 2, clock: time.clock, sleep: time.sleep });

    const events: RawNoteEvent[] = [];
    for await (const event of source) {
      events.push(event);
    }

    expect(source.name).toBe('MIDI file: drill');
    expect(events.map((event) => event.timestamp)).toEqual([1000, 1250, 1500]);
    expect(time.waits).toEqual([250, 250]);
  });

  it('logs the file details and the playback length', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setVerboseLogging(true);
    const time = fakeTime(0);
    const source = new MidiFileNoteSource(TIMELINE, { speed: 2, clock: time.clock, sleep: time.sleep });

    for await (const event of source) {
      expect(event.rawPitch).toBeGreaterThan(0);
    }

    expect(errorSpy).toHaveBeenCalledWith('[MidiFileNoteSource] Replay started', {
      name: 'drill',
      notes: 2,
      tempo: 120,
      speed: 2,
      playbackMs: 500,
    });
  });

  it('stops when closed', async () => {
    const time = fakeTime(0);
    const source = new MidiFileNoteSource(TIMELINE, { clock: time.clock, sleep: time.sleep });

    const events: RawNoteEvent[] = [];
    for await (const event of source) {
      events.push(event);
      source.close();
    }
    expect(events).toHaveLength(1);
  });

  it('stops when a wait is cut short', async () => {
    const source = new MidiFileNoteSource(TIMELINE, { clock: () => 0, sleep: async () => false });
    const events: RawNoteEvent[] = [];
    for await (const event of source) {
      events.push(event);
    }
    expect(events.map((event) => event.rawPitch)).toEqual([60]);
  });

  it('rejects a non-positive speed', () => {
    expect(() => new MidiFileNoteSource(TIMELINE, { speed: 0 })).toThrow(NoteSourceError);
  });

  it('reports a missing file as a NoteSourceError', async () => {
    const missing = join(tmpdir(), 'scale-trainer-missing-file.mid');
    await expect(MidiFileNoteSource.fromFile(missing)).rejects.toThrow(NoteSourceError);
  });
});
