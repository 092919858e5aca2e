import { Midi } from '@tonejs/midi';
import type { RawNoteEvent } from '../types/practice';
import { createLogger } from './logger';

const log = createLogger('midiImport');

/**
 * Key events extracted from a Standard MIDI File.
 *
 * TERMINOLOGY:
 * - Timeline: every note of every track as on/off key events, in playback order
 * - Timestamps are milliseconds from the start of the file
 */
export interface MidiNoteTimeline {
  /** On/off events sorted by timestamp; at equal times note-offs come first */
  events: RawNoteEvent[];
  /** Number of notes (on/off pairs) found */
  noteCount: number;
  /** Tempo of the first tempo event, 120 when the file has none */
  tempo: number;
  /** File name without extension, or the track name */
  name: string;
  /** Length of the timeline in ms (time of the last event) */
  durationMs: number;
}

/**
 * Parses a MIDI file into a key-event timeline for replay.
 *
 * @param data - The MIDI file bytes
 * @param fileName - Optional file name for naming
 */
export function parseMidiNoteEvents(data: ArrayBuffer | Uint8Array, fileName?: string): MidiNoteTimeline {
  const midiData = new Midi(data);
  const events: RawNoteEvent[] = [];
  let noteCount = 0;

  log.debug('MIDI file loaded', {
    tracks: midiData.tracks.length,
    fileName: fileName ?? 'unknown',
  });

  midiData.tracks.forEach((track, trackIndex) => {
    log.debug(`Track ${trackIndex}: ${track.notes.length} notes`);
    track.notes.forEach((note) => {
      const start = Math.round(note.time * 1000);
      const end = Math.round((note.time + note.duration) * 1000);
      // @tonejs/midi reports velocity as 0-1
      const velocity = Math.max(1, Math.round(note.velocity * 127));
      events.push({ rawPitch: note.midi, velocity, kind: 'on', timestamp: start });
      events.push({ rawPitch: note.midi, velocity: 0, kind: 'off', timestamp: Math.max(start, end) });
      noteCount++;
    });
  });

  events.sort(compareEvents);

  const tempo = midiData.header.tempos.length > 0
    ? Math.round(midiData.header.tempos[0].bpm)
    : 120;

  const trackName = midiData.tracks.find((track) => track.name.length > 0)?.name;
  const name = fileName ? fileName.replace(/^.*[\\/]/, '').replace(/\.[^/.]+$/, '') : trackName ?? 'Untitled';

  const timeline: MidiNoteTimeline = {
    events,
    noteCount,
    tempo,
    name,
    durationMs: events.length > 0 ? events[events.length - 1].timestamp : 0,
  };

  log.info('Parsed MIDI timeline', { name, notes: noteCount, tempo, durationMs: timeline.durationMs });
  return timeline;
}

function compareEvents(a: RawNoteEvent, b: RawNoteEvent): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  if (a.kind !== b.kind) return a.kind === 'off' ? -1 : 1;
  return a.rawPitch - b.rawPitch;
}
