import { readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { NoteSourceError } from '../engine/errors';
import type { Clock, NoteEventSource, RawNoteEvent } from '../types/practice';
import { createLogger } from '../utils/logger';
import { parseMidiNoteEvents, type MidiNoteTimeline } from '../utils/midiImport';

const log = createLogger('MidiFileNoteSource');

/**
 * Waits ms, resolving false instead when the signal aborts.
 */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<boolean>;

export interface MidiFileNoteSourceOptions {
  /** Playback speed multiplier (2 = twice as fast) */
  speed?: number;
  clock?: Clock;
  sleep?: Sleeper;
}

const realSleep: Sleeper = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
};

/**
 * Replays a Standard MIDI File as live key events.
 *
 * Events are released at their scheduled times relative to the start of
 * iteration and stamped with that time on the session clock.
 */
export class MidiFileNoteSource implements NoteEventSource {
  readonly name: string;
  readonly timeline: MidiNoteTimeline;

  private readonly speed: number;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly controller = new AbortController();

  constructor(timeline: MidiNoteTimeline, options: MidiFileNoteSourceOptions = {}) {
    const speed = options.speed ?? 1;
    if (!Number.isFinite(speed) || speed <= 0) {
      throw new NoteSourceError(`Playback speed must be a positive number, got ${speed}`);
    }
    this.timeline = timeline;
    this.name = `MIDI file: ${timeline.name}`;
    this.speed = speed;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? realSleep;
  }

  /**
   * Reads and parses a MIDI file.
   *
   * @throws NoteSourceError if the file cannot be read or is not a MIDI file
   */
  static async fromFile(path: string, options: MidiFileNoteSourceOptions = {}): Promise<MidiFileNoteSource> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new NoteSourceError(`Cannot read MIDI file '${path}'`, { cause: error });
    }

    let timeline: MidiNoteTimeline;
    try {
      timeline = parseMidiNoteEvents(bytes, path);
    } catch (error) {
      throw new NoteSourceError(`'${path}' is not a valid MIDI file`, { cause: error });
    }

    return new MidiFileNoteSource(timeline, options);
  }

  public close(): void {
    this.controller.abort();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RawNoteEvent> {
    const signal = this.controller.signal;
    const startedAt = this.clock();
    const { name, noteCount, tempo, durationMs } = this.timeline;
    log.info('Replay started', { name, notes: noteCount, tempo, speed: this.speed, playbackMs: Math.round(durationMs / this.speed) });

    for (const event of this.timeline.events) {
      if (signal.aborted) break;

      const due = startedAt + event.timestamp / this.speed;
      const wait = due - this.clock();
      if (wait > 0) {
        const completed = await this.sleep(wait, signal);
        if (!completed) break;
      }

      yield { ...event, timestamp: due };
    }

    log.info('Replay finished', { name: this.timeline.name, aborted: signal.aborted });
  }
}
