import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Clock, NoteEventSource, RawNoteEvent } from '../types/practice';
import { createLogger } from '../utils/logger';
import { parseChordToken } from '../utils/noteParser';

const log = createLogger('TextNoteSource');

const TYPED_VELOCITY = 100;

export interface ParsedNoteLine {
  events: RawNoteEvent[];
  /** Tokens that were not notes */
  invalid: string[];
}

/**
 * Turns one typed line into key events.
 *
 * Tokens are separated by whitespace or commas. "E4" is one key press and
 * release; "C3+C4" presses both keys together before releasing them.
 */
export function parseNoteLine(line: string, timestamp: number): ParsedNoteLine {
  const events: RawNoteEvent[] = [];
  const invalid: string[] = [];

  for (const token of line.split(/[\s,]+/).filter((part) => part.length > 0)) {
    const notes = parseChordToken(token);
    if (notes === null) {
      invalid.push(token);
      continue;
    }
    for (const rawPitch of notes) {
      events.push({ rawPitch, velocity: TYPED_VELOCITY, kind: 'on', timestamp });
    }
    for (const rawPitch of notes) {
      events.push({ rawPitch, velocity: 0, kind: 'off', timestamp });
    }
  }

  return { events, invalid };
}

export interface TextNoteSourceOptions {
  clock?: Clock;
  name?: string;
}

/**
 * Reads typed notes from a text stream (stdin by default), one or more per line.
 */
export class TextNoteSource implements NoteEventSource {
  readonly name: string;

  private readonly input: Readable;
  private readonly clock: Clock;
  private reader: Interface | null = null;
  private closed = false;

  constructor(input: Readable, options: TextNoteSourceOptions = {}) {
    this.input = input;
    this.clock = options.clock ?? Date.now;
    this.name = options.name ?? 'typed notes';
  }

  public close(): void {
    this.closed = true;
    this.reader?.close();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RawNoteEvent> {
    if (this.closed) return;

    const reader = createInterface({ input: this.input, terminal: false });
    this.reader = reader;
    try {
      for await (const line of reader) {
        if (this.closed) break;

        const { events, invalid } = parseNoteLine(line, this.clock());
        if (invalid.length > 0) {
          log.warn('Ignoring tokens that are not notes', { tokens: invalid });
        }
        yield* events;
      }
    } finally {
      reader.close();
      this.reader = null;
    }
  }
}
