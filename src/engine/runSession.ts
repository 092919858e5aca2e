/**
 * Session loop: drives one PracticeEngine from one NoteEventSource.
 *
 * Events are consumed strictly one at a time. Deadlines are polled on a timer
 * between events, so a pending hint never blocks the next note. The loop ends
 * when the source is exhausted or the signal aborts. A Round whose last note
 * is still held is completed, an unfinished Round is discarded, and the
 * session summary is emitted either way.
 */

import type { Clock, NoteEventSource, SessionStats } from '../types/practice';
import { createLogger } from '../utils/logger';
import { createNoteEvent } from '../utils/noteEvents';
import type { PracticeEngine } from './core';

const log = createLogger('runPracticeSession');

export interface PracticeSessionOptions {
  engine: PracticeEngine;
  source: NoteEventSource;
  /** Session clock; must match the clock the source stamps events with */
  clock?: Clock;
  /** Ends the session (SIGINT in the CLI) */
  signal?: AbortSignal;
  /** Deadline polling interval; defaults to the engine's tickIntervalMs */
  tickIntervalMs?: number;
}

/**
 * Runs a practice session to completion.
 *
 * @returns final SessionStats snapshot
 */
export async function runPracticeSession(options: PracticeSessionOptions): Promise<SessionStats> {
  const { engine, source, signal } = options;
  const clock = options.clock ?? Date.now;
  const tickIntervalMs = options.tickIntervalMs ?? engine.constants.tickIntervalMs;

  if (signal?.aborted) {
    return engine.finish();
  }

  const onAbort = (): void => {
    log.info('Session interrupted', { source: source.name });
    source.close();
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  log.info('Session started', { source: source.name, practiceType: engine.config.practiceType });
  engine.start(clock());
  const timer = setInterval(() => engine.tick(clock()), tickIntervalMs);

  let eventCount = 0;
  try {
    for await (const raw of source) {
      if (signal?.aborted) break;
      eventCount++;
      engine.submit(createNoteEvent(raw));
    }
  } finally {
    clearInterval(timer);
    signal?.removeEventListener('abort', onAbort);
    engine.finish();
    log.info('Session ended', { events: eventCount });
  }

  return engine.stats;
}
