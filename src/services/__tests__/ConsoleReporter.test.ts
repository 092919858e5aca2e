/**
 * Tests for terminal rendering of display events.
 */

import { describe, it, expect } from 'vitest';
import { PracticeEngine } from '../../engine/core';
import { createPracticeConfig } from '../../types/practiceConfig';
import { noteOn } from '../../utils/noteEvents';
import { ConsoleReporter } from '../ConsoleReporter';

function createSession(practiceType: 'scale-degree' | 'mode') {
  const engine = new PracticeEngine(
    createPracticeConfig({ practiceType, enabledModes: ['Ionian'], rootPool: [0], roundGapMs: 0 }),
    { rng: () => 0 }
  );
  const lines: string[] = [];
  const reporter = new ConsoleReporter({ write: (line) => lines.push(line), stats: () => engine.stats });
  engine.on(reporter.handle);
  return { engine, lines };
}

describe('ConsoleReporter', () => {
  it('asks for the root before the interval and shows verdicts right away', () => {
    const { engine, lines } = createSession('scale-degree');

    engine.start(0);
    engine.submit(noteOn(60, 100));
    engine.submit(noteOn(62, 200));
    engine.tick(300);

    expect(lines).toEqual([
      'Round 1: Play the root: C',
      '✓ Root C',
      'Play the b2 (from C)',
      '✗ Expected Db, played D',
      'Round 1 failed in 0.2s',
      'Correct: 0 | Incorrect: 1 | Accuracy: 0.0%',
      '',
      'Round 2: Play the 2 (from C)',
    ]);
  });

  it('echoes note numbers and reveals mode verdicts at the end', () => {
    const { engine, lines } = createSession('mode');

    engine.start(0);
    engine.submit(noteOn(60, 100));
    engine.submit(noteOn(61, 200));
    expect(lines).toEqual([
      'Round 1: Ionian in C',
      'Scale: C - D - E - F - G - A - B - C',
      'Play it ascending, then descending.',
      '↑ 1',
      '↑ 2',
    ]);

    // Escape chord ends the Round
    engine.submit(noteOn(52, 300));
    engine.submit(noteOn(64, 310));

    expect(lines.slice(7, 13)).toEqual([
      'Round ended early (12 notes skipped)',
      'Ascending:',
      '  1: ✓ C',
      '  2: ✗ Expected D, played C#',
      '  3: ✓ E',
      '  4: ✗ Expected F, played E',
    ]);
  });

  it('prints the session summary on finish', () => {
    const { engine, lines } = createSession('scale-degree');
    engine.start(0);
    engine.finish();

    expect(lines).toEqual([
      'Round 1: Play the root: C',
      'Round discarded.',
      '',
      'Session summary',
      'Rounds: 0 attempted, 0 correct, 0 escaped',
      'Correct: 0 | Incorrect: 0 | Accuracy: 0.0%',
      'Hints shown: 0',
      'Errors by note: none',
    ]);
  });
});
