/**
 * Tests for the StatisticsAggregator.
 */

import { describe, it, expect } from 'vitest';
import type { NoteEvent, RoundResult } from '../../types/practice';
import { noteOn } from '../../utils/noteEvents';
import { RoundMatcher } from '../matcher';
import { buildScale } from '../pitchClass';
import { StatisticsAggregator, computeAccuracy, createSessionStats } from '../statistics';
import { makeRootGateRound, makeRound } from './helpers';

function playRound(expected: number[], events: NoteEvent[], number = 1): RoundResult {
  const matcher = new RoundMatcher(makeRound(expected, { id: `round-${number}`, number }), {
    startedAt: 0,
    deadlineMs: null,
    coincidenceWindowMs: 60,
  });
  for (const event of events) {
    const result = matcher.submit(event);
    if (result) return result;
  }
  matcher.settle(Number.POSITIVE_INFINITY);
  if (matcher.result) return matcher.result;
  throw new Error('Round did not complete');
}

describe('StatisticsAggregator', () => {
  it('counts a passed Round', () => {
    const aggregator = new StatisticsAggregator();
    aggregator.record(playRound([0, 2], [noteOn(60, 0), noteOn(62, 100)]));

    expect(aggregator.snapshot()).toEqual({
      roundsAttempted: 1,
      roundsCorrect: 1,
      roundsEscaped: 0,
      positionsCorrect: 2,
      positionsIncorrect: 0,
      positionsExcluded: 0,
      hintsShown: 0,
      errorsByPosition: {},
      recentMistakes: [],
    });
  });

  it('counts mistakes per note number', () => {
    const aggregator = new StatisticsAggregator();
    aggregator.record(playRound([0, 2, 4], [noteOn(60, 0), noteOn(63, 100), noteOn(64, 200)]));

    const stats = aggregator.snapshot();
    expect(stats.roundsCorrect).toBe(0);
    expect(stats.positionsIncorrect).toBe(1);
    expect(stats.errorsByPosition).toEqual({ 2: 1 });
    expect(stats.recentMistakes).toEqual([
      { roundNumber: 1, prompt: 'Test scale', leg: 'ascending', noteNumber: 2, expectedName: 'D', playedName: 'D#' },
    ]);
  });

  it('excludes escaped positions from both counts', () => {
    const aggregator = new StatisticsAggregator();
    aggregator.record(playRound(buildScale(0, 'Ionian'), [noteOn(48, 0), noteOn(60, 20)]));

    const stats = aggregator.snapshot();
    expect(stats.roundsAttempted).toBe(1);
    expect(stats.roundsEscaped).toBe(1);
    expect(stats.positionsCorrect).toBe(1);
    expect(stats.positionsIncorrect).toBe(1);
    expect(stats.positionsExcluded).toBe(6);
  });

  it('does not count the root gate', () => {
    const aggregator = new StatisticsAggregator();
    const matcher = new RoundMatcher(makeRootGateRound(0, 7), { startedAt: 0, deadlineMs: null, coincidenceWindowMs: 60 });
    matcher.submit(noteOn(61, 0));
    matcher.submit(noteOn(67, 100));
    matcher.settle(200);
    const result = matcher.result;
    if (!result) throw new Error('Round did not complete');

    aggregator.record(result);
    const stats = aggregator.snapshot();
    expect(stats.positionsCorrect).toBe(1);
    expect(stats.positionsIncorrect).toBe(0);
    expect(stats.roundsCorrect).toBe(1);
  });

  it('records each Round once', () => {
    const aggregator = new StatisticsAggregator();
    const result = playRound([0], [noteOn(60, 0)]);

    expect(aggregator.record(result)).toBe(true);
    expect(aggregator.record(result)).toBe(false);
    expect(aggregator.snapshot().roundsAttempted).toBe(1);
  });

  it('skips a Round numbered before the last recorded one', () => {
    const aggregator = new StatisticsAggregator();
    expect(aggregator.record(playRound([0], [noteOn(60, 0)], 2))).toBe(true);
    expect(aggregator.record(playRound([0], [noteOn(61, 0)], 1))).toBe(false);
    expect(aggregator.snapshot()).toMatchObject({ roundsAttempted: 1, positionsIncorrect: 0 });
  });

  it('only ever increases the attempted count', () => {
    const aggregator = new StatisticsAggregator();
    let previous = 0;
    for (let i = 0; i < 5; i++) {
      aggregator.record(playRound([0, 2], [noteOn(60 + i, 0), noteOn(62, 10)], i + 1));
      const attempted = aggregator.snapshot().roundsAttempted;
      expect(attempted).toBe(previous + 1);
      previous = attempted;
    }
  });

  it('keeps only the most recent mistakes', () => {
    const aggregator = new StatisticsAggregator(createSessionStats(), 2);
    aggregator.record(playRound([0], [noteOn(61, 0)], 1));
    aggregator.record(playRound([0], [noteOn(62, 0)], 2));
    aggregator.record(playRound([0], [noteOn(63, 0)], 3));

    const stats = aggregator.snapshot();
    expect(stats.recentMistakes.map((mistake) => mistake.playedName)).toEqual(['D', 'D#']);
    expect(stats.errorsByPosition).toEqual({ 1: 3 });
  });

  it('writes into the injected accumulator and hands out copies', () => {
    const stats = createSessionStats();
    const aggregator = new StatisticsAggregator(stats);
    aggregator.record(playRound([0], [noteOn(61, 0)]));
    expect(stats.roundsAttempted).toBe(1);

    const snapshot = aggregator.snapshot();
    snapshot.roundsAttempted = 99;
    snapshot.errorsByPosition[1] = 99;
    snapshot.recentMistakes.length = 0;

    expect(aggregator.snapshot().roundsAttempted).toBe(1);
    expect(aggregator.snapshot().errorsByPosition).toEqual({ 1: 1 });
    expect(aggregator.snapshot().recentMistakes).toHaveLength(1);
  });
});

describe('computeAccuracy', () => {
  it('is 0 when nothing was scored', () => {
    expect(computeAccuracy(createSessionStats())).toBe(0);
  });

  it('is the share of correct scored positions', () => {
    const stats = { ...createSessionStats(), positionsCorrect: 3, positionsIncorrect: 1 };
    expect(computeAccuracy(stats)).toBe(75);
  });
});
