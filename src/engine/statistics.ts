/**
 * Statistics Aggregator
 *
 * Rolls terminal RoundResults into SessionStats. The accumulator is passed in
 * by its owner and this class is its only writer. Counters only grow; Rounds
 * arrive in number order, so a Round numbered at or below the last recorded
 * one is a repeat and is skipped. One aggregator serves one session.
 */

import type { MistakeRecord, RoundResult, SessionStats } from '../types/practice';
import { DEFAULT_ENGINE_CONSTANTS } from './models';

export function createSessionStats(): SessionStats {
  return {
    roundsAttempted: 0,
    roundsCorrect: 0,
    roundsEscaped: 0,
    positionsCorrect: 0,
    positionsIncorrect: 0,
    positionsExcluded: 0,
    hintsShown: 0,
    errorsByPosition: {},
    recentMistakes: [],
  };
}

/**
 * Percentage of scored positions played correctly (0 when nothing was scored).
 */
export function computeAccuracy(stats: SessionStats): number {
  const total = stats.positionsCorrect + stats.positionsIncorrect;
  if (total === 0) return 0;
  return (stats.positionsCorrect / total) * 100;
}

export class StatisticsAggregator {
  private readonly stats: SessionStats;
  private readonly maxRecentMistakes: number;
  private lastRoundNumber = 0;

  constructor(stats: SessionStats = createSessionStats(), maxRecentMistakes = DEFAULT_ENGINE_CONSTANTS.maxRecentMistakes) {
    this.stats = stats;
    this.maxRecentMistakes = maxRecentMistakes;
  }

  /**
   * Adds one terminal Round.
   *
   * @returns false when the Round was already recorded
   */
  public record(result: RoundResult): boolean {
    if (result.roundNumber <= this.lastRoundNumber) {
      return false;
    }
    this.lastRoundNumber = result.roundNumber;

    const stats = this.stats;
    stats.roundsAttempted += 1;
    if (result.passed) stats.roundsCorrect += 1;
    if (result.escaped) stats.roundsEscaped += 1;
    stats.hintsShown += result.hintCount;

    for (const position of result.positions) {
      if (position.outcome === 'excluded') {
        stats.positionsExcluded += 1;
        continue;
      }
      if (!position.scored) continue;

      if (position.outcome === 'correct') {
        stats.positionsCorrect += 1;
        continue;
      }

      stats.positionsIncorrect += 1;
      stats.errorsByPosition[position.noteNumber] = (stats.errorsByPosition[position.noteNumber] ?? 0) + 1;

      const mistake: MistakeRecord = {
        roundNumber: result.roundNumber,
        prompt: result.prompt,
        leg: position.leg,
        noteNumber: position.noteNumber,
        expectedName: position.expectedName,
        playedName: position.observedName ?? '?',
      };
      stats.recentMistakes.push(mistake);
      if (stats.recentMistakes.length > this.maxRecentMistakes) {
        stats.recentMistakes.shift();
      }
    }

    return true;
  }

  /**
   * Read-only copy for display.
   */
  public snapshot(): SessionStats {
    return {
      ...this.stats,
      errorsByPosition: { ...this.stats.errorsByPosition },
      recentMistakes: this.stats.recentMistakes.map((mistake) => ({ ...mistake })),
    };
  }
}
