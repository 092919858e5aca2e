/**
 * Formatting utilities for display purposes.
 */

import { computeAccuracy } from '../engine/statistics';
import type {
  LegName,
  MistakeRecord,
  PositionResult,
  Round,
  RoundResult,
  SessionStats,
  TimeoutHint,
} from '../types/practice';

const LEG_TITLES: Readonly<Record<LegName, string>> = {
  root: 'Root',
  target: 'Target',
  ascending: 'Ascending',
  descending: 'Descending',
};

/**
 * Formats a percentage with one decimal, e.g. "83.3%".
 */
export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Formats milliseconds as seconds with one decimal, e.g. "4.2s".
 */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatLegName(leg: LegName): string {
  return LEG_TITLES[leg];
}

/**
 * The scale of a Mode Round spelled out: "F# - G# - A# - B - C# - D# - E# - F#".
 * Uses the ascending leg only.
 */
export function formatScale(round: Round): string {
  return round.positions
    .filter((position) => position.leg === 'ascending')
    .map((position) => position.expectedName)
    .join(' - ');
}

/**
 * Prompt lines for a new Round.
 * A Scale-Degree Round that opens a new root asks for the root first; its
 * interval prompt is shown after the root is played.
 */
export function formatRoundStart(round: Round): string[] {
  if (round.kind === 'mode') {
    return [`Round ${round.number}: ${round.prompt}`, `Scale: ${formatScale(round)}`, 'Play it ascending, then descending.'];
  }
  if (round.newRoot) {
    return [`Round ${round.number}: Play the root: ${round.rootName}`];
  }
  return [`Round ${round.number}: ${round.prompt}`];
}

/**
 * One position's verdict: "✓ D" or "✗ Expected D, played C#".
 */
export function formatVerdict(result: PositionResult): string {
  const label = result.role === 'root' ? 'Root ' : '';
  switch (result.outcome) {
    case 'correct':
      return `✓ ${label}${result.expectedName}`;
    case 'incorrect':
      return `✗ ${label}Expected ${result.expectedName}, played ${result.observedName ?? '?'}`;
    case 'excluded':
      return `- ${label}${result.expectedName} (skipped)`;
  }
}

/**
 * Live progress echo for deferred feedback: "↑ 3" / "↓ 3".
 */
export function formatEcho(leg: LegName, noteNumber: number): string {
  const arrow = leg === 'descending' ? '↓' : '↑';
  return `${arrow} ${noteNumber}`;
}

/**
 * Batched verdicts grouped by leg:
 *
 *   Ascending:
 *     1: ✓ C
 *     2: ✗ Expected D, played C#
 */
export function formatVerdictsByLeg(results: readonly PositionResult[]): string[] {
  const lines: string[] = [];
  let currentLeg: LegName | null = null;
  for (const result of results) {
    if (result.leg !== currentLeg) {
      currentLeg = result.leg;
      lines.push(`${formatLegName(result.leg)}:`);
    }
    lines.push(`  ${result.noteNumber}: ${formatVerdict(result)}`);
  }
  return lines;
}

export function formatHint(hint: TimeoutHint): string {
  return `⏱ Time's up: the note is ${hint.expectedName}`;
}

export function formatEscape(excludedCount: number): string {
  const notes = excludedCount === 1 ? 'note' : 'notes';
  return `Round ended early (${excludedCount} ${notes} skipped)`;
}

/**
 * Round summary: "Round 3 passed in 4.2s", "Round 3 failed in 6.0s", "Round 3 escaped after 1.5s".
 */
export function formatRoundSummary(result: RoundResult): string {
  if (result.escaped) {
    return `Round ${result.roundNumber} escaped after ${formatSeconds(result.elapsedMs)}`;
  }
  const verdict = result.passed ? 'passed' : 'failed';
  return `Round ${result.roundNumber} ${verdict} in ${formatSeconds(result.elapsedMs)}`;
}

/**
 * "Correct: X | Incorrect: Y | Accuracy: Z%"
 */
export function formatStatsLine(stats: SessionStats): string {
  return `Correct: ${stats.positionsCorrect} | Incorrect: ${stats.positionsIncorrect} | Accuracy: ${formatPercent(computeAccuracy(stats))}`;
}

/**
 * "Note k: Expected X, played Y"
 */
export function formatMistake(mistake: MistakeRecord): string {
  return `Note ${mistake.noteNumber}: Expected ${mistake.expectedName}, played ${mistake.playedName}`;
}

/**
 * Error histogram sorted by note number: "Note 1: 2, Note 4: 1", or "none".
 */
export function formatErrorsByPosition(errorsByPosition: Record<number, number>): string {
  const entries = Object.entries(errorsByPosition)
    .map(([noteNumber, count]) => [Number(noteNumber), count] as const)
    .sort((a, b) => a[0] - b[0]);
  if (entries.length === 0) return 'none';
  return entries.map(([noteNumber, count]) => `Note ${noteNumber}: ${count}`).join(', ');
}

/**
 * Lines of the exit summary.
 */
export function formatSessionSummary(stats: SessionStats): string[] {
  const lines = [
    'Session summary',
    `Rounds: ${stats.roundsAttempted} attempted, ${stats.roundsCorrect} correct, ${stats.roundsEscaped} escaped`,
    formatStatsLine(stats),
    `Hints shown: ${stats.hintsShown}`,
    `Errors by note: ${formatErrorsByPosition(stats.errorsByPosition)}`,
  ];

  if (stats.recentMistakes.length > 0) {
    lines.push('Recent mistakes:');
    for (const mistake of stats.recentMistakes) {
      lines.push(`  ${formatMistake(mistake)} (${mistake.prompt})`);
    }
  }
  return lines;
}
