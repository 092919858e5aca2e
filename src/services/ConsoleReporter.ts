import type { DisplayEvent, Round, SessionStats } from '../types/practice';
import {
  formatEcho,
  formatEscape,
  formatHint,
  formatRoundStart,
  formatRoundSummary,
  formatSessionSummary,
  formatStatsLine,
  formatVerdict,
  formatVerdictsByLeg,
} from '../utils/formatUtils';

export type LineWriter = (line: string) => void;

export interface ConsoleReporterOptions {
  /** Where display lines go; defaults to stdout */
  write?: LineWriter;
  /** Statistics shown after each Round */
  stats?: () => SessionStats;
}

/**
 * Renders engine display events as terminal lines.
 *
 * Holds the open Round so a Scale-Degree interval prompt can be shown right
 * after its root has been played.
 */
export class ConsoleReporter {
  private readonly write: LineWriter;
  private readonly stats: (() => SessionStats) | undefined;
  private round: Round | null = null;

  constructor(options: ConsoleReporterOptions = {}) {
    this.write = options.write ?? ((line) => {
      process.stdout.write(`${line}\n`);
    });
    this.stats = options.stats;
  }

  /** Listener to pass to PracticeEngine.on() */
  public readonly handle = (event: DisplayEvent): void => {
    switch (event.type) {
      case 'round-start':
        this.round = event.round;
        this.lines(formatRoundStart(event.round));
        break;

      case 'verdict':
        this.write(formatVerdict(event.result));
        if (event.result.role === 'root' && this.round !== null && this.round.id === event.roundId) {
          this.write(this.round.prompt);
        }
        break;

      case 'echo':
        this.write(formatEcho(event.leg, event.noteNumber));
        break;

      case 'verdicts':
        this.lines(formatVerdictsByLeg(event.results));
        break;

      case 'hint':
        this.write(formatHint(event.hint));
        break;

      case 'escape':
        this.write(formatEscape(event.excludedCount));
        break;

      case 'round-complete':
        this.round = null;
        this.write(formatRoundSummary(event.result));
        if (this.stats) {
          this.write(formatStatsLine(this.stats()));
        }
        this.write('');
        break;

      case 'round-abandoned':
        this.round = null;
        this.write('Round discarded.');
        break;

      case 'session-summary':
        this.write('');
        this.lines(formatSessionSummary(event.stats));
        break;
    }
  };

  private lines(lines: string[]): void {
    for (const line of lines) {
      this.write(line);
    }
  }
}
