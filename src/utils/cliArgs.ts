/**
 * Command-line argument handling for the scale-trainer CLI.
 *
 * Flags are turned into an untrusted config input that is merged over the
 * optional JSON config file and then validated by parsePracticeConfig().
 */

import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { PracticeConfigError } from '../engine/errors';

export const USAGE = `Usage: scale-trainer [options]

Options:
  --type <scale-degree|mode>        Practice type (default: scale-degree)
  --modes <Ionian,Dorian,...>       Modes drawn in mode practice (default: Ionian,Aeolian)
  --pressure <none|low|medium|hard> Time pressure per note (default: medium)
  --roots <C,F,Bb,...>              Roots to draw from (default: all 12)
  --prompts <N|MIN-MAX>             Interval prompts per root (default: 5-7)
  --allow-repeat-root               Allow the same root twice in a row
  --include-unison                  Include "1" among the interval prompts
  --seed <N>                        Seed for repeatable prompts
  --midi-file <path>                Replay a MIDI file instead of reading typed notes
  --speed <N>                       MIDI replay speed (default: 1)
  --config <path>                   JSON file with practice settings
  --verbose                         Debug logging on stderr
  -h, --help                        Show this help

Type notes on stdin (e.g. "C4 E4 G4"). Play an octave chord ("C3+C4") to end a round early.
`;

export interface CliArguments {
  help: boolean;
  verbose: boolean;
  configPath: string | null;
  midiFile: string | null;
  speed: number;
  /** Config fields set by flags */
  overrides: Record<string, unknown>;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parses "6" or "5-7" into a prompt count range.
 */
export function parsePromptRange(value: string): { min: number; max: number } {
  const match = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/.exec(value);
  if (!match) {
    throw new PracticeConfigError(`--prompts: expected N or MIN-MAX, got '${value}'`);
  }
  const min = Number(match[1]);
  const max = match[2] === undefined ? min : Number(match[2]);
  return { min, max };
}

/**
 * Roots are note names or pitch class numbers.
 */
function parseRoot(value: string): string | number {
  return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Parses argv (without the node and script entries).
 *
 * @throws TypeError on unknown flags or missing values (from node:util parseArgs)
 * @throws PracticeConfigError on malformed flag values
 */
export function parseCliArguments(argv: string[]): CliArguments {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      type: { type: 'string' },
      modes: { type: 'string' },
      pressure: { type: 'string' },
      roots: { type: 'string' },
      prompts: { type: 'string' },
      'allow-repeat-root': { type: 'boolean' },
      'include-unison': { type: 'boolean' },
      seed: { type: 'string' },
      'midi-file': { type: 'string' },
      speed: { type: 'string' },
      config: { type: 'string' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const overrides: Record<string, unknown> = {};
  if (values.type !== undefined) overrides.practiceType = values.type;
  if (values.modes !== undefined) overrides.enabledModes = splitList(values.modes);
  if (values.pressure !== undefined) overrides.timePressure = values.pressure;
  if (values.roots !== undefined) overrides.rootPool = splitList(values.roots).map(parseRoot);
  if (values.prompts !== undefined) overrides.promptsPerRoot = parsePromptRange(values.prompts);
  if (values['allow-repeat-root']) overrides.rootRepeatPolicy = 'allow-repeat';
  if (values['include-unison']) overrides.includeUnison = true;
  if (values.seed !== undefined) overrides.seed = Number(values.seed);
  if (values.verbose) overrides.verbose = true;

  const speed = values.speed === undefined ? 1 : Number(values.speed);
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new PracticeConfigError(`--speed: expected a positive number, got '${values.speed ?? ''}'`);
  }

  return {
    help: values.help ?? false,
    verbose: values.verbose ?? false,
    configPath: values.config ?? null,
    midiFile: values['midi-file'] ?? null,
    speed,
    overrides,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON config file.
 *
 * @throws PracticeConfigError if the file is unreadable, not JSON or not an object
 */
export async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PracticeConfigError(`cannot read config file '${path}': ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PracticeConfigError(`config file '${path}' is not valid JSON: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new PracticeConfigError(`config file '${path}' must contain a JSON object`);
  }
  return parsed;
}

/**
 * Flags win over the config file.
 */
export function mergeConfigInput(
  fileInput: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  return { ...fileInput, ...overrides };
}
