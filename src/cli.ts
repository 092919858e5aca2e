#!/usr/bin/env node
/**
 * scale-trainer - practice scale degrees and modes against typed notes or a MIDI file.
 *
 * Display output goes to stdout; logging goes to stderr.
 * Exit codes: 0 after a normal session, 1 on configuration or input errors.
 */

import { PracticeEngine } from './engine/core';
import { NoteSourceError, PracticeConfigError } from './engine/errors';
import { runPracticeSession } from './engine/runSession';
import { ConsoleReporter } from './services/ConsoleReporter';
import { MidiFileNoteSource } from './services/MidiFileNoteSource';
import { TextNoteSource } from './services/TextNoteSource';
import type { NoteEventSource } from './types/practice';
import {
  USAGE,
  mergeConfigInput,
  parseCliArguments,
  readConfigFile,
  type CliArguments,
} from './utils/cliArgs';
import { parsePracticeConfig } from './utils/configValidation';
import { createLogger, setVerboseLogging } from './utils/logger';

const log = createLogger('cli');

async function openSource(cli: CliArguments): Promise<NoteEventSource> {
  if (cli.midiFile !== null) {
    return MidiFileNoteSource.fromFile(cli.midiFile, { speed: cli.speed });
  }
  return new TextNoteSource(process.stdin, { name: 'stdin' });
}

export async function main(argv: string[]): Promise<number> {
  let cli: CliArguments;
  try {
    cli = parseCliArguments(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (cli.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  setVerboseLogging(cli.verbose);

  let engine: PracticeEngine;
  let source: NoteEventSource;
  try {
    const fileInput = cli.configPath !== null ? await readConfigFile(cli.configPath) : {};
    const config = parsePracticeConfig(mergeConfigInput(fileInput, cli.overrides));
    if (config.verbose) setVerboseLogging(true);

    engine = new PracticeEngine(config);
    source = await openSource(cli);
  } catch (error) {
    if (error instanceof PracticeConfigError || error instanceof NoteSourceError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  const reporter = new ConsoleReporter({ stats: () => engine.stats });
  engine.on(reporter.handle);

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    await runPracticeSession({ engine, source, signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
  }
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log.error('Fatal error', error);
      process.exitCode = 1;
    });
}
