/**
 * ScaleDegreeStrategy - interval-from-root prompts.
 *
 * Picks a root, asks for the root itself once (the root gate), then prompts
 * random interval labels above it. After the configured number of prompts a
 * new root is drawn.
 */

import type { PitchClass, PositionSpec, RoundPlan } from '../../types/practice';
import type { PracticeConfig } from '../../types/practiceConfig';
import { createLogger } from '../../utils/logger';
import { pickRandom, randomInt, type Rng } from '../../utils/rng';
import { INTERVAL_LABELS, type IntervalLabel } from '../models';
import {
  intervalName,
  intervalToPitchClass,
  noteName,
  spellingForKey,
} from '../pitchClass';
import type { PromptStrategy, StrategyConfig } from './types';

const log = createLogger('ScaleDegreeStrategy');

export class ScaleDegreeStrategy implements PromptStrategy {
  readonly name = 'Scale Degree';
  readonly type = 'scale-degree' as const;
  readonly feedback = 'immediate' as const;

  private readonly config: PracticeConfig;
  private readonly rng: Rng;
  private currentRoot: PitchClass | null = null;
  private promptsRemaining = 0;
  private previousLabel: IntervalLabel | null = null;

  constructor({ config, rng }: StrategyConfig) {
    this.config = config;
    this.rng = rng;
  }

  /** Root of the current block, or null before the first Round */
  public get root(): PitchClass | null {
    return this.currentRoot;
  }

  /** Interval prompts left before a new root is drawn */
  public get promptsLeftForRoot(): number {
    return this.promptsRemaining;
  }

  public nextPlan(): RoundPlan {
    let newRoot = false;
    if (this.currentRoot === null || this.promptsRemaining <= 0) {
      this.currentRoot = this.pickRoot(this.currentRoot);
      const { min, max } = this.config.promptsPerRoot;
      this.promptsRemaining = randomInt(min, max, this.rng);
      newRoot = true;
      log.debug('New root', { root: noteName(this.currentRoot), prompts: this.promptsRemaining });
    }

    const root = this.currentRoot;
    const label = this.pickLabel();
    this.promptsRemaining -= 1;
    this.previousLabel = label;

    const keySpelling = spellingForKey(root);
    const rootName = noteName(root, keySpelling);
    const target = intervalToPitchClass(root, label);
    const targetName = intervalName(root, label);

    const positions: PositionSpec[] = [];
    if (newRoot) {
      positions.push({
        index: 0,
        expected: root,
        expectedName: rootName,
        role: 'root',
        leg: 'root',
        noteNumber: 1,
        scored: false,
      });
    }
    positions.push({
      index: positions.length,
      expected: target,
      expectedName: targetName,
      role: 'target',
      leg: 'target',
      noteNumber: 1,
      scored: true,
    });

    const legs = positions.map((position) => ({ name: position.leg, start: position.index, length: 1 }));

    return {
      kind: this.type,
      prompt: `Play the ${label} (from ${rootName})`,
      root,
      rootName,
      spelling: keySpelling,
      positions,
      legs,
      feedback: this.feedback,
      intervalLabel: label,
      newRoot,
    };
  }

  /**
   * Draws a root from the pool. Under 'avoid-repeat' the previous root is
   * skipped whenever the pool has another choice.
   */
  private pickRoot(previous: PitchClass | null): PitchClass {
    const pool = this.config.rootPool;
    const candidates =
      this.config.rootRepeatPolicy === 'avoid-repeat' && previous !== null && pool.length > 1
        ? pool.filter((pc) => pc !== previous)
        : pool;
    return pickRandom(candidates, this.rng);
  }

  /**
   * Draws an interval label, never the same label twice in a row.
   */
  private pickLabel(): IntervalLabel {
    const labels = INTERVAL_LABELS.filter((label) => this.config.includeUnison || label !== '1');
    const candidates =
      this.previousLabel !== null && labels.length > 1
        ? labels.filter((label) => label !== this.previousLabel)
        : labels;
    return pickRandom(candidates, this.rng);
  }
}

/**
 * Creates a ScaleDegreeStrategy instance.
 */
export function createScaleDegreeStrategy(config: StrategyConfig): ScaleDegreeStrategy {
  return new ScaleDegreeStrategy(config);
}
