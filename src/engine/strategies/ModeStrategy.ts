/**
 * ModeStrategy - full mode/scale prompts.
 *
 * Each Round is one mode on one root, played ascending (8 notes) and then
 * descending (the exact reverse), 16 positions in total.
 */

import type { LegName, PitchClass, PositionSpec, RoundPlan } from '../../types/practice';
import type { PracticeConfig } from '../../types/practiceConfig';
import { pickRandom, type Rng } from '../../utils/rng';
import { buildScale, spellScale, spellingOf } from '../pitchClass';
import type { PromptStrategy, StrategyConfig } from './types';

export class ModeStrategy implements PromptStrategy {
  readonly name = 'Mode';
  readonly type = 'mode' as const;
  readonly feedback = 'deferred' as const;

  private readonly config: PracticeConfig;
  private readonly rng: Rng;

  constructor({ config, rng }: StrategyConfig) {
    this.config = config;
    this.rng = rng;
  }

  public nextPlan(): RoundPlan {
    const mode = pickRandom(this.config.enabledModes, this.rng);
    const root = pickRandom(this.config.rootPool, this.rng);
    const names = spellScale(root, mode);
    const rootName = names[0];

    const ascending = buildScale(root, mode);
    const descending = [...ascending].reverse();

    const positions = [
      ...toPositions(ascending, names, 'ascending', 0),
      ...toPositions(descending, [...names].reverse(), 'descending', ascending.length),
    ];

    return {
      kind: this.type,
      prompt: `${mode} in ${rootName}`,
      root,
      rootName,
      spelling: spellingOf(names),
      positions,
      legs: [
        { name: 'ascending', start: 0, length: ascending.length },
        { name: 'descending', start: ascending.length, length: descending.length },
      ],
      feedback: this.feedback,
      mode,
    };
  }
}

function toPositions(
  scale: PitchClass[],
  names: string[],
  leg: LegName,
  startIndex: number
): PositionSpec[] {
  return scale.map((pc, i): PositionSpec => ({
    index: startIndex + i,
    expected: pc,
    expectedName: names[i],
    role: 'scale',
    leg,
    noteNumber: i + 1,
    scored: true,
  }));
}

/**
 * Creates a ModeStrategy instance.
 */
export function createModeStrategy(config: StrategyConfig): ModeStrategy {
  return new ModeStrategy(config);
}
