/**
 * PromptGenerator - produces the next Round for the configured practice type.
 *
 * Delegates the choice of notes to a pluggable PromptStrategy and stamps each
 * plan with an id, a session-wide number and a frozen expected sequence.
 */

import { v4 as uuidv4 } from 'uuid';
import type { FeedbackPolicy, PracticeType, Round } from '../types/practice';
import type { PracticeConfig } from '../types/practiceConfig';
import type { Rng } from '../utils/rng';
import { resolvePromptStrategy, type PromptStrategy } from './strategies';

export class PromptGenerator {
  private readonly strategy: PromptStrategy;
  private roundsGenerated = 0;

  constructor(config: PracticeConfig, rng: Rng) {
    this.strategy = resolvePromptStrategy(config.practiceType, { config, rng });
  }

  public get practiceType(): PracticeType {
    return this.strategy.type;
  }

  public get strategyName(): string {
    return this.strategy.name;
  }

  public get feedback(): FeedbackPolicy {
    return this.strategy.feedback;
  }

  /**
   * Generates the next Round. The expected sequence is immutable from here on.
   */
  public nextRound(): Round {
    const plan = this.strategy.nextPlan();
    this.roundsGenerated += 1;

    const positions = plan.positions.map((position) => Object.freeze({ ...position }));

    return {
      ...plan,
      positions,
      id: uuidv4(),
      number: this.roundsGenerated,
      expected: Object.freeze(positions.map((position) => position.expected)),
    };
  }
}
