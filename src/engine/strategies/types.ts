/**
 * Prompt Strategy Types
 *
 * Defines the Strategy Pattern interface for the practice types.
 * Each strategy decides which notes the next Round expects; the matching
 * state machine and statistics are shared by all of them.
 */

import type { FeedbackPolicy, PracticeType, RoundPlan } from '../../types/practice';
import type { PracticeConfig } from '../../types/practiceConfig';
import type { Rng } from '../../utils/rng';

// ============================================================================
// Prompt Strategy Interface
// ============================================================================

/**
 * PromptStrategy: produces RoundPlans for one practice type.
 *
 * Strategies never read the note event stream.
 */
export interface PromptStrategy {
  /** Human-readable name of the practice type */
  readonly name: string;

  /** Unique identifier for the practice type */
  readonly type: PracticeType;

  /** When verdicts are revealed for Rounds of this type */
  readonly feedback: FeedbackPolicy;

  /**
   * Produces the next Round's expected sequence and display metadata.
   * May advance internal state (e.g. the prompts left for the current root).
   */
  nextPlan(): RoundPlan;
}

/**
 * Strategy configuration for instantiation.
 */
export interface StrategyConfig {
  /** Validated practice configuration */
  config: PracticeConfig;
  /** Source of randomness (seeded in tests) */
  rng: Rng;
}

/**
 * Factory function type for creating strategy instances.
 */
export type StrategyFactory = (config: StrategyConfig) => PromptStrategy;
