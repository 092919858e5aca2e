/**
 * Strategies module - Exports all prompt strategies and the factory.
 */

import type { PracticeType } from '../../types/practice';
import { createModeStrategy } from './ModeStrategy';
import { createScaleDegreeStrategy } from './ScaleDegreeStrategy';
import type { PromptStrategy, StrategyConfig } from './types';

// Types
export type { PromptStrategy, StrategyConfig, StrategyFactory } from './types';

// Scale-Degree practice
export { ScaleDegreeStrategy, createScaleDegreeStrategy } from './ScaleDegreeStrategy';

// Mode practice
export { ModeStrategy, createModeStrategy } from './ModeStrategy';

/**
 * Resolves a prompt strategy by practice type.
 *
 * @throws Error if the practice type is not supported
 */
export function resolvePromptStrategy(type: PracticeType, config: StrategyConfig): PromptStrategy {
  switch (type) {
    case 'scale-degree':
      return createScaleDegreeStrategy(config);

    case 'mode':
      return createModeStrategy(config);

    default:
      throw new Error(`Unknown practice type: ${String(type)}`);
  }
}

/**
 * Returns all available practice types.
 */
export function getAvailablePracticeTypes(): PracticeType[] {
  return ['scale-degree', 'mode'];
}
