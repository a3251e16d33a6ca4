/**
 * Scaffolding State Machine
 *
 * Per-thread support level, advanced only by evaluated answer attempts:
 *
 *   adequate | strong  -> resolved (level unchanged)
 *   fail | partial     -> level + 1; reaching level 4 delivers the direct
 *                         answer and resolves the thread
 *
 * Level 4 is terminal even without a passing tier, so a struggling student
 * is never stuck in a remediation loop. Resolved states accept no further
 * transitions. Meta questions never reach this module.
 *
 * All functions are pure.
 */

import type { PerformanceTier, ScaffoldLevel, ScaffoldState, ScaffoldStrategy } from '../models';
import { MAX_SCAFFOLD_LEVEL } from '../models';
import { InvariantViolation } from '../errors';
import { isPassingTier } from '../scoring/aggregation';

export type TransitionOutcome = 'mastered' | 'escalated' | 'exhausted';

export interface ScaffoldTransition {
  previous: ScaffoldState;
  next: ScaffoldState;
  outcome: TransitionOutcome;
  /** Strategy for the reply that accompanies this transition */
  strategy: ScaffoldStrategy;
}

const STRATEGY_BY_LEVEL: Record<ScaffoldLevel, ScaffoldStrategy> = {
  0: 'opening',
  1: 'hint',
  2: 'analogy',
  3: 'multiple_choice',
  4: 'direct_answer',
};

const LEVELS: readonly ScaffoldLevel[] = [0, 1, 2, 3, 4];

/**
 * State for a freshly opened thread.
 */
export function initialScaffoldState(): ScaffoldState {
  return { level: 0, attempts: 0, resolved: false };
}

export function strategyForLevel(level: ScaffoldLevel): ScaffoldStrategy {
  return STRATEGY_BY_LEVEL[level];
}

function escalate(level: ScaffoldLevel): ScaffoldLevel {
  return LEVELS[Math.min(level + 1, MAX_SCAFFOLD_LEVEL)];
}

/**
 * Applies one evaluated answer attempt.
 *
 * @throws InvariantViolation when the state is already resolved
 */
export function transition(state: ScaffoldState, tier: PerformanceTier): ScaffoldTransition {
  if (state.resolved) {
    throw new InvariantViolation(
      `Scaffold transition requested on a resolved thread (level ${state.level})`
    );
  }

  const attempts = state.attempts + 1;

  if (isPassingTier(tier)) {
    return {
      previous: state,
      next: { level: state.level, attempts, resolved: true },
      outcome: 'mastered',
      strategy: strategyForLevel(state.level),
    };
  }

  const level = escalate(state.level);
  const exhausted = level === MAX_SCAFFOLD_LEVEL;
  return {
    previous: state,
    next: { level, attempts, resolved: exhausted },
    outcome: exhausted ? 'exhausted' : 'escalated',
    strategy: strategyForLevel(level),
  };
}
