/**
 * Tests for the scaffolding state machine.
 */

import { describe, it, expect } from 'vitest';
import { initialScaffoldState, strategyForLevel, transition } from './scaffold-state-machine';
import { InvariantViolation } from '../errors';
import type { PerformanceTier, ScaffoldLevel, ScaffoldState } from '../models';

function run(tiers: PerformanceTier[], start: ScaffoldState = initialScaffoldState()): ScaffoldState[] {
  const states: ScaffoldState[] = [];
  let state = start;
  for (const tier of tiers) {
    state = transition(state, tier).next;
    states.push(state);
  }
  return states;
}

describe('scaffold state machine', () => {
  it('should start at level 0, unresolved, with no attempts', () => {
    expect(initialScaffoldState()).toEqual({ level: 0, attempts: 0, resolved: false });
  });

  it('should map levels to strategies', () => {
    const levels: ScaffoldLevel[] = [0, 1, 2, 3, 4];

    expect(levels.map(strategyForLevel)).toEqual([
      'opening',
      'hint',
      'analogy',
      'multiple_choice',
      'direct_answer',
    ]);
  });

  it('should escalate one level per failing attempt', () => {
    const result = transition(initialScaffoldState(), 'fail');

    expect(result.next).toEqual({ level: 1, attempts: 1, resolved: false });
    expect(result.outcome).toBe('escalated');
    expect(result.strategy).toBe('hint');
  });

  it('should treat partial like fail', () => {
    expect(transition(initialScaffoldState(), 'partial').next.level).toBe(1);
  });

  it('should walk 1, 2, 3 and resolve on reaching level 4', () => {
    const states = run(['fail', 'fail', 'fail', 'fail']);

    expect(states.map((s) => s.level)).toEqual([1, 2, 3, 4]);
    expect(states.map((s) => s.resolved)).toEqual([false, false, false, true]);
  });

  it('should report the exhausting transition with the direct-answer strategy', () => {
    const result = transition({ level: 3, attempts: 3, resolved: false }, 'partial');

    expect(result.outcome).toBe('exhausted');
    expect(result.strategy).toBe('direct_answer');
    expect(result.next).toEqual({ level: 4, attempts: 4, resolved: true });
  });

  it('should resolve an unresolved level-4 state on failure without exceeding level 4', () => {
    const result = transition({ level: 4, attempts: 4, resolved: false }, 'fail');

    expect(result.next).toEqual({ level: 4, attempts: 5, resolved: true });
  });

  it('should resolve directly from level 2 on a strong answer', () => {
    const result = transition({ level: 2, attempts: 2, resolved: false }, 'strong');

    expect(result.next).toEqual({ level: 2, attempts: 3, resolved: true });
    expect(result.outcome).toBe('mastered');
  });

  it('should resolve on an adequate answer at level 0', () => {
    expect(transition(initialScaffoldState(), 'adequate').next.resolved).toBe(true);
  });

  it('should never decrease the level within a thread', () => {
    const tiers: PerformanceTier[] = ['partial', 'fail', 'partial'];
    const levels = run(tiers).map((s) => s.level);

    for (let i = 1; i < levels.length; i++) {
      expect(levels[i]).toBeGreaterThanOrEqual(levels[i - 1]);
    }
  });

  it('should refuse transitions from a resolved state', () => {
    expect(() => transition({ level: 1, attempts: 2, resolved: true }, 'fail')).toThrow(
      InvariantViolation
    );
  });

  it('should not mutate the input state', () => {
    const state: ScaffoldState = { level: 1, attempts: 1, resolved: false };

    transition(state, 'fail');

    expect(state).toEqual({ level: 1, attempts: 1, resolved: false });
  });
});
