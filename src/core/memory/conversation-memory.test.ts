/**
 * Tests for the bounded conversation memory.
 */

import { describe, it, expect } from 'vitest';
import { ConversationMemory, EMPTY_CONVERSATION_CONTEXT, estimateTokens } from './conversation-memory';
import type { ActiveThread, Turn } from '../models';

function turn(text: string, role: Turn['role'] = 'student'): Turn {
  return {
    role,
    text,
    timestamp: new Date('2026-01-01T00:00:00Z'),
    type: role === 'student' ? 'answer_attempt' : 'tutor_reply',
  };
}

const thread: ActiveThread = {
  question: 'What is pretotyping?',
  openedAt: new Date('2026-01-01T00:00:00Z'),
  artifact: {
    question: 'What is pretotyping?',
    steps: [{ statement: 'Pretotyping tests interest before building.', citedChunkIds: ['c1'] }],
    finalAnswer: 'Testing demand with a fake version before building',
    misconceptions: [],
    sufficient: true,
  },
  context: [],
  scaffold: { level: 2, attempts: 2, resolved: false },
};

// ============================================================================
// Turn log
// ============================================================================

describe('ConversationMemory', () => {
  describe('append and recent', () => {
    it('should keep turns in arrival order', () => {
      const memory = new ConversationMemory({ maxTurns: 10, tokenBudget: 1000 });

      memory.append(turn('first'));
      memory.append(turn('second', 'tutor'));
      memory.append(turn('third'));

      expect(memory.recent(2).map((t) => t.text)).toEqual(['second', 'third']);
      expect(memory.all.map((t) => t.text)).toEqual(['first', 'second', 'third']);
    });

    it('should return an empty list for non-positive k', () => {
      const memory = new ConversationMemory();
      memory.append(turn('hello'));

      expect(memory.recent(0)).toEqual([]);
    });
  });

  describe('eviction', () => {
    it('should evict the oldest turns beyond the turn limit', () => {
      const memory = new ConversationMemory({ maxTurns: 3, tokenBudget: 1000 });

      for (const text of ['a1', 'a2', 'a3', 'a4', 'a5']) {
        memory.append(turn(text));
      }

      expect(memory.all.map((t) => t.text)).toEqual(['a3', 'a4', 'a5']);
      expect(memory.totalTurns).toBe(5);
    });

    it('should evict the oldest turns beyond the token budget', () => {
      // Each 40-char turn estimates to 10 tokens
      const memory = new ConversationMemory({ maxTurns: 100, tokenBudget: 25 });
      const long = (c: string) => c.repeat(40);

      memory.append(turn(long('a')));
      memory.append(turn(long('b')));
      memory.append(turn(long('c')));

      expect(memory.all.map((t) => t.text[0])).toEqual(['b', 'c']);
    });

    it('should keep the newest turn even when it exceeds the budget alone', () => {
      const memory = new ConversationMemory({ maxTurns: 10, tokenBudget: 5 });

      memory.append(turn('x'.repeat(100)));

      expect(memory.all).toHaveLength(1);
    });

    it('should never evict the active thread', () => {
      const memory = new ConversationMemory({ maxTurns: 1, tokenBudget: 10 });
      memory.setActiveThread(thread);

      for (let i = 0; i < 5; i++) {
        memory.append(turn(`turn ${i} `.repeat(10)));
      }

      expect(memory.activeThread).toBe(thread);
    });
  });

  describe('reset', () => {
    it('should clear the turn log and the active thread', () => {
      const memory = new ConversationMemory();
      memory.append(turn('question'));
      memory.setActiveThread(thread);

      memory.reset();

      expect(memory.all).toEqual([]);
      expect(memory.totalTurns).toBe(0);
      expect(memory.activeThread).toBeNull();
    });
  });

  describe('formatContext', () => {
    it('should return the start-of-conversation line when empty', () => {
      expect(new ConversationMemory().formatContext()).toBe(EMPTY_CONVERSATION_CONTEXT);
    });

    it('should label speakers and truncate long turns to 200 characters', () => {
      const memory = new ConversationMemory();
      memory.append(turn('short question'));
      memory.append(turn('y'.repeat(250), 'tutor'));

      const lines = memory.formatContext().split('\n');

      expect(lines[0]).toBe('Student: short question');
      expect(lines[1]).toBe(`Tutor: ${'y'.repeat(200)}...`);
    });
  });

  describe('record round trip', () => {
    it('should rebuild from a record and write the same fields back', () => {
      const record = {
        id: 'sess_1',
        turns: [turn('q'), turn('r', 'tutor')],
        totalTurns: 7,
        activeThread: thread,
        createdAt: new Date(),
        lastActivityAt: new Date(),
      };

      const fields = ConversationMemory.fromRecord(record).toRecordFields();

      expect(fields.turns.map((t) => t.text)).toEqual(['q', 'r']);
      expect(fields.totalTurns).toBe(7);
      expect(fields.activeThread).toBe(thread);
    });
  });
});

describe('estimateTokens', () => {
  it('should round up to whole tokens at four characters each', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});
