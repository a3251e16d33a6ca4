/**
 * Conversation Memory
 *
 * Bounded, ordered turn log for one session plus the single-slot cache of the
 * active thread. The log is trimmed oldest-first whenever it exceeds either
 * its turn-count or its token budget; the active thread is held outside the
 * log and is never touched by that trimming.
 *
 * Memory instances are cheap and short-lived: the orchestrator rebuilds one
 * from a SessionRecord for every message and writes the result back with
 * `toRecordFields()`.
 *
 * @example
 * ```typescript
 * const memory = ConversationMemory.fromRecord(record, { maxTurns: 20, tokenBudget: 3000 });
 * memory.append({ role: 'student', text: 'What is entropy?', type: 'new_question', timestamp: now });
 * const prompt = memory.formatContext(6);
 * ```
 */

import type { ActiveThread, SessionRecord, Turn } from '../models';

// ============================================================================
// Configuration
// ============================================================================

export interface MemoryBudget {
  /** Maximum number of retained turns */
  maxTurns: number;
  /** Maximum estimated tokens across retained turns */
  tokenBudget: number;
}

export const DEFAULT_MEMORY_BUDGET: MemoryBudget = {
  maxTurns: 20,
  tokenBudget: 3000,
};

/** Per-turn truncation applied when formatting context for prompts */
const CONTEXT_TURN_MAX_CHARS = 200;

export const EMPTY_CONVERSATION_CONTEXT = 'This is the start of our conversation.';

/**
 * Rough token estimate: four characters per token.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

// ============================================================================
// ConversationMemory
// ============================================================================

export class ConversationMemory {
  private turns: Turn[];
  private appended: number;
  private thread: ActiveThread | null;

  constructor(
    private readonly budget: MemoryBudget = DEFAULT_MEMORY_BUDGET,
    initial?: { turns: Turn[]; totalTurns: number; activeThread: ActiveThread | null }
  ) {
    this.turns = initial ? [...initial.turns] : [];
    this.appended = initial?.totalTurns ?? 0;
    this.thread = initial?.activeThread ?? null;
    this.evict();
  }

  static fromRecord(record: SessionRecord, budget?: MemoryBudget): ConversationMemory {
    return new ConversationMemory(budget, {
      turns: record.turns,
      totalTurns: record.totalTurns,
      activeThread: record.activeThread,
    });
  }

  /**
   * Appends a turn and trims the log back under budget.
   */
  append(turn: Turn): void {
    this.turns.push(turn);
    this.appended += 1;
    this.evict();
  }

  /**
   * The most recent `k` retained turns, oldest first.
   */
  recent(k: number): Turn[] {
    if (k <= 0) return [];
    return this.turns.slice(-k);
  }

  /** All retained turns, oldest first */
  get all(): readonly Turn[] {
    return this.turns;
  }

  /** Turns appended since creation or the last reset, including evicted ones */
  get totalTurns(): number {
    return this.appended;
  }

  get activeThread(): ActiveThread | null {
    return this.thread;
  }

  setActiveThread(thread: ActiveThread | null): void {
    this.thread = thread;
  }

  /**
   * Clears both the turn log and the active thread.
   */
  reset(): void {
    this.turns = [];
    this.appended = 0;
    this.thread = null;
  }

  /**
   * Renders the last `k` turns as prompt context, one line per turn.
   */
  formatContext(k: number = 6): string {
    const recent = this.recent(k);
    if (recent.length === 0) {
      return EMPTY_CONVERSATION_CONTEXT;
    }
    return recent
      .map((turn) => {
        const speaker = turn.role === 'student' ? 'Student' : 'Tutor';
        const text =
          turn.text.length > CONTEXT_TURN_MAX_CHARS
            ? `${turn.text.slice(0, CONTEXT_TURN_MAX_CHARS)}...`
            : turn.text;
        return `${speaker}: ${text}`;
      })
      .join('\n');
  }

  /**
   * Fields to write back onto a SessionRecord.
   */
  toRecordFields(): Pick<SessionRecord, 'turns' | 'totalTurns' | 'activeThread'> {
    return {
      turns: [...this.turns],
      totalTurns: this.appended,
      activeThread: this.thread,
    };
  }

  private evict(): void {
    while (this.turns.length > this.budget.maxTurns) {
      this.turns.shift();
    }
    let tokens = this.turns.reduce((sum, turn) => sum + estimateTokens(turn.text), 0);
    // Always keep the newest turn, even if it alone exceeds the budget
    while (tokens > this.budget.tokenBudget && this.turns.length > 1) {
      const dropped = this.turns.shift();
      if (dropped) tokens -= estimateTokens(dropped.text);
    }
  }
}
