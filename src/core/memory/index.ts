export {
  ConversationMemory,
  DEFAULT_MEMORY_BUDGET,
  EMPTY_CONVERSATION_CONTEXT,
  estimateTokens,
} from './conversation-memory';
export type { MemoryBudget } from './conversation-memory';
