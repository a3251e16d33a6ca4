/**
 * LLM Types and Interfaces
 *
 * A thin abstraction over the Anthropic SDK types. The tutoring adapters
 * only depend on `CompletionClient`, so tests and alternative providers
 * can stand in for the real client.
 */

/**
 * Represents a single message in a conversation.
 * Messages alternate between 'user' and 'assistant' roles.
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Per-request options. All fields are optional and fall back to the
 * client's defaults.
 */
export interface LLMConfig {
  /**
   * The model to use for completions.
   * Defaults to 'claude-sonnet-4-5-20250929' (Claude Sonnet 4.5).
   */
  model?: string;

  /**
   * Maximum number of tokens to generate in the response.
   */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0). The judging and
   * classification prompts run at 0 so repeated calls agree.
   */
  temperature?: number;

  /** System prompt for this request */
  system?: string;
}

/**
 * Result of a complete (non-streaming) API call.
 */
export interface LLMResponse {
  text: string;

  /**
   * Token usage information for billing/tracking.
   * Null if usage data is not available.
   */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating */
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use' | null;
}

/**
 * The one capability the tutoring adapters need from an LLM client.
 */
export interface CompletionClient {
  complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Anthropic server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'invalid_response' // Output did not match the expected format
  | 'unknown';         // Unexpected error

/**
 * Custom error class for LLM-related errors.
 * Includes the error type for easier handling.
 */
export class LLMError extends Error {
  type: LLMErrorType;
  cause?: Error;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message);
    this.name = 'LLMError';
    this.type = type;
    this.cause = cause;
  }
}
