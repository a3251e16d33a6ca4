/**
 * Anthropic Client Wrapper
 *
 * This module provides an abstraction layer over the Anthropic SDK.
 * It handles:
 * - API key configuration with clear error messages
 * - Per-request system prompts
 * - Error handling with typed errors
 *
 * The SDK's own retries are disabled: the session orchestrator owns the
 * retry and timeout policy for every upstream call.
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient({ timeoutMs: 30000 });
 * const response = await client.complete('What is osmosis?', {
 *   system: 'Answer in one sentence.',
 * });
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages/messages';
import type { LLMMessage, LLMConfig, LLMResponse, CompletionClient } from './types';
import { getAnthropicApiKey } from '../config';
import { LLMError, type LLMErrorType } from './types';

// Default model to use for all requests (Claude Sonnet 4.5)
const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// Default maximum tokens for responses
const DEFAULT_MAX_TOKENS = 1024;

// Default temperature for response generation
const DEFAULT_TEMPERATURE = 0.7;

// Default request timeout handed to the SDK
const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Construction options. Anything left out falls back to the defaults above,
 * and the API key to ANTHROPIC_API_KEY.
 */
export interface AnthropicClientOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

type RequestDefaults = Required<Omit<LLMConfig, 'system'>>;

/**
 * Wrapper class for the Anthropic API client.
 * Provides a simplified interface for making LLM calls with
 * typed error handling.
 */
export class AnthropicClient implements CompletionClient {
  /** The underlying Anthropic SDK client */
  private client: Anthropic;

  /** Default configuration for all requests */
  private defaultConfig: RequestDefaults;

  /**
   * Creates a new AnthropicClient instance.
   *
   * @param options - Optional configuration to override defaults
   * @throws ConfigValidationError if no API key is given and ANTHROPIC_API_KEY is not set
   *
   * @example
   * ```typescript
   * // Use defaults
   * const client = new AnthropicClient();
   *
   * // Custom configuration
   * const client = new AnthropicClient({
   *   model: 'claude-3-5-haiku-20241022',
   *   maxTokens: 2048,
   *   timeoutMs: 15000,
   * });
   * ```
   */
  constructor(options: AnthropicClientOptions = {}) {
    const apiKey = options.apiKey ?? getAnthropicApiKey();

    this.client = new Anthropic({
      apiKey,
      maxRetries: 0,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    this.defaultConfig = {
      model: options.model ?? DEFAULT_MODEL,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Makes an API call and returns the complete response.
   *
   * @param messages - Either a single string (treated as user message) or an array of messages
   * @param config - Optional configuration to override defaults for this request
   * @returns Promise resolving to the complete response with usage info
   * @throws LLMError on API errors
   *
   * @example
   * ```typescript
   * // Simple string input
   * const response = await client.complete('What is 2 + 2?');
   *
   * // With a system prompt and deterministic sampling
   * const response = await client.complete(userPrompt, {
   *   system: judgeSystemPrompt,
   *   temperature: 0,
   * });
   * ```
   */
  async complete(
    messages: string | LLMMessage[],
    config: LLMConfig = {}
  ): Promise<LLMResponse> {
    // Convert string input to message array
    const messageArray = this.normalizeMessages(messages);

    // Format messages for the Anthropic API
    const formattedMessages = this.formatMessages(messageArray);

    // Merge config with defaults
    const mergedConfig = this.mergeConfig(config);

    try {
      // Make the API call
      const response = await this.client.messages.create({
        model: mergedConfig.model,
        max_tokens: mergedConfig.maxTokens,
        temperature: mergedConfig.temperature,
        system: config.system,
        messages: formattedMessages,
      });

      // Extract text from the response content blocks
      const text = this.extractText(response.content);

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Normalizes input to always return an array of messages.
   * Converts a single string to a user message array.
   *
   * @param input - String or message array
   * @returns Normalized message array
   */
  private normalizeMessages(input: string | LLMMessage[]): LLMMessage[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input;
  }

  /**
   * Formats messages for the Anthropic API.
   * Converts our LLMMessage format to the SDK's MessageParam format.
   *
   * @param messages - Array of LLMMessage objects
   * @returns Array of MessageParam objects for the API
   */
  private formatMessages(messages: LLMMessage[]): MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  /**
   * Merges provided config with defaults.
   *
   * @param config - Partial config from the user
   * @returns Complete config with all required fields
   */
  private mergeConfig(config: LLMConfig): RequestDefaults {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Extracts text content from response content blocks.
   * Handles the case where response contains multiple content blocks.
   *
   * @param content - Array of content blocks from the API response
   * @returns Concatenated text from all text blocks
   */
  private extractText(
    content: Anthropic.Messages.ContentBlock[]
  ): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an API error to a typed LLMError.
   * Maps Anthropic SDK error types to our simplified error types.
   *
   * @param error - The error caught from the API call
   * @returns LLMError with appropriate type and message
   */
  private handleError(error: unknown): LLMError {
    // Handle timeout errors (must check before APIConnectionError since it extends it)
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError(
        'Request to Anthropic API timed out. Please try again.',
        'timeout',
        error
      );
    }

    // Handle network errors
    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    // Handle Anthropic SDK-specific errors
    if (error instanceof APIError) {
      const errorType = this.mapErrorType(error);
      return new LLMError(error.message, errorType, error);
    }

    // Handle unknown errors
    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  /**
   * Maps an Anthropic API error to our simplified error type.
   *
   * @param error - The Anthropic APIError
   * @returns The corresponding LLMErrorType
   */
  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
