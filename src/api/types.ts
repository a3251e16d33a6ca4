/**
 * API Types
 *
 * Response envelopes and request schemas for the tutoring HTTP API. Every
 * endpoint answers with either `ApiResponse<T>` or `ApiErrorResponse`, so a
 * client can branch on `success` alone.
 *
 * @example
 * ```typescript
 * const reply: ApiResponse<{ reply: string }> = {
 *   success: true,
 *   data: { reply: 'What does the excerpt on page 2 say the membrane lets through?' },
 * };
 *
 * const failure: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'EMPTY_MESSAGE', message: 'Message text must not be empty' },
 * };
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR' or 'UPSTREAM_TIMEOUT' */
  code: string;
  /** Human-readable message; for upstream failures this is safe to show a student */
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One field-level validation failure.
 */
export interface ValidationErrorDetail {
  /** Dot-separated path to the field, e.g. 'title' */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

/** Longest student message accepted in one request */
export const MAX_MESSAGE_LENGTH = 4000;

/**
 * Body of POST /api/sessions/:id/messages.
 *
 * Whitespace-only text passes here and is rejected by the orchestrator with
 * EMPTY_MESSAGE, so both surfaces report blank input the same way.
 */
export const sendMessageSchema = z.object({
  text: z
    .string({ required_error: 'Message text is required' })
    .min(1, 'Message text is required')
    .max(MAX_MESSAGE_LENGTH, `Message text must be ${MAX_MESSAGE_LENGTH} characters or less`),
});

export type SendMessageInput = z.infer<typeof sendMessageSchema>;

/**
 * Body of POST /api/documents.
 */
export const ingestDocumentSchema = z.object({
  title: z
    .string({ required_error: 'Title is required' })
    .trim()
    .min(1, 'Title is required')
    .max(200, 'Title must be 200 characters or less'),
  text: z.string({ required_error: 'Document text is required' }).min(1, 'Document text is required'),
});

export type IngestDocumentInput = z.infer<typeof ingestDocumentSchema>;

/**
 * Session ids arrive in the path; they are opaque to the engine but kept
 * to a safe character set.
 */
export const sessionIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, 'Session ID may only contain letters, digits, underscores and hyphens');
