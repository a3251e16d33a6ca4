/**
 * JSON columns of the session tables are written from domain objects and
 * validated with zod on the way back, so a corrupted row surfaces as an
 * error at load time instead of as a malformed thread mid-conversation.
 */

import { z } from 'zod';
import type { ActiveThread, EvaluationResult } from '../core/models';

const subScoreSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

const evaluationResultSchema = z.object({
  scores: z.object({
    conceptualAccuracy: subScoreSchema,
    reasoningCoherence: subScoreSchema,
    evidenceUtilization: subScoreSchema,
    conceptualIntegration: subScoreSchema,
  }),
  weightedScore: z.number(),
  tier: z.enum(['fail', 'partial', 'adequate', 'strong']),
  feedback: z.string(),
  suggestions: z.array(z.string()),
});

const activeThreadSchema = z.object({
  question: z.string(),
  openedAt: z.coerce.date(),
  artifact: z.object({
    question: z.string(),
    steps: z.array(
      z.object({
        statement: z.string(),
        citedChunkIds: z.array(z.string()),
      })
    ),
    finalAnswer: z.string(),
    misconceptions: z.array(z.string()),
    sufficient: z.boolean(),
  }),
  context: z.array(
    z.object({
      chunkId: z.string(),
      documentId: z.string(),
      documentTitle: z.string(),
      location: z.string(),
      text: z.string(),
      score: z.number(),
    })
  ),
  scaffold: z.object({
    level: subScoreSchema,
    attempts: z.number().int().min(0),
    resolved: z.boolean(),
  }),
});

export function serializeThread(thread: ActiveThread | null): string | null {
  return thread === null ? null : JSON.stringify(thread);
}

export function deserializeThread(raw: string | null): ActiveThread | null {
  if (raw === null) return null;
  return activeThreadSchema.parse(JSON.parse(raw));
}

export function serializeEvaluation(evaluation: EvaluationResult | undefined): string | null {
  return evaluation === undefined ? null : JSON.stringify(evaluation);
}

export function deserializeEvaluation(raw: string | null): EvaluationResult | undefined {
  if (raw === null) return undefined;
  return evaluationResultSchema.parse(JSON.parse(raw));
}
