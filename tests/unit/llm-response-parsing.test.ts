/**
 * Unit Tests: LLM Response Parsing
 *
 * Models do not always answer in clean JSON. These tests cover the parsers
 * for the classifier, reasoning and judge replies:
 *
 * - Valid JSON, raw, fenced, or wrapped in prose
 * - Coercible values (numbers sent as strings)
 * - Defaults for optional fields
 * - Rejection of malformed or out-of-contract replies as 'invalid_response'
 *
 * These are pure unit tests - no database or external dependencies required.
 */

import { describe, it, expect } from 'vitest';
import {
  extractJsonFromResponse,
  parseDimensionJudgment,
  parseIntentJudgment,
  parseReasoningArtifact,
} from '../../src/llm/prompts';
import { LLMError } from '../../src/llm/types';

// =============================================================================
// Helper Functions for Tests
// =============================================================================

/**
 * Runs `fn` and returns the LLMError it throws.
 */
function captureLLMError(fn: () => unknown): LLMError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LLMError) return error;
    throw error;
  }
  throw new Error('Expected an LLMError to be thrown');
}

// =============================================================================
// Section 1: JSON extraction
// =============================================================================

describe('extractJsonFromResponse', () => {
  it('should pull JSON out of a fenced code block', () => {
    expect(extractJsonFromResponse('Here:\n```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should cut from the first brace to the last around prose', () => {
    expect(extractJsonFromResponse('Sure! {"a":{"b":2}} Hope that helps')).toBe('{"a":{"b":2}}');
  });

  it('should return text without braces unchanged apart from trimming', () => {
    expect(extractJsonFromResponse('  no json here  ')).toBe('no json here');
  });
});

// =============================================================================
// Section 2: Intent classifier replies
// =============================================================================

describe('parseIntentJudgment', () => {
  it('should parse a raw JSON reply', () => {
    expect(parseIntentJudgment('{"label":"answer_attempt","confidence":0.82}')).toEqual({
      label: 'answer_attempt',
      confidence: 0.82,
    });
  });

  it('should coerce a confidence sent as a string', () => {
    const reply = '```json\n{"label":"meta_question","confidence":"0.9"}\n```';

    expect(parseIntentJudgment(reply)).toEqual({ label: 'meta_question', confidence: 0.9 });
  });

  it('should reject an unknown label', () => {
    const error = captureLLMError(() => parseIntentJudgment('{"label":"greeting","confidence":0.9}'));

    expect(error.type).toBe('invalid_response');
    expect(error.message).toContain('label');
  });

  it('should reject a confidence above 1', () => {
    const error = captureLLMError(() =>
      parseIntentJudgment('{"label":"new_question","confidence":1.5}')
    );

    expect(error.type).toBe('invalid_response');
  });

  it('should reject prose with no JSON', () => {
    const error = captureLLMError(() => parseIntentJudgment('I think this is an answer.'));

    expect(error.type).toBe('invalid_response');
    expect(error.message).toBe('Intent classifier reply was not valid JSON: I think this is an answer.');
  });
});

// =============================================================================
// Section 3: Expert reasoning replies
// =============================================================================

describe('parseReasoningArtifact', () => {
  const question = 'Why do cells need mitochondria?';

  it('should build an artifact for the asked question', () => {
    const reply = JSON.stringify({
      steps: [
        { statement: 'Mitochondria produce ATP.', citedChunkIds: ['chk_1'] },
        { statement: 'Cells spend ATP to do work.', citedChunkIds: ['chk_2'] },
      ],
      finalAnswer: 'They supply the ATP cells run on.',
      misconceptions: ['They store genetic material.'],
      sufficient: true,
    });

    expect(parseReasoningArtifact(reply, question)).toEqual({
      question,
      steps: [
        { statement: 'Mitochondria produce ATP.', citedChunkIds: ['chk_1'] },
        { statement: 'Cells spend ATP to do work.', citedChunkIds: ['chk_2'] },
      ],
      finalAnswer: 'They supply the ATP cells run on.',
      misconceptions: ['They store genetic material.'],
      sufficient: true,
    });
  });

  it('should default missing citations and misconceptions to empty lists', () => {
    const reply = '{"steps":[{"statement":"ATP is made here."}],"finalAnswer":"ATP","sufficient":true}';

    const artifact = parseReasoningArtifact(reply, question);

    expect(artifact.steps).toEqual([{ statement: 'ATP is made here.', citedChunkIds: [] }]);
    expect(artifact.misconceptions).toEqual([]);
    expect(artifact.sufficient).toBe(true);
  });

  it('should mark a claimed-sufficient artifact without a final answer as insufficient', () => {
    const reply = '{"steps":[{"statement":"ATP is made here."}],"finalAnswer":"  ","sufficient":true}';

    expect(parseReasoningArtifact(reply, question).sufficient).toBe(false);
  });

  it('should keep an explicit insufficiency', () => {
    const reply = '{"steps":[],"finalAnswer":"","misconceptions":[],"sufficient":false}';

    expect(parseReasoningArtifact(reply, question)).toEqual({
      question,
      steps: [],
      finalAnswer: '',
      misconceptions: [],
      sufficient: false,
    });
  });

  it('should reject a reply without the sufficiency flag', () => {
    const error = captureLLMError(() =>
      parseReasoningArtifact('{"steps":[],"finalAnswer":"x"}', question)
    );

    expect(error.type).toBe('invalid_response');
    expect(error.message).toContain('sufficient');
  });
});

// =============================================================================
// Section 4: Answer judge replies
// =============================================================================

describe('parseDimensionJudgment', () => {
  it('should parse score, rationale and suggestion', () => {
    const reply = '{"score":3,"rationale":"Mostly right.","suggestion":"Mention ATP."}';

    expect(parseDimensionJudgment(reply)).toEqual({
      score: 3,
      rationale: 'Mostly right.',
      suggestion: 'Mention ATP.',
    });
  });

  it('should drop a null or blank suggestion', () => {
    expect(parseDimensionJudgment('{"score":"4","rationale":"Complete.","suggestion":null}')).toStrictEqual({
      score: 4,
      rationale: 'Complete.',
    });
    expect(parseDimensionJudgment('{"score":2,"rationale":"Gaps.","suggestion":"  "}')).toStrictEqual({
      score: 2,
      rationale: 'Gaps.',
    });
  });

  it('should leave an out-of-range score for the evaluator to clamp', () => {
    expect(parseDimensionJudgment('{"score":7,"rationale":"Generous."}').score).toBe(7);
  });

  it('should reject an empty rationale', () => {
    const error = captureLLMError(() => parseDimensionJudgment('{"score":1,"rationale":""}'));

    expect(error.type).toBe('invalid_response');
  });

  it('should reject a non-numeric score', () => {
    const error = captureLLMError(() => parseDimensionJudgment('{"score":"high","rationale":"Good."}'));

    expect(error.type).toBe('invalid_response');
  });
});
