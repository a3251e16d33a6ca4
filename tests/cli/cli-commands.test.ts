/**
 * Unit Tests: CLI Commands and Formatting
 *
 * Console output is captured with a spy; the orchestrator and ingestor are
 * replaced by small fakes.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  formatEvent,
  formatOutcomeSummary,
  handleSlashCommand,
  sendLine,
  type ChatContext,
} from '../../src/cli/commands/chat';
import { runIngestCommand, titleFromPath } from '../../src/cli/commands/ingest';
import { runDocumentsCommand } from '../../src/cli/commands/documents';
import {
  cyan,
  formatScaffoldLevel,
  formatTutorMessage,
  yellow,
} from '../../src/cli/utils/terminal';
import { UPSTREAM_APOLOGY, UpstreamFailure } from '../../src/core/errors';
import type { IngestRequest, IngestResult } from '../../src/core/ingestion';
import type { MessageOutcome } from '../../src/core/session';

const STAMP = new Date('2026-01-15T10:00:00.000Z');

function makeOutcome(overrides: Partial<MessageOutcome> = {}): MessageOutcome {
  return {
    sessionId: 'cli_1',
    reply: 'What does the passage say about ATP?',
    turnType: 'answer_attempt',
    templateId: 'scaffold_hint',
    scaffold: { level: 1, attempts: 1, resolved: false },
    threadOpen: true,
    evaluation: {
      scores: { conceptualAccuracy: 2, reasoningCoherence: 2, evidenceUtilization: 2, conceptualIntegration: 2 },
      weightedScore: 0.5,
      tier: 'partial',
      feedback: 'Close.',
      suggestions: [],
    },
    citations: [],
    ...overrides,
  };
}

function fakeOrchestrator(): ChatContext['orchestrator'] {
  return {
    handleMessage: vi.fn(async () => makeOutcome()),
    reset: vi.fn(async () => undefined),
    getSessionState: vi.fn(async () => ({ activeThreadPresent: true, scaffoldLevel: 2 as const, turnCount: 6 })),
    setEventListener: vi.fn(),
  };
}

let logSpy: MockInstance<typeof console.log>;

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  logSpy.mockRestore();
});

// ============================================================================
// Terminal formatting
// ============================================================================

describe('terminal formatting', () => {
  it('should render scaffold levels as pips', () => {
    expect(formatScaffoldLevel(0)).toBe('○○○○');
    expect(formatScaffoldLevel(3)).toBe('●●●○');
    expect(formatScaffoldLevel(9)).toBe('●●●●');
  });

  it('should indent continuation lines of a tutor message', () => {
    expect(formatTutorMessage('Which fits?\nA) one')).toBe(cyan('Tutor: Which fits?\n       A) one'));
  });
});

// ============================================================================
// Chat
// ============================================================================

describe('formatEvent', () => {
  it('should describe a scaffold transition', () => {
    expect(
      formatEvent({
        type: 'scaffold_transitioned',
        sessionId: 's1',
        timestamp: STAMP,
        data: {
          from: { level: 0, attempts: 0, resolved: false },
          to: { level: 1, attempts: 1, resolved: false },
          tier: 'fail',
        },
      })
    ).toBe('scaffold: level 0 -> 1 (fail)');
  });

  it('should describe a classified intent with its confidence', () => {
    expect(
      formatEvent({
        type: 'intent_classified',
        sessionId: 's1',
        timestamp: STAMP,
        data: { intent: 'meta_question', source: 'ambiguous', confidence: 0.4 },
      })
    ).toBe('intent: meta_question (ambiguous, confidence 0.40)');
  });
});

describe('formatOutcomeSummary', () => {
  it('should list turn type, template, level and tier', () => {
    expect(formatOutcomeSummary(makeOutcome())).toBe('[answer_attempt · scaffold_hint · level ●○○○ · partial 0.50]');
  });

  it('should note when no question is open', () => {
    expect(
      formatOutcomeSummary(
        makeOutcome({
          turnType: 'new_question',
          templateId: 'no_material',
          scaffold: null,
          threadOpen: false,
          evaluation: undefined,
        })
      )
    ).toBe('[new_question · no_material · no open question]');
  });
});

describe('handleSlashCommand', () => {
  it('should print the session state', async () => {
    const ctx: ChatContext = { orchestrator: fakeOrchestrator(), sessionId: 'cli_1' };

    const result = await handleSlashCommand('/state', ctx);

    expect(result).toBe('handled');
    expect(logSpy).toHaveBeenCalledWith('  Scaffold level: ●●○○ (2)');
    expect(logSpy).toHaveBeenCalledWith('  Turns: 6');
  });

  it('should reset the session', async () => {
    const ctx: ChatContext = { orchestrator: fakeOrchestrator(), sessionId: 'cli_1' };

    await handleSlashCommand('/reset', ctx);

    expect(ctx.orchestrator.reset).toHaveBeenCalledWith('cli_1');
  });

  it('should quit on /quit and its aliases', async () => {
    const ctx: ChatContext = { orchestrator: fakeOrchestrator(), sessionId: 'cli_1' };

    expect(await handleSlashCommand('/quit', ctx)).toBe('quit');
    expect(await handleSlashCommand('/Q', ctx)).toBe('quit');
  });

  it('should report unknown commands', async () => {
    const ctx: ChatContext = { orchestrator: fakeOrchestrator(), sessionId: 'cli_1' };

    expect(await handleSlashCommand('/dance', ctx)).toBe('handled');
    expect(logSpy).toHaveBeenCalledWith(yellow('Unknown command: /dance'));
  });
});

describe('sendLine', () => {
  it('should print the tutor reply', async () => {
    const ctx: ChatContext = { orchestrator: fakeOrchestrator(), sessionId: 'cli_1' };

    await sendLine('Energy?', ctx, false);

    expect(ctx.orchestrator.handleMessage).toHaveBeenCalledWith('cli_1', 'Energy?');
    expect(logSpy).toHaveBeenCalledWith(cyan('Tutor: What does the passage say about ATP?'));
  });

  it('should print the apology when the tutor is unavailable', async () => {
    const orchestrator = fakeOrchestrator();
    orchestrator.handleMessage = vi.fn(async () => {
      throw new UpstreamFailure('utterance.scaffold_hint', 'overloaded');
    });

    await sendLine('Energy?', { orchestrator, sessionId: 'cli_1' }, false);

    expect(logSpy).toHaveBeenCalledWith(yellow(`\n${UPSTREAM_APOLOGY}`));
  });
});

// ============================================================================
// Ingest and documents
// ============================================================================

describe('runIngestCommand', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tutor-ingest-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function recordingIngestor() {
    const requests: IngestRequest[] = [];
    return {
      requests,
      ingest: async (request: IngestRequest): Promise<IngestResult> => {
        requests.push(request);
        return { document: { id: 'doc_1', title: request.title, createdAt: STAMP }, chunkCount: 2 };
      },
    };
  }

  it('should title the document after the file', async () => {
    const file = join(dir, 'photosynthesis.txt');
    await writeFile(file, 'Light reactions.\n\nCalvin cycle.', 'utf8');
    const ingestor = recordingIngestor();

    const result = await runIngestCommand(ingestor, file);

    expect(ingestor.requests).toEqual([{ title: 'photosynthesis', text: 'Light reactions.\n\nCalvin cycle.' }]);
    expect(result.chunkCount).toBe(2);
  });

  it('should prefer an explicit title', async () => {
    const file = join(dir, 'notes.md');
    await writeFile(file, 'Some notes.', 'utf8');
    const ingestor = recordingIngestor();

    await runIngestCommand(ingestor, file, { title: '  Week 3 Notes ' });

    expect(ingestor.requests[0].title).toBe('Week 3 Notes');
  });

  it('should strip directories and extensions from titles', () => {
    expect(titleFromPath('/home/student/biology/cell-cycle.txt')).toBe('cell-cycle');
  });
});

describe('runDocumentsCommand', () => {
  it('should return the summaries it printed', async () => {
    const summaries = [{ id: 'doc_1', title: 'Genetics', createdAt: STAMP, chunkCount: 4 }];

    const result = await runDocumentsCommand({ findAllWithChunkCounts: async () => summaries });

    expect(result).toEqual(summaries);
    expect(logSpy).not.toHaveBeenCalledWith(yellow('  No documents found.'));
  });

  it('should say when nothing has been ingested', async () => {
    const result = await runDocumentsCommand({ findAllWithChunkCounts: async () => [] });

    expect(result).toEqual([]);
    expect(logSpy).toHaveBeenCalledWith(yellow('  No documents found.'));
  });
});
