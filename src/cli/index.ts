#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point
 *
 * Available Commands:
 * - `chat` - Start or resume an interactive tutoring session
 * - `ingest <file>` - Add a plain-text document to the corpus
 * - `documents` - List ingested documents
 *
 * Usage:
 * ```bash
 * npm run cli -- ingest notes/cell-biology.txt --title "Cell Biology Notes"
 * npm run cli -- documents
 * npm run cli -- chat --session biology --verbose
 * ```
 *
 * `ingest` and `documents` only open the database; `chat` also needs
 * ANTHROPIC_API_KEY.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { ConfigValidationError } from '../config';
import { createCorpusRuntime, createTutorRuntime } from '../bootstrap';
import { TutorError } from '../core/errors';
import { runChatCommand } from './commands/chat';
import { runDocumentsCommand } from './commands/documents';
import { runIngestCommand } from './commands/ingest';
import { dim, red } from './utils/terminal';

/**
 * Builds the commander program. Each action opens the runtime it needs and
 * closes it when done.
 */
export function createProgram(): Command {
  const program = new Command('tutor')
    .description('Socratic tutoring over your own documents')
    .version('0.1.0');

  program
    .command('chat')
    .description('Start or resume an interactive tutoring session')
    .option('-s, --session <id>', 'session id to start or resume')
    .option('-v, --verbose', 'print what the tutor engine does on each turn', false)
    .action(async (options: { session?: string; verbose: boolean }) => {
      const runtime = await createTutorRuntime();
      try {
        await runChatCommand(runtime.orchestrator, runtime.corpus.size, options);
      } finally {
        runtime.close();
      }
    });

  program
    .command('ingest')
    .description('Add a plain-text document to the corpus')
    .argument('<file>', 'path to a UTF-8 text file')
    .option('-t, --title <title>', 'document title (defaults to the file name)')
    .action(async (file: string, options: { title?: string }) => {
      const runtime = await createCorpusRuntime();
      try {
        await runIngestCommand(runtime.ingestor, file, options);
      } finally {
        runtime.close();
      }
    });

  program
    .command('documents')
    .alias('docs')
    .description('List ingested documents')
    .action(async () => {
      const runtime = await createCorpusRuntime();
      try {
        await runDocumentsCommand(runtime.documents);
      } finally {
        runtime.close();
      }
    });

  return program;
}

/**
 * Prints a fatal error in the CLI's style and sets a failing exit code.
 */
export function reportFatal(error: unknown): void {
  if (error instanceof ConfigValidationError || error instanceof TutorError) {
    console.error(red(`Error: ${error.message}`));
  } else if (error instanceof Error) {
    console.error(red('\nFatal error:'));
    console.error(dim(error.message));
    if (process.env.DEBUG) {
      console.error(dim(error.stack ?? ''));
    }
  } else {
    console.error(red(`\nFatal error: ${String(error)}`));
  }
  process.exitCode = 1;
}

const entry = process.argv[1];
// Resolved through realpath so the installed `tutor` symlink also counts
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  createProgram().parseAsync(process.argv).catch(reportFatal);
}
