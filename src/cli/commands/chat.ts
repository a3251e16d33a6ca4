/**
 * Chat Command Handler
 *
 * The interactive tutoring loop:
 *
 * 1. Prints the banner with the session id and corpus size
 * 2. Reads one line at a time and sends it to the orchestrator
 * 3. Prints the tutor's reply (and, with --verbose, what the engine did)
 * 4. Handles /help, /state, /reset and /quit
 *
 * Lines are processed strictly one after another. Sessions are stored, so
 * `tutor chat --session <id>` picks a conversation up where it stopped,
 * until it expires.
 *
 * Usage:
 * ```bash
 * tutor chat --session biology --verbose
 * ```
 */

import * as readline from 'node:readline';
import { randomUUID } from 'node:crypto';
import { isUpstreamError } from '../../core/errors';
import { MAX_SCAFFOLD_LEVEL } from '../../core/models';
import type { MessageOutcome, OrchestratorEvent, TutorOrchestrator } from '../../core/session';
import {
  bold,
  dim,
  formatScaffoldLevel,
  formatTutorMessage,
  printBlankLine,
  printChatBanner,
  printCommandsHelp,
  red,
  yellow,
} from '../utils/terminal';

export interface ChatOptions {
  /** Resume or name a session; a fresh id is generated when absent */
  session?: string;
  /** Print orchestrator events as they are delivered */
  verbose?: boolean;
}

export interface ChatContext {
  orchestrator: Pick<
    TutorOrchestrator,
    'handleMessage' | 'reset' | 'getSessionState' | 'setEventListener'
  >;
  sessionId: string;
}

export type SlashCommandResult = 'quit' | 'handled';

/**
 * One-line rendering of an orchestrator event for --verbose.
 */
export function formatEvent(event: OrchestratorEvent): string {
  switch (event.type) {
    case 'intent_classified':
      return `intent: ${event.data.intent} (${event.data.source}, confidence ${event.data.confidence.toFixed(2)})`;
    case 'thread_opened':
      return `thread opened: "${event.data.question}" with ${event.data.chunkCount} passage(s)`;
    case 'no_material':
      return `no material (${event.data.reason}) for "${event.data.question}"`;
    case 'scaffold_transitioned':
      return `scaffold: level ${event.data.from.level} -> ${event.data.to.level} (${event.data.tier})`;
    case 'thread_resolved':
      return `thread resolved: ${event.data.outcome} after ${event.data.attempts} attempt(s)`;
    case 'upstream_retry':
      return `retrying ${event.data.operation}: ${event.data.error}`;
    case 'message_failed':
      return `message failed (${event.data.code}): ${event.data.message}`;
  }
}

/**
 * Status line shown under a reply with --verbose.
 */
export function formatOutcomeSummary(outcome: MessageOutcome): string {
  const parts: string[] = [outcome.turnType, outcome.templateId];
  if (outcome.scaffold) {
    parts.push(`level ${formatScaffoldLevel(outcome.scaffold.level, MAX_SCAFFOLD_LEVEL)}`);
  }
  if (outcome.evaluation) {
    parts.push(`${outcome.evaluation.tier} ${outcome.evaluation.weightedScore.toFixed(2)}`);
  }
  if (!outcome.threadOpen) {
    parts.push('no open question');
  }
  return `[${parts.join(' · ')}]`;
}

/**
 * Handles a line starting with '/'.
 */
export async function handleSlashCommand(command: string, ctx: ChatContext): Promise<SlashCommandResult> {
  const normalizedCommand = command.toLowerCase().split(' ')[0];

  switch (normalizedCommand) {
    case '/quit':
    case '/exit':
    case '/q':
      console.log(dim(`Session ${ctx.sessionId} saved. Resume it with: tutor chat --session ${ctx.sessionId}`));
      return 'quit';

    case '/reset':
      await ctx.orchestrator.reset(ctx.sessionId);
      console.log(yellow('Conversation cleared. Ask a new question whenever you are ready.'));
      return 'handled';

    case '/state':
    case '/s': {
      const state = await ctx.orchestrator.getSessionState(ctx.sessionId);
      printBlankLine();
      console.log(bold('Session State:'));
      console.log(`  Session: ${ctx.sessionId}`);
      console.log(`  Open question: ${state.activeThreadPresent ? 'yes' : 'no'}`);
      console.log(`  Scaffold level: ${formatScaffoldLevel(state.scaffoldLevel, MAX_SCAFFOLD_LEVEL)} (${state.scaffoldLevel})`);
      console.log(`  Turns: ${state.turnCount}`);
      printBlankLine();
      return 'handled';
    }

    case '/help':
    case '/h':
    case '/?':
      printCommandsHelp();
      return 'handled';

    default:
      console.log(yellow(`Unknown command: ${command}`));
      console.log(dim('Type /help to see available commands.'));
      return 'handled';
  }
}

/**
 * Sends one student line and prints the outcome. Upstream trouble prints
 * the apology and leaves the session as it was, so the student can resend.
 */
export async function sendLine(text: string, ctx: ChatContext, verbose: boolean): Promise<void> {
  try {
    const outcome = await ctx.orchestrator.handleMessage(ctx.sessionId, text);
    printBlankLine();
    console.log(formatTutorMessage(outcome.reply));
    if (verbose) {
      console.log(dim(formatOutcomeSummary(outcome)));
    }
    printBlankLine();
  } catch (error) {
    if (isUpstreamError(error)) {
      console.log(yellow(`\n${error.apology}`));
      if (verbose) console.log(dim(error.message));
      printBlankLine();
      return;
    }
    console.log(red('\nError processing your message:'));
    console.log(dim(error instanceof Error ? error.message : String(error)));
    printBlankLine();
  }
}

/**
 * Runs the interactive loop until /quit or end of input.
 */
export async function runChatCommand(
  orchestrator: ChatContext['orchestrator'],
  indexedChunks: number,
  options: ChatOptions = {}
): Promise<void> {
  const ctx: ChatContext = {
    orchestrator,
    sessionId: options.session ?? `cli_${randomUUID().slice(0, 8)}`,
  };
  const verbose = options.verbose ?? false;

  if (verbose) {
    orchestrator.setEventListener((event) => console.log(dim(`  · ${formatEvent(event)}`)));
  }

  printChatBanner(ctx.sessionId, indexedChunks);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: bold('You: '),
  });

  rl.on('SIGINT', () => {
    console.log(dim('\n\nReceived Ctrl+C...'));
    rl.close();
  });

  rl.prompt();
  for await (const input of rl) {
    const trimmedInput = input.trim();
    if (!trimmedInput) {
      rl.prompt();
      continue;
    }

    if (trimmedInput.startsWith('/')) {
      const result = await handleSlashCommand(trimmedInput, ctx);
      if (result === 'quit') break;
    } else {
      await sendLine(trimmedInput, ctx, verbose);
    }
    rl.prompt();
  }

  rl.close();
  orchestrator.setEventListener(undefined);
}
