/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for the interactive tutor. In non-TTY
 * environments the codes pass through harmlessly.
 *
 * Usage:
 * ```typescript
 * import { bold, formatTutorMessage, printChatBanner } from './terminal';
 *
 * printChatBanner('sess_1', 42);
 * console.log(formatTutorMessage('What does the excerpt say the membrane lets through?'));
 * ```
 */

// =============================================================================
// Text Style Modifiers
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** For secondary information like hints, ids and event traces */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/** Reserved for the tutor's words */
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats a tutor reply. Continuation lines (options, the source line) are
 * indented under the label.
 *
 * @example
 * formatTutorMessage('Which fits best?\nA) ...\nB) ...');
 * // "Tutor: Which fits best?\n       A) ...\n       B) ..." in cyan
 */
export function formatTutorMessage(message: string): string {
  const [first = '', ...rest] = message.split('\n');
  const body = [first, ...rest.map((line) => `       ${line}`)].join('\n');
  return cyan(`Tutor: ${body}`);
}

/**
 * Shows the scaffold level as filled and empty pips, e.g. `●●○○`.
 */
export function formatScaffoldLevel(level: number, maxLevel: number = 4): string {
  const filled = Math.max(0, Math.min(level, maxLevel));
  return '●'.repeat(filled) + '○'.repeat(maxLevel - filled);
}

export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * @example
 * formatCommandHelp('/reset', 'Start over');
 * // "  /reset     - Start over"
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

export function printBlankLine(): void {
  console.log();
}

/**
 * Prints the banner shown when a chat starts.
 */
export function printChatBanner(sessionId: string, indexedChunks: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Socratic Scaffold - Tutoring Session'));
  console.log(formatSeparator(60));
  console.log(`  Session: ${green(sessionId)}`);
  console.log(`  Indexed passages: ${yellow(indexedChunks.toString())}`);
  console.log(formatSeparator(60));
  if (indexedChunks === 0) {
    console.log(yellow('  No documents ingested yet. Run "tutor ingest <file>" first.'));
  }
  printBlankLine();
  console.log(dim('  Ask a question about your material. Commands: /help | /state | /reset | /quit'));
  printBlankLine();
}

/**
 * Prints the slash commands available during a chat.
 */
export function printCommandsHelp(): void {
  printBlankLine();
  console.log(bold('Available Commands:'));
  console.log(formatCommandHelp('/state', 'Show the open question and scaffold level'));
  console.log(formatCommandHelp('/reset', 'Clear the conversation and start over'));
  console.log(formatCommandHelp('/help', 'Show this help message'));
  console.log(formatCommandHelp('/quit', 'Exit (the session is kept)'));
  printBlankLine();
}
