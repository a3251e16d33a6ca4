/**
 * Documents Command Handler
 *
 * Lists ingested documents with their passage counts, oldest first.
 */

import type { DocumentRepository, DocumentSummary } from '../../storage';
import { bold, dim, formatSeparator, printBlankLine, yellow } from '../utils/terminal';

/**
 * @example
 * formatDocumentLine({ id: 'doc_1', title: 'Cell Biology', chunkCount: 12, createdAt });
 * // "  Cell Biology  12 passage(s)  doc_1" (with styling)
 */
export function formatDocumentLine(summary: DocumentSummary): string {
  return `  ${bold(summary.title)}  ${summary.chunkCount} passage(s)  ${dim(summary.id)}`;
}

export async function runDocumentsCommand(
  documents: Pick<DocumentRepository, 'findAllWithChunkCounts'>
): Promise<DocumentSummary[]> {
  const summaries = await documents.findAllWithChunkCounts();

  printBlankLine();
  console.log(bold('Ingested Documents:'));
  console.log(formatSeparator(60));

  if (summaries.length === 0) {
    console.log(yellow('  No documents found.'));
    console.log(dim('  Run "tutor ingest <file>" to add one.'));
  } else {
    for (const summary of summaries) {
      console.log(formatDocumentLine(summary));
    }
  }

  console.log(formatSeparator(60));
  printBlankLine();
  return summaries;
}
