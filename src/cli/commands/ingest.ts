/**
 * Ingest Command Handler
 *
 * Reads a plain-text file and adds it to the corpus. Pages are taken from
 * form feeds or `--- page N ---` markers; without either, the whole file is
 * page 1.
 *
 * Usage:
 * ```bash
 * tutor ingest notes/cell-biology.txt --title "Cell Biology Notes"
 * ```
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { DocumentIngestor, IngestResult } from '../../core/ingestion';
import { dim, green } from '../utils/terminal';

export interface IngestOptions {
  /** Defaults to the file name without its extension */
  title?: string;
}

/**
 * Derives a document title from a file path.
 *
 * @example
 * titleFromPath('notes/cell-biology.txt'); // 'cell-biology'
 */
export function titleFromPath(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export async function runIngestCommand(
  ingestor: Pick<DocumentIngestor, 'ingest'>,
  filePath: string,
  options: IngestOptions = {}
): Promise<IngestResult> {
  const text = await readFile(filePath, 'utf8');
  const title = options.title?.trim() || titleFromPath(filePath);

  const result = await ingestor.ingest({ title, text });

  console.log(green(`Ingested "${result.document.title}" as ${result.chunkCount} passage(s).`));
  console.log(dim(`Document ID: ${result.document.id}`));
  return result;
}
