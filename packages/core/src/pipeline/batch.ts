import { BatchAbortedError, EmptyBatchResultError, getErrorMessage } from "../errors";
import { type DocumentLoader, documentLoader } from "../ingestion/documentLoader";
import type { Diagnostic, MergedRow, TranscriptResult } from "../types/transcript";
import { type PipelineDeps, processTranscript } from "./transcriptPipeline";

export interface BatchFile {
  fileName: string;
  content: Buffer;
}

export interface BatchOptions extends PipelineDeps {
  loader?: DocumentLoader;
  /** Files processed at the same time. Defaults to 2. */
  concurrency?: number;
  timestampPattern?: RegExp;
}

export interface BatchResult {
  rows: MergedRow[];
  /** One per submitted file, in submission order. */
  results: TranscriptResult[];
  diagnostics: Diagnostic[];
}

const DEFAULT_CONCURRENCY = 2;

/**
 * Runs worker over items with at most `limit` in flight and resolves once
 * every item has settled. results[i] always belongs to items[i].
 */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runners = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(runners);
  return results;
}

/**
 * Flattens per-file results into rows: grouped by file in submission order,
 * then by the position of the source utterance. Quotes from the same
 * utterance keep their extraction order (Array.prototype.sort is stable).
 */
export function mergeResults(results: readonly TranscriptResult[]): MergedRow[] {
  const rows: MergedRow[] = [];
  for (const result of results) {
    const ordered = [...result.quotes].sort((a, b) => a.utteranceIdx - b.utteranceIdx);
    for (const quote of ordered) {
      rows.push({
        fileName: result.fileName,
        timestamp: quote.timestamp ?? "",
        topic: quote.topic,
        quote: quote.text,
      });
    }
  }
  return rows;
}

async function processFile(
  file: BatchFile,
  interviewerName: string,
  options: BatchOptions
): Promise<TranscriptResult> {
  const loader = options.loader ?? documentLoader;
  const logger = options.logger ?? console;

  let lines: string[];
  try {
    lines = await loader.extractLines(file.content, file.fileName);
  } catch (err) {
    const msg = getErrorMessage(err);
    logger.error(`  [Batch] ${file.fileName}: could not be read: ${msg}`);
    return {
      fileName: file.fileName,
      quotes: [],
      diagnostics: [{ fileName: file.fileName, kind: "ParseFailure", severity: "error", message: msg }],
    };
  }

  return processTranscript(
    {
      fileName: file.fileName,
      lines,
      interviewerName,
      timestampPattern: options.timestampPattern,
    },
    options
  );
}

/**
 * Runs the per-file pipeline over every file and merges the quotes into one
 * row sequence. Failed files only contribute diagnostics. Throws
 * EmptyBatchResultError when no file produced a row, and BatchAbortedError
 * when options.signal fires.
 */
export async function processBatch(
  files: readonly BatchFile[],
  interviewerName: string,
  options: BatchOptions
): Promise<BatchResult> {
  const logger = options.logger ?? console;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  logger.log(`  [Batch] Processing ${files.length} file(s) as interviewer "${interviewerName}"`);

  const results = await mapWithConcurrency(files, concurrency, async (file, index) => {
    if (options.signal?.aborted) throw new BatchAbortedError();
    const result = await processFile(file, interviewerName, options);
    logger.log(`  [Batch] ${file.fileName}: ${result.quotes.length} quotes (${index + 1}/${files.length})`);
    return result;
  });

  if (options.signal?.aborted) throw new BatchAbortedError();

  const diagnostics = results.flatMap((r) => r.diagnostics);
  const rows = mergeResults(results);

  if (rows.length === 0) {
    throw new EmptyBatchResultError(files.length, diagnostics);
  }

  logger.log(`  [Batch] Merged ${rows.length} rows from ${files.length} file(s), ${diagnostics.length} diagnostic(s)`);
  return { rows, results, diagnostics };
}
