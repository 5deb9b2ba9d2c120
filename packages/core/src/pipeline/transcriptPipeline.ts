import { BatchAbortedError, CorrectionCountMismatchError, getErrorMessage } from "../errors";
import { parseTranscript } from "../ingestion/turnParser";
import type { TextGenerator } from "../llm/textGenerator";
import type { Logger } from "../logging";
import { categorizationStage } from "../stages/categorization";
import { correctionStage, passThroughCorrection } from "../stages/correction";
import { extractionStage } from "../stages/extraction";
import { DEFAULT_RETRY_POLICY, type RetryPolicy, runStage } from "../stages/stage";
import {
  type Diagnostic,
  type NormalizedUtterance,
  type Quote,
  type TranscriptResult,
  UNCATEGORIZED,
} from "../types/transcript";

export type PipelineStep = "parsed" | "corrected" | "extracted" | "categorized";

const STEP_PERCENT: Record<PipelineStep, number> = {
  parsed: 25,
  corrected: 50,
  extracted: 75,
  categorized: 100,
};

export interface ProgressEvent {
  fileName: string;
  step: PipelineStep;
  percent: number;
}

export interface PipelineDeps {
  generator: TextGenerator;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

export interface TranscriptInput {
  fileName: string;
  lines: readonly string[];
  interviewerName: string;
  timestampPattern?: RegExp;
}

/**
 * Runs correction → extraction → categorization over one transcript.
 *
 * Stage failures never escape: correction falls back to the original text,
 * categorization falls back to "Uncategorized", and a failed extraction
 * yields an empty result carrying a TranscriptFailed diagnostic. Only a
 * batch abort propagates.
 */
export async function processTranscript(
  input: TranscriptInput,
  deps: PipelineDeps
): Promise<TranscriptResult> {
  const { fileName } = input;
  const logger = deps.logger ?? console;
  const diagnostics: Diagnostic[] = [];

  try {
    const quotes = await runPipeline(input, deps, logger, diagnostics);
    return { fileName, quotes, diagnostics };
  } catch (err) {
    if (err instanceof BatchAbortedError) throw err;
    const msg = getErrorMessage(err);
    logger.error(`  [Pipeline] ${fileName}: failed: ${msg}`);
    diagnostics.push({ fileName, kind: "TranscriptFailed", severity: "error", message: msg });
    return { fileName, quotes: [], diagnostics };
  }
}

async function runPipeline(
  input: TranscriptInput,
  deps: PipelineDeps,
  logger: Logger,
  diagnostics: Diagnostic[]
): Promise<Quote[]> {
  const { fileName } = input;
  const policy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const report = (step: PipelineStep) =>
    deps.onProgress?.({ fileName, step, percent: STEP_PERCENT[step] });

  const parsed = parseTranscript(input.lines, input.interviewerName, {
    timestampPattern: input.timestampPattern,
  });
  const { utterances } = parsed;
  logger.log(`  [Pipeline] ${fileName}: ${utterances.length} interviewee turns`);

  if (!parsed.interviewerMatched && utterances.length > 0) {
    const found = parsed.speakers.length > 0 ? parsed.speakers.join(", ") : "none";
    diagnostics.push({
      fileName,
      kind: "NoInterviewerMatch",
      severity: "warning",
      message: `No turns by "${input.interviewerName}" (speakers found: ${found}); treating all text as interviewee`,
    });
  }
  report("parsed");

  if (utterances.length === 0) {
    report("corrected");
    report("extracted");
    report("categorized");
    return [];
  }

  // ── Correction ────────────────────────────────────────────────
  let normalized: NormalizedUtterance[];
  const correction = await runStage(correctionStage, utterances, deps.generator, policy, deps.signal);
  if (correction.ok) {
    normalized = correction.value;
  } else {
    const mismatch = correction.error instanceof CorrectionCountMismatchError;
    diagnostics.push({
      fileName,
      kind: mismatch ? "CorrectionCountMismatch" : "CorrectionFailed",
      severity: "warning",
      stage: "correction",
      message: `${correction.error.message} after ${correction.attempts} attempts; using uncorrected text`,
    });
    logger.warn(`  [Pipeline] ${fileName}: correction skipped: ${correction.error.message}`);
    normalized = passThroughCorrection(utterances);
  }
  report("corrected");

  // ── Extraction ────────────────────────────────────────────────
  const extraction = await runStage(extractionStage, normalized, deps.generator, policy, deps.signal);
  if (!extraction.ok) {
    diagnostics.push({
      fileName,
      kind: "ExtractionFailed",
      severity: "error",
      stage: "extraction",
      message: `${extraction.error.message} after ${extraction.attempts} attempts`,
    });
    diagnostics.push({
      fileName,
      kind: "TranscriptFailed",
      severity: "error",
      message: correction.ok
        ? "No quotes extracted: extraction failed"
        : "No quotes extracted: correction and extraction both failed",
    });
    logger.error(`  [Pipeline] ${fileName}: extraction failed: ${extraction.error.message}`);
    return [];
  }
  logger.log(`  [Pipeline] ${fileName}: ${extraction.value.length} quotes extracted`);
  report("extracted");

  // ── Categorization ────────────────────────────────────────────
  const quotes: Quote[] = [];
  for (const extracted of extraction.value) {
    const categorized = await runStage(categorizationStage, extracted.text, deps.generator, policy, deps.signal);
    if (!categorized.ok) {
      diagnostics.push({
        fileName,
        kind: "CategorizationFallback",
        severity: "warning",
        stage: "categorization",
        message: `"${extracted.text}": ${categorized.error.message}; labelled ${UNCATEGORIZED}`,
      });
    }
    quotes.push({
      text: extracted.text,
      timestamp: extracted.timestamp,
      topic: categorized.ok ? categorized.value : UNCATEGORIZED,
      utteranceIdx: extracted.utteranceIdx,
    });
  }
  report("categorized");

  return quotes;
}
