export const TOPICS = ["Business Model", "Market Outlook", "Challenges"] as const;

export const UNCATEGORIZED = "Uncategorized" as const;

export type Topic = (typeof TOPICS)[number] | typeof UNCATEGORIZED;

export interface Utterance {
  readonly idx: number;
  readonly speaker: string;
  readonly text: string;
  readonly timestamp: string | null;
}

export interface NormalizedUtterance extends Utterance {
  readonly textCorrected: string;
}

export interface Quote {
  readonly text: string;
  readonly timestamp: string | null;
  readonly topic: Topic;
  /** idx of the utterance the quote was extracted from */
  readonly utteranceIdx: number;
}

export type DiagnosticKind =
  | "ParseFailure"
  | "NoInterviewerMatch"
  | "CorrectionCountMismatch"
  | "CorrectionFailed"
  | "ExtractionFailed"
  | "CategorizationFallback"
  | "TranscriptFailed";

export type StageKind = "correction" | "extraction" | "categorization";

export interface Diagnostic {
  readonly fileName: string;
  readonly kind: DiagnosticKind;
  readonly severity: "warning" | "error";
  readonly stage?: StageKind;
  readonly message: string;
}

export interface TranscriptResult {
  readonly fileName: string;
  readonly quotes: readonly Quote[];
  readonly diagnostics: readonly Diagnostic[];
}

export interface MergedRow {
  readonly fileName: string;
  /** empty string when the source utterance carried no timestamp */
  readonly timestamp: string;
  readonly topic: Topic;
  readonly quote: string;
}
