export * from "./types/transcript";
export * from "./errors";
export { loadConfig, requireOpenAIKey, type AppConfig } from "./config";
export { silentLogger, type Logger } from "./logging";
export { parseTranscript, INTERVIEWEE_LABEL, type ParsedTranscript, type TurnParserOptions } from "./ingestion/turnParser";
export { DEFAULT_TIMESTAMP_PATTERN, compileTimestampPattern } from "./ingestion/timestamps";
export { documentLoader, isSupportedDocument, SUPPORTED_EXTENSIONS, type DocumentLoader } from "./ingestion/documentLoader";
export { createOpenAITextGenerator, type TextGenerator, type GenerateOptions } from "./llm/textGenerator";
export { runStage, DEFAULT_RETRY_POLICY, type Stage, type StageOutcome, type RetryPolicy } from "./stages/stage";
export { correctionStage } from "./stages/correction";
export { extractionStage, type ExtractedQuote } from "./stages/extraction";
export { categorizationStage, toTopic } from "./stages/categorization";
export {
  processTranscript,
  type PipelineDeps,
  type ProgressEvent,
  type TranscriptInput,
} from "./pipeline/transcriptPipeline";
export { processBatch, mergeResults, type BatchFile, type BatchOptions, type BatchResult } from "./pipeline/batch";
export { toExportRows, EXPORT_COLUMNS, type ExportRow } from "./export/rows";
export { renderSpreadsheet } from "./export/spreadsheet";
export { parseUploadForm, sanitizeFileName, UploadValidationError } from "./http/uploadForm";
