import { MalformedResponseError } from "../errors";
import { normalizeText } from "../ingestion/normalize";
import type { NormalizedUtterance } from "../types/transcript";
import { extractionResponseSchema } from "./schemas";
import { type Stage, loadPromptTemplate, parseJsonResponse, renderPrompt } from "./stage";

export const EXTRACTION_PROMPT_VERSION = "extraction_v1";

export interface ExtractedQuote {
  readonly text: string;
  readonly timestamp: string | null;
  readonly utteranceIdx: number;
}

function buildStatementBlock(utterances: readonly NormalizedUtterance[]): string {
  return utterances
    .map((u, i) => `${i + 1}. ${u.timestamp ? `[${u.timestamp}] ` : ""}${u.textCorrected}`)
    .join("\n");
}

/**
 * Pulls standalone quotes out of a transcript's corrected interviewee turns.
 * A turn can yield any number of quotes; each one carries the timestamp and
 * idx of the turn it came from, resolved through the 1-based line number.
 */
export const extractionStage: Stage<readonly NormalizedUtterance[], ExtractedQuote[]> = {
  kind: "extraction",
  promptVersion: EXTRACTION_PROMPT_VERSION,

  buildPrompt(utterances) {
    return renderPrompt(loadPromptTemplate(EXTRACTION_PROMPT_VERSION), {
      lines: buildStatementBlock(utterances),
    });
  },

  parse(raw, utterances) {
    const { quotes } = parseJsonResponse(raw, extractionResponseSchema, "extraction");

    return quotes.map((q, i) => {
      const source = utterances[q.line - 1];
      if (!source) {
        throw new MalformedResponseError(
          `extraction quote ${i + 1} refers to line ${q.line}, expected 1-${utterances.length}`,
          raw
        );
      }
      const text = normalizeText(q.text);
      if (!text) {
        throw new MalformedResponseError(`extraction quote ${i + 1} is blank`, raw);
      }
      return { text, timestamp: source.timestamp, utteranceIdx: source.idx };
    });
  },
};
