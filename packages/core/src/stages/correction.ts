import { CorrectionCountMismatchError } from "../errors";
import { normalizeText } from "../ingestion/normalize";
import type { NormalizedUtterance, Utterance } from "../types/transcript";
import { correctionResponseSchema } from "./schemas";
import { type Stage, loadPromptTemplate, parseJsonResponse, renderPrompt } from "./stage";

export const CORRECTION_PROMPT_VERSION = "correction_v1";

/**
 * Grammar and spelling correction over all interviewee turns of one
 * transcript in a single call. The result keeps the count and order of its
 * input; a blank corrected line keeps the original text.
 */
export const correctionStage: Stage<readonly Utterance[], NormalizedUtterance[]> = {
  kind: "correction",
  promptVersion: CORRECTION_PROMPT_VERSION,
  attemptLimits: { CorrectionCountMismatch: 2 },

  buildPrompt(utterances, previousError) {
    const count = utterances.length;
    let prompt = renderPrompt(loadPromptTemplate(CORRECTION_PROMPT_VERSION), {
      count,
      lines: JSON.stringify({ lines: utterances.map((u) => u.text) }, null, 2),
    });

    if (previousError instanceof CorrectionCountMismatchError) {
      prompt += renderPrompt(loadPromptTemplate("correction_count_retry_v1"), {
        count,
        received: previousError.received,
      });
    }
    return prompt;
  },

  parse(raw, utterances) {
    const { lines } = parseJsonResponse(raw, correctionResponseSchema, "correction");
    if (lines.length !== utterances.length) {
      throw new CorrectionCountMismatchError(utterances.length, lines.length, raw);
    }

    return utterances.map((u, i) => {
      const corrected = normalizeText(lines[i] ?? "");
      return { ...u, textCorrected: corrected || u.text };
    });
  },
};

/** Fallback when correction cannot be completed: the original text, unchanged. */
export function passThroughCorrection(utterances: readonly Utterance[]): NormalizedUtterance[] {
  return utterances.map((u) => ({ ...u, textCorrected: u.text }));
}
