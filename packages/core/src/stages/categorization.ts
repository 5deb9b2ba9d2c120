import { MalformedResponseError } from "../errors";
import { TOPICS, type Topic, UNCATEGORIZED } from "../types/transcript";
import { categorizationResponseSchema } from "./schemas";
import { type Stage, loadPromptTemplate, renderPrompt } from "./stage";

export const CATEGORIZATION_PROMPT_VERSION = "categorization_v1";

const TOPIC_SET: ReadonlySet<string> = new Set(TOPICS);

/** Strips a code fence, wrapping brackets or quotes and a trailing period. */
function cleanLabel(raw: string): string {
  return raw
    .trim()
    .replace(/^```\w*\s*|\s*```$/g, "")
    .replace(/^[\s\["'`]+|[\s\]"'`]+$/g, "")
    .replace(/\.$/, "")
    .trim();
}

function readLabel(raw: string): string {
  try {
    const parsed = categorizationResponseSchema.safeParse(JSON.parse(cleanLabel(raw)));
    return parsed.success ? parsed.data.topic : "";
  } catch {
    // not JSON: the model answered with the bare label
    return raw;
  }
}

/**
 * Maps any model answer to the closed taxonomy. Labels outside it become
 * "Uncategorized"; only an empty answer is malformed.
 */
export function toTopic(raw: string): Topic {
  const label = cleanLabel(readLabel(raw));
  for (const topic of TOPICS) {
    if (topic === label) return topic;
  }
  return UNCATEGORIZED;
}

export const categorizationStage: Stage<string, Topic> = {
  kind: "categorization",
  promptVersion: CATEGORIZATION_PROMPT_VERSION,

  buildPrompt(quote) {
    return renderPrompt(loadPromptTemplate(CATEGORIZATION_PROMPT_VERSION), {
      topics: [...TOPICS, UNCATEGORIZED].map((t) => `- ${t}`).join("\n"),
      quote,
    });
  },

  parse(raw) {
    if (!raw.trim()) throw new MalformedResponseError("categorization response is empty", raw);
    return toTopic(raw);
  },
};

export function isTopic(value: string): value is Topic {
  return value === UNCATEGORIZED || TOPIC_SET.has(value);
}
