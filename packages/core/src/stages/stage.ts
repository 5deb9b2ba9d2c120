import fs from "fs";
import path from "path";
import { z } from "zod";
import { BatchAbortedError, MalformedResponseError, type PipelineErrorKind, TransientError } from "../errors";
import type { TextGenerator } from "../llm/textGenerator";
import type { StageKind } from "../types/transcript";

const PROMPTS_DIR = process.env.PROMPTS_DIR ?? path.resolve(__dirname, "../prompts");

/** Errors a stage retries; anything else propagates out of runStage. */
export type StageError = TransientError | MalformedResponseError;

/**
 * One bounded transformation backed by a single model call pattern.
 * buildPrompt sees the error of the previous attempt so a stage can
 * restate its constraints on retry.
 */
export interface Stage<I, O> {
  readonly kind: StageKind;
  readonly promptVersion: string;
  buildPrompt(input: I, previousError: StageError | null): string;
  /** Throws MalformedResponseError when the text cannot be turned into O. */
  parse(raw: string, input: I): O;
  /** Attempts allowed for an error kind, used instead of the policy's maxAttempts. */
  readonly attemptLimits?: Partial<Record<PipelineErrorKind, number>>;
}

export interface RetryPolicy {
  maxAttempts: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3 };

export type StageOutcome<O> =
  | { ok: true; value: O; attempts: number }
  | { ok: false; error: StageError; attempts: number };

function isStageError(err: unknown): err is StageError {
  return err instanceof TransientError || err instanceof MalformedResponseError;
}

/**
 * Calls the model until the stage parses its answer or the error kind runs
 * out of attempts. Errors other than StageError propagate unchanged.
 */
export async function runStage<I, O>(
  stage: Stage<I, O>,
  input: I,
  generator: TextGenerator,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  signal?: AbortSignal
): Promise<StageOutcome<O>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const kindCounts = new Map<PipelineErrorKind, number>();
  let lastError: StageError | null = null;
  let attempts = 0;

  for (;;) {
    if (signal?.aborted) throw new BatchAbortedError();
    attempts++;

    try {
      const raw = await generator.generateText(stage.buildPrompt(input, lastError), { signal });
      return { ok: true, value: stage.parse(raw, input), attempts };
    } catch (err) {
      if (!isStageError(err)) throw err;
      lastError = err;

      const count = (kindCounts.get(err.kind) ?? 0) + 1;
      kindCounts.set(err.kind, count);
      const limit = stage.attemptLimits?.[err.kind];
      const exhausted = limit !== undefined ? count >= limit : attempts >= maxAttempts;
      if (exhausted) return { ok: false, error: err, attempts };
    }
  }
}

// ── Prompt templates ────────────────────────────────────────────

const templateCache = new Map<string, string>();

export function loadPromptTemplate(name: string): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) return cached;

  const template = fs.readFileSync(path.join(PROMPTS_DIR, `${name}.txt`), "utf-8");
  templateCache.set(name, template);
  return template;
}

/** Fills {{name}} placeholders; unknown placeholders are left as they are. */
export function renderPrompt(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    key in values ? String(values[key]) : match
  );
}

// ── Response parsing ────────────────────────────────────────────

function stripCodeFence(raw: string): string {
  const fenced = raw.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced?.[1] ?? raw.trim();
}

export function parseJsonResponse<T extends z.ZodTypeAny>(
  raw: string,
  schema: T,
  stageKind: StageKind
): z.infer<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch {
    throw new MalformedResponseError(`${stageKind} response is not valid JSON`, raw);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new MalformedResponseError(`${stageKind} response failed validation: ${issues.join("; ")}`, raw);
  }
  return result.data;
}
