import type { TextGenerator } from "../llm/textGenerator";
import { correctionResponseSchema } from "../stages/schemas";
import type { StageKind } from "../types/transcript";

export type Handler = (prompt: string, call: number) => string | Promise<string>;

export interface StubGenerator extends TextGenerator {
  calls: { stage: StageKind; prompt: string }[];
  callsFor(stage: StageKind): string[];
}

export function stageOf(prompt: string): StageKind {
  if (prompt.includes("copy-editing")) return "correction";
  if (prompt.includes("STATEMENTS:")) return "extraction";
  if (prompt.includes("QUOTE:")) return "categorization";
  throw new Error(`Unrecognized prompt: ${prompt.slice(0, 60)}`);
}

/** The "lines" array the correction prompt was built from. */
export function correctionInput(prompt: string): string[] {
  const start = prompt.indexOf("{", prompt.indexOf("INPUT:"));
  const end = prompt.indexOf("\n}", start) + 2;
  return correctionResponseSchema.parse(JSON.parse(prompt.slice(start, end))).lines;
}

/** The numbered statements of an extraction prompt, without their timestamps. */
export function extractionInput(prompt: string): { line: number; text: string }[] {
  const block = prompt.slice(prompt.indexOf("STATEMENTS:") + "STATEMENTS:".length);
  const statements: { line: number; text: string }[] = [];
  for (const row of block.split("\n")) {
    const match = row.match(/^(\d+)\. (?:\[[^\]]*\] )?(.*)$/);
    if (match) statements.push({ line: Number(match[1]), text: match[2] ?? "" });
  }
  return statements;
}

export function quoteOf(prompt: string): string {
  return prompt.slice(prompt.indexOf("QUOTE:") + "QUOTE:".length).trim();
}

export const echoCorrection: Handler = (prompt) => JSON.stringify({ lines: correctionInput(prompt) });

export const quoteEveryStatement: Handler = (prompt) =>
  JSON.stringify({ quotes: extractionInput(prompt) });

export const uncategorized: Handler = () => JSON.stringify({ topic: "Uncategorized" });

/**
 * In-process TextGenerator that answers each stage with its own handler.
 * Defaults: correction echoes its input, extraction quotes every statement
 * whole, categorization answers "Uncategorized".
 */
export function stubGenerator(
  handlers: Partial<Record<StageKind, Handler>> = {}
): StubGenerator {
  const calls: { stage: StageKind; prompt: string }[] = [];
  const counts = new Map<StageKind, number>();
  const resolved: Record<StageKind, Handler> = {
    correction: handlers.correction ?? echoCorrection,
    extraction: handlers.extraction ?? quoteEveryStatement,
    categorization: handlers.categorization ?? uncategorized,
  };

  return {
    calls,
    callsFor: (stage) => calls.filter((c) => c.stage === stage).map((c) => c.prompt),
    async generateText(prompt) {
      const stage = stageOf(prompt);
      const call = (counts.get(stage) ?? 0) + 1;
      counts.set(stage, call);
      calls.push({ stage, prompt });
      return resolved[stage](prompt, call);
    },
  };
}
