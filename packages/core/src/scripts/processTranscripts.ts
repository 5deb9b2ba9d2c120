import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(__dirname, "../../../../.env"), quiet: true });

import fs from "fs/promises";
import { Command } from "commander";
import { loadConfig, requireOpenAIKey } from "../config";
import { EmptyBatchResultError, getErrorMessage } from "../errors";
import { toExportRows } from "../export/rows";
import { renderSpreadsheet } from "../export/spreadsheet";
import { createOpenAITextGenerator } from "../llm/textGenerator";
import { processBatch, type BatchFile } from "../pipeline/batch";
import type { Diagnostic } from "../types/transcript";

const OUTPUT_FILE_NAME = "merged_output.xlsx";

function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  if (diagnostics.length === 0) return;
  console.log(`\n${diagnostics.length} diagnostic(s):`);
  for (const d of diagnostics) {
    const stage = d.stage ? ` [${d.stage}]` : "";
    console.log(`  ${d.severity.toUpperCase()} ${d.fileName} ${d.kind}${stage}: ${d.message}`);
  }
}

async function main() {
  const program = new Command()
    .name("process-transcripts")
    .description("Extract categorized interviewee quotes from interview transcripts into one spreadsheet")
    .requiredOption("-i, --interviewer <name>", "interviewer name; their turns are ignored")
    .option("-o, --output <file>", `output path (default: $OUTPUT_DIR/${OUTPUT_FILE_NAME})`)
    .argument("<files...>", ".docx or .txt transcripts")
    .parse();

  const opts = program.opts<{ interviewer: string; output?: string }>();
  const config = loadConfig();

  const files: BatchFile[] = [];
  for (const filePath of program.args) {
    files.push({ fileName: path.basename(filePath), content: await fs.readFile(filePath) });
  }

  const generator = createOpenAITextGenerator({
    apiKey: requireOpenAIKey(config),
    model: config.model,
    timeoutMs: config.timeoutMs,
  });

  const abort = new AbortController();
  process.once("SIGINT", () => {
    console.log("\nInterrupted, stopping after in-flight requests...");
    abort.abort();
  });

  console.log(`Processing ${files.length} transcript(s) with ${config.model}...\n`);

  try {
    const batch = await processBatch(files, opts.interviewer, {
      generator,
      retryPolicy: { maxAttempts: config.maxAttempts },
      concurrency: config.concurrency,
      timestampPattern: config.timestampPattern,
      signal: abort.signal,
      onProgress: (e) => console.log(`  ${e.fileName}: ${e.step} (${e.percent}%)`),
    });

    const workbook = await renderSpreadsheet(toExportRows(batch.rows));
    const outputPath = path.resolve(opts.output ?? path.join(config.outputDir, OUTPUT_FILE_NAME));
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, Buffer.from(workbook));

    console.log(`\nWrote ${batch.rows.length} quotes to ${outputPath}`);
    printDiagnostics(batch.diagnostics);
  } catch (err) {
    if (err instanceof EmptyBatchResultError) {
      console.error(`\n${err.message}`);
      printDiagnostics(err.diagnostics);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

main().catch((err) => {
  console.error("Failed:", getErrorMessage(err));
  process.exit(1);
});
