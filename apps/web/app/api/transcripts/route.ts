import { NextRequest, NextResponse } from "next/server";
import { type AppConfig, loadConfig, requireOpenAIKey } from "@interview-quotes/core/src/config";
import {
  BatchAbortedError,
  ConfigError,
  EmptyBatchResultError,
  getErrorMessage,
} from "@interview-quotes/core/src/errors";
import { toExportRows } from "@interview-quotes/core/src/export/rows";
import { renderSpreadsheet } from "@interview-quotes/core/src/export/spreadsheet";
import {
  parseUploadForm,
  type TranscriptUpload,
  UploadValidationError,
} from "@interview-quotes/core/src/http/uploadForm";
import { createOpenAITextGenerator, type TextGenerator } from "@interview-quotes/core/src/llm/textGenerator";
import { processBatch } from "@interview-quotes/core/src/pipeline/batch";

export const runtime = "nodejs";
export const maxDuration = 300;

const XLSX_MIME = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export async function POST(req: NextRequest) {
  let upload: TranscriptUpload;
  try {
    upload = await parseUploadForm(await req.formData());
  } catch (err) {
    if (err instanceof UploadValidationError) {
      return NextResponse.json({ error: err.message }, { status: err.statusCode });
    }
    return NextResponse.json({ error: "Expected a multipart form upload" }, { status: 400 });
  }

  let generator: TextGenerator;
  let config: AppConfig;
  try {
    config = loadConfig();
    generator = createOpenAITextGenerator({
      apiKey: requireOpenAIKey(config),
      model: config.model,
      timeoutMs: config.timeoutMs,
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      return NextResponse.json({ error: err.message }, { status: 500 });
    }
    throw err;
  }

  try {
    const batch = await processBatch(upload.files, upload.interviewerName, {
      generator,
      retryPolicy: { maxAttempts: config.maxAttempts },
      concurrency: config.concurrency,
      timestampPattern: config.timestampPattern,
      signal: req.signal,
    });

    const workbook = await renderSpreadsheet(toExportRows(batch.rows));

    return new NextResponse(workbook, {
      status: 200,
      headers: {
        "Content-Type": XLSX_MIME,
        "Content-Disposition": 'attachment; filename="merged_output.xlsx"',
        "X-Diagnostics-Count": String(batch.diagnostics.length),
      },
    });
  } catch (err) {
    if (err instanceof EmptyBatchResultError) {
      return NextResponse.json({ error: err.message, diagnostics: err.diagnostics }, { status: 422 });
    }
    if (err instanceof BatchAbortedError) {
      return NextResponse.json({ error: err.message }, { status: 499 });
    }
    return NextResponse.json({ error: getErrorMessage(err) }, { status: 502 });
  }
}
