import { z } from "zod";
import { isSupportedDocument, SUPPORTED_EXTENSIONS } from "../ingestion/documentLoader";
import type { BatchFile } from "../pipeline/batch";

export class UploadValidationError extends Error {
  statusCode = 400;
  constructor(message: string) {
    super(message);
    this.name = "UploadValidationError";
  }
}

export interface TranscriptUpload {
  interviewerName: string;
  files: BatchFile[];
}

const interviewerSchema = z
  .string({ required_error: "Missing interviewer name", invalid_type_error: "Missing interviewer name" })
  .trim()
  .min(1, "Missing interviewer name");

/**
 * Reduces an uploaded file name to a safe base name:
 *   "../../etc/Interview 1.docx" → "Interview_1.docx"
 */
export function sanitizeFileName(raw: string): string {
  const base = raw.split(/[\\/]/).pop() ?? "";
  return base
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^\w.\-]+/g, "_")
    .replace(/^[._]+/, "")
    .replace(/_+/g, "_");
}

interface UploadedFile {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

function isUploadedFile<T>(value: T): value is T & UploadedFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "arrayBuffer" in value &&
    typeof value.arrayBuffer === "function"
  );
}

/**
 * Reads the "interviewer" and "files" fields of a transcript upload.
 * Throws UploadValidationError for a missing interviewer, no files, or an
 * unsupported file type.
 */
export async function parseUploadForm(form: FormData): Promise<TranscriptUpload> {
  const interviewer = interviewerSchema.safeParse(form.get("interviewer") ?? undefined);
  if (!interviewer.success) {
    throw new UploadValidationError(interviewer.error.issues[0]?.message ?? "Missing interviewer name");
  }

  const entries = form.getAll("files").filter(isUploadedFile);
  if (entries.length === 0) {
    throw new UploadValidationError("No files uploaded");
  }

  const files: BatchFile[] = [];
  for (const entry of entries) {
    const fileName = sanitizeFileName(entry.name);
    if (!fileName || !isSupportedDocument(fileName)) {
      throw new UploadValidationError(
        `Unsupported file "${entry.name}": expected ${SUPPORTED_EXTENSIONS.join(" or ")}`
      );
    }
    files.push({ fileName, content: Buffer.from(await entry.arrayBuffer()) });
  }

  return { interviewerName: interviewer.data, files };
}
