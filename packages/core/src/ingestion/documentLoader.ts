import mammoth from "mammoth";
import path from "path";
import { ParseFailureError, getErrorMessage } from "../errors";

export const SUPPORTED_EXTENSIONS = [".docx", ".txt"] as const;

/** Turns an uploaded document into its ordered paragraph lines. */
export interface DocumentLoader {
  extractLines(content: Buffer, fileName: string): Promise<string[]>;
}

export function isSupportedDocument(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export const documentLoader: DocumentLoader = {
  async extractLines(content, fileName) {
    const ext = path.extname(fileName).toLowerCase();

    switch (ext) {
      case ".txt":
        return splitLines(content.toString("utf-8"));

      case ".docx": {
        let text: string;
        try {
          const result = await mammoth.extractRawText({ buffer: content });
          text = result.value;
        } catch (err) {
          throw new ParseFailureError(fileName, getErrorMessage(err), { cause: err });
        }
        return splitLines(text);
      }

      default:
        throw new ParseFailureError(fileName, `unsupported file type "${ext || "(none)"}"`);
    }
  },
};
