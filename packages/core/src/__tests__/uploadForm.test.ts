import { describe, expect, it } from "vitest";
import { UploadValidationError, parseUploadForm, sanitizeFileName } from "../http/uploadForm";

function form(fields: Record<string, string>, files: File[]): FormData {
  const data = new FormData();
  for (const [key, value] of Object.entries(fields)) data.append(key, value);
  for (const file of files) data.append("files", file);
  return data;
}

describe("sanitizeFileName", () => {
  it.each([
    ["../../etc/Interview 1.docx", "Interview_1.docx"],
    ["C:\\Users\\jo\\R\u00E9sum\u00E9 call.txt", "Resume_call.txt"],
    [".hidden.txt", "hidden.txt"],
    ["a  &  b.txt", "a_b.txt"],
  ])("%j -> %j", (raw, expected) => {
    expect(sanitizeFileName(raw)).toBe(expected);
  });
});

describe("parseUploadForm", () => {
  it("reads the interviewer and files", async () => {
    const upload = await parseUploadForm(
      form({ interviewer: "  Sam " }, [new File(["Sam: Hi\nJo: Hello"], "Interview 1.txt")])
    );

    expect(upload.interviewerName).toBe("Sam");
    expect(upload.files.map((f) => f.fileName)).toEqual(["Interview_1.txt"]);
    expect(upload.files[0]?.content.toString("utf-8")).toBe("Sam: Hi\nJo: Hello");
  });

  it("requires an interviewer", async () => {
    await expect(parseUploadForm(form({}, [new File(["x"], "a.txt")]))).rejects.toThrow(
      new UploadValidationError("Missing interviewer name")
    );
  });

  it("rejects a blank interviewer", async () => {
    await expect(parseUploadForm(form({ interviewer: "   " }, [new File(["x"], "a.txt")]))).rejects.toThrow(
      new UploadValidationError("Missing interviewer name")
    );
  });

  it("requires at least one file", async () => {
    const data = form({ interviewer: "Sam" }, []);
    data.append("files", "not a file");
    await expect(parseUploadForm(data)).rejects.toThrow("No files uploaded");
  });

  it("rejects unsupported files", async () => {
    const error = await parseUploadForm(
      form({ interviewer: "Sam" }, [new File(["x"], "a.txt"), new File(["%PDF"], "notes.pdf")])
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UploadValidationError);
    expect(error instanceof UploadValidationError && [error.statusCode, error.message]).toEqual([
      400,
      'Unsupported file "notes.pdf": expected .docx or .txt',
    ]);
  });
});
