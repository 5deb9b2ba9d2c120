"use client";

import { type FormEvent, useRef, useState } from "react";

const DOWNLOAD_NAME = "interview_analysis.xlsx";

export default function TranscriptUploadForm() {
  const inputRef = useRef<HTMLInputElement>(null);
  const [files, setFiles] = useState<File[]>([]);
  const [interviewer, setInterviewer] = useState("");
  const [dragging, setDragging] = useState(false);
  const [loading, setLoading] = useState(false);
  const [result, setResult] = useState<{ ok: boolean; message: string } | null>(null);

  function addFiles(list: FileList | null) {
    if (!list) return;
    const accepted = Array.from(list).filter((f) => /\.(docx|txt)$/i.test(f.name));
    setFiles((prev) => [...prev, ...accepted]);
  }

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    if (files.length === 0 || !interviewer.trim()) return;

    setLoading(true);
    setResult(null);

    const form = new FormData();
    for (const f of files) form.append("files", f);
    form.append("interviewer", interviewer.trim());

    try {
      const res = await fetch("/api/transcripts", { method: "POST", body: form });

      if (!res.ok) {
        const data: { error?: string } = await res.json();
        setResult({ ok: false, message: data.error ?? `Request failed (${res.status})` });
        return;
      }

      const blob = await res.blob();
      const url = URL.createObjectURL(blob);
      const a = document.createElement("a");
      a.href = url;
      a.download = DOWNLOAD_NAME;
      document.body.appendChild(a);
      a.click();
      a.remove();
      URL.revokeObjectURL(url);

      const warnings = Number(res.headers.get("X-Diagnostics-Count") ?? 0);
      setResult({
        ok: true,
        message: warnings > 0 ? `Spreadsheet ready (${warnings} file warnings).` : "Spreadsheet ready.",
      });
    } catch (err) {
      setResult({ ok: false, message: err instanceof Error ? err.message : String(err) });
    } finally {
      setLoading(false);
    }
  }

  return (
    <form onSubmit={handleSubmit} className="upload-form">
      <div
        className={dragging ? "drop-zone hover" : "drop-zone"}
        onClick={() => inputRef.current?.click()}
        onDragOver={(e) => {
          e.preventDefault();
          setDragging(true);
        }}
        onDragLeave={() => setDragging(false)}
        onDrop={(e) => {
          e.preventDefault();
          setDragging(false);
          addFiles(e.dataTransfer.files);
        }}
      >
        Drag and drop your DOCX files
        <br />
        or click to select
      </div>
      <input
        ref={inputRef}
        type="file"
        accept=".docx,.txt"
        multiple
        hidden
        onChange={(e) => addFiles(e.target.files)}
      />

      {files.length > 0 && (
        <div className="file-list">
          <h3>Currently Included Interviews</h3>
          <ul>
            {files.map((f, i) => (
              <li key={`${f.name}-${i}`}>{f.name}</li>
            ))}
          </ul>
          <button type="button" className="btn" onClick={() => setFiles([])}>
            Reset Queue
          </button>
        </div>
      )}

      <input
        type="text"
        className="input"
        value={interviewer}
        onChange={(e) => setInterviewer(e.target.value)}
        placeholder="Enter interviewer name (to ignore their quotes)"
      />
      <button
        type="submit"
        disabled={loading || files.length === 0 || !interviewer.trim()}
        className="btn btn-primary"
      >
        {loading ? "Processing..." : "Generate Excel"}
      </button>

      {result && (
        <p className={result.ok ? "feedback-success" : "feedback-error"}>{result.message}</p>
      )}
    </form>
  );
}
