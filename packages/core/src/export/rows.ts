import { isTopic } from "../stages/categorization";
import type { MergedRow, Topic } from "../types/transcript";

export const EXPORT_COLUMNS = ["Interview File Name", "Timestamp", "Topic", "Quote"] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = readonly [fileName: string, timestamp: string, topic: Topic, quote: string];

/** Maps merged rows onto EXPORT_COLUMNS, keeping their order. */
export function toExportRows(rows: readonly MergedRow[]): ExportRow[] {
  return rows.map((row) => {
    if (!isTopic(row.topic)) {
      throw new Error(`Row for ${row.fileName} has topic "${row.topic}" outside the taxonomy`);
    }
    return [row.fileName, row.timestamp, row.topic, row.quote] as const;
  });
}
