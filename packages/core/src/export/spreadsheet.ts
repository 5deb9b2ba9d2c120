import ExcelJS from "exceljs";
import { EXPORT_COLUMNS, type ExportRow } from "./rows";

export const SHEET_NAME = "Interviews";
export const TABLE_NAME = "InterviewTable";
export const HEADER_FILL = "FFCCFFCC";
export const TABLE_THEME = "TableStyleMedium2";

/** The filterable table laid over the header and data rows, anchored at A1. */
export function interviewTable(rows: readonly ExportRow[], columns: readonly string[]): ExcelJS.TableProperties {
  return {
    name: TABLE_NAME,
    ref: "A1",
    headerRow: true,
    style: { theme: TABLE_THEME, showRowStripes: false, showColumnStripes: false },
    columns: columns.map((name) => ({ name, filterButton: true })),
    rows: rows.map((row) => [...row]),
  };
}

/**
 * Renders rows into an .xlsx workbook: bold light-green header, no
 * gridlines, columns sized to their longest value, and the data laid out as
 * a filterable table when there is at least one row.
 */
export async function renderSpreadsheet(
  rows: readonly ExportRow[],
  columns: readonly string[] = EXPORT_COLUMNS
): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME, {
    views: [{ showGridLines: false }],
  });

  if (rows.length > 0) {
    sheet.addTable(interviewTable(rows, columns));
  } else {
    sheet.addRow([...columns]);
  }

  const header = sheet.getRow(1);
  header.eachCell((cell) => {
    cell.font = { bold: true };
    cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: HEADER_FILL } };
  });

  columns.forEach((name, i) => {
    const longest = rows.reduce((max, row) => Math.max(max, String(row[i] ?? "").length), name.length);
    sheet.getColumn(i + 1).width = longest + 2;
  });

  return workbook.xlsx.writeBuffer();
}
