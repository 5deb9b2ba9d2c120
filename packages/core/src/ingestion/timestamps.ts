/** Matches "HH:MM:SS", "H:MM:SS" and "MM:SS". */
export const DEFAULT_TIMESTAMP_PATTERN = /\b\d{1,2}:\d{2}(?::\d{2})?\b/;

export function compileTimestampPattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid timestamp pattern "${source}": ${msg}`);
  }
}

function baseFlags(pattern: RegExp): string {
  return pattern.flags.replace(/[gy]/g, "");
}

/** Replaces every timestamp with "#" of equal length so that its colons stop looking like separators. */
export function maskTimestamps(text: string, pattern: RegExp): string {
  return text.replace(new RegExp(pattern.source, baseFlags(pattern) + "g"), (m) => "#".repeat(m.length));
}

/**
 * Splits a timestamp off the start of a line, together with any brackets
 * and separator around it:
 *   "[00:01:02] Jo: hi" → { timestamp: "00:01:02", rest: "Jo: hi" }
 *   "00:01:02 - Jo: hi" → { timestamp: "00:01:02", rest: "Jo: hi" }
 */
export function splitLeadingTimestamp(
  line: string,
  pattern: RegExp
): { timestamp: string | null; rest: string } {
  const leading = new RegExp(
    `^\\s*[\\[(]?\\s*(${pattern.source})\\s*[\\])]?\\s*[-|]?\\s*`,
    baseFlags(pattern)
  );
  const match = leading.exec(line);
  if (!match || match[0].length === 0) return { timestamp: null, rest: line };
  return { timestamp: match[1] ?? null, rest: line.slice(match[0].length) };
}

/**
 * Splits a timestamp off the end of a speaker label:
 *   "Jo (00:01:02)" → { timestamp: "00:01:02", rest: "Jo" }
 *   "Jo  00:01:02"  → { timestamp: "00:01:02", rest: "Jo" }
 */
export function splitTrailingTimestamp(
  label: string,
  pattern: RegExp
): { timestamp: string | null; rest: string } {
  const trailing = new RegExp(
    `\\s*[-|]?\\s*[\\[(]?\\s*(${pattern.source})\\s*[\\])]?\\s*$`,
    baseFlags(pattern)
  );
  const match = trailing.exec(label);
  if (!match) return { timestamp: null, rest: label };
  return { timestamp: match[1] ?? null, rest: label.slice(0, match.index) };
}
