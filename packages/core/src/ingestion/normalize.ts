/**
 * Folds typographic punctuation to ASCII and collapses whitespace, so that
 * labels and quotes compare equal however the document was typed.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(/[\u2018\u2019\u201A\u201B\u2032]/g, "'")
    .replace(/[\u201C\u201D\u201E\u201F\u2033]/g, '"')
    .replace(/[\u2010-\u2015\u2212]/g, "-")
    .replace(/\u2026/g, "...")
    .replace(/[\u200B-\u200D\u2060]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Canonical form of a speaker label for comparison:
 *   " Sam: " -> "sam", "SAM  VILA" -> "sam vila", "[Sam]" -> "sam"
 */
export function normalizeSpeakerName(raw: string): string {
  return normalizeText(raw)
    .replace(/^[\[(]+/, "")
    .replace(/[\s:;,.\-\]\)]+$/, "")
    .trim()
    .toLowerCase();
}
