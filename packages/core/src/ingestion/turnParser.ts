import { normalizeSpeakerName, normalizeText } from "./normalize";
import {
  DEFAULT_TIMESTAMP_PATTERN,
  maskTimestamps,
  splitLeadingTimestamp,
  splitTrailingTimestamp,
} from "./timestamps";
import type { Utterance } from "../types/transcript";

export const INTERVIEWEE_LABEL = "Interviewee";

const MAX_LABEL_WORDS = 4;
const MAX_LABEL_LENGTH = 40;
const LABEL_REGEX = /^[\[(]?[A-Za-z\u00C0-\u024F][\w\u00C0-\u024F'.\- ]*[\])]?$/;
const NAME_WORD_REGEX = /^[\[(]?[A-Z\u00C0-\u00DE0-9]/;

export interface TurnParserOptions {
  timestampPattern?: RegExp;
}

export interface ParsedTranscript {
  /** Interviewee turns only, in document order. */
  utterances: Utterance[];
  /** Distinct speaker labels in order of first appearance. */
  speakers: string[];
  interviewerMatched: boolean;
}

interface Turn {
  speaker: string | null;
  timestamp: string | null;
  parts: string[];
}

function asSpeakerLabel(raw: string): string | null {
  const label = raw.trim();
  if (label.length === 0 || label.length > MAX_LABEL_LENGTH) return null;
  if (!LABEL_REGEX.test(label)) return null;
  if (label.split(/\s+/).length > MAX_LABEL_WORDS) return null;
  return label.replace(/^[\[(]/, "").replace(/[\])]$/, "").trim();
}

function isNameLike(label: string): boolean {
  return label.split(/\s+/).every((word) => NAME_WORD_REGEX.test(word));
}

interface SpeakerLine {
  speaker: string;
  key: string;
  timestamp: string | null;
  text: string;
}

/**
 * Splits "Speaker: text" into its parts. Colons inside timestamps are not
 * separators, so "Jo (00:01:02): hi" yields speaker "Jo".
 */
function splitSpeakerLine(line: string, pattern: RegExp): SpeakerLine | null {
  const sep = maskTimestamps(line, pattern).indexOf(":");
  if (sep <= 0) return null;

  const { timestamp, rest } = splitTrailingTimestamp(line.slice(0, sep), pattern);
  const speaker = asSpeakerLabel(rest);
  if (!speaker) return null;

  return { speaker, key: normalizeSpeakerName(speaker), timestamp, text: line.slice(sep + 1).trim() };
}

const LOWERCASE_START = /^\p{Ll}/u;

/**
 * Whether a "Label: text" line opens a turn or is prose that happens to hold
 * a colon ("First: how big is the market?"). Known speakers always open one.
 * Otherwise the label must look like a name, and either recur as a label
 * elsewhere in the document or be followed by text that does not start in
 * lower case.
 */
function opensTurn(
  candidate: SpeakerLine,
  knownSpeakers: ReadonlySet<string>,
  labelCounts: ReadonlyMap<string, number>
): boolean {
  if (knownSpeakers.has(candidate.key)) return true;
  if (!isNameLike(candidate.speaker)) return false;
  return (labelCounts.get(candidate.key) ?? 0) > 1 || !LOWERCASE_START.test(candidate.text);
}

interface ReadLine {
  line: string;
  leading: { timestamp: string | null; rest: string };
  labelled: SpeakerLine | null;
}

function readLine(raw: string, pattern: RegExp): ReadLine | null {
  const line = normalizeText(raw);
  if (!line) return null;
  const leading = splitLeadingTimestamp(line, pattern);
  return { line, leading, labelled: leading.rest ? splitSpeakerLine(leading.rest, pattern) : null };
}

/**
 * Splits raw document lines into speaker turns and keeps the interviewee's.
 *
 * Recognized turn starts:
 *   "Jo: text", "00:01:02 Jo: text", "[00:01:02] Jo: text", "Jo (00:01:02): text"
 *   "Jo 00:01:02" or a bare known speaker name on its own line, text following
 * A line holding only a timestamp is attached to the next turn. Any other line,
 * including a colon line whose label is not taken for a speaker, continues the
 * current turn. When no turn belongs to the interviewer, every turn is kept as
 * interviewee text.
 */
export function parseTranscript(
  lines: readonly string[],
  interviewerName: string,
  options: TurnParserOptions = {}
): ParsedTranscript {
  const pattern = options.timestampPattern ?? DEFAULT_TIMESTAMP_PATTERN;
  const interviewerKey = normalizeSpeakerName(interviewerName);

  const turns: Turn[] = [];
  const knownSpeakers = new Set<string>(interviewerKey ? [interviewerKey] : []);
  const speakers: string[] = [];
  let current: Turn | null = null;
  let pendingTimestamp: string | null = null;

  const startTurn = (speaker: string | null, timestamp: string | null, text: string): Turn => {
    if (speaker !== null) {
      const key = normalizeSpeakerName(speaker);
      if (!speakers.some((s) => normalizeSpeakerName(s) === key)) speakers.push(speaker);
      knownSpeakers.add(key);
    }
    const turn: Turn = { speaker, timestamp, parts: text ? [text] : [] };
    turns.push(turn);
    return turn;
  };

  const read = lines.flatMap((raw) => readLine(raw, pattern) ?? []);
  const labelCounts = new Map<string, number>();
  for (const { labelled } of read) {
    if (labelled) labelCounts.set(labelled.key, (labelCounts.get(labelled.key) ?? 0) + 1);
  }

  for (const { line, leading, labelled } of read) {
    if (leading.timestamp !== null && leading.rest.length === 0) {
      pendingTimestamp = leading.timestamp;
      continue;
    }

    if (labelled && opensTurn(labelled, knownSpeakers, labelCounts)) {
      current = startTurn(
        labelled.speaker,
        labelled.timestamp ?? leading.timestamp ?? pendingTimestamp,
        labelled.text
      );
      pendingTimestamp = null;
      continue;
    }

    // Exported transcripts often put "Name  00:01:02" or the bare name on its own line.
    const trailing = splitTrailingTimestamp(leading.rest, pattern);
    const marker = asSpeakerLabel(trailing.rest);
    const isMarker =
      marker !== null &&
      (knownSpeakers.has(normalizeSpeakerName(marker)) || (trailing.timestamp !== null && isNameLike(marker)));
    if (marker && isMarker) {
      current = startTurn(marker, trailing.timestamp ?? leading.timestamp ?? pendingTimestamp, "");
      pendingTimestamp = null;
      continue;
    }

    if (!current) {
      current = startTurn(null, pendingTimestamp, "");
      pendingTimestamp = null;
    }
    current.parts.push(line);
  }

  const interviewerMatched =
    interviewerKey.length > 0 &&
    turns.some((t) => t.speaker !== null && normalizeSpeakerName(t.speaker) === interviewerKey);

  const utterances: Utterance[] = [];
  for (const turn of turns) {
    if (interviewerMatched && turn.speaker !== null && normalizeSpeakerName(turn.speaker) === interviewerKey) {
      continue;
    }
    const text = turn.parts.join(" ").trim();
    if (!text) continue;

    utterances.push({
      idx: utterances.length,
      speaker: turn.speaker ?? INTERVIEWEE_LABEL,
      text,
      timestamp: turn.timestamp,
    });
  }

  return { utterances, speakers, interviewerMatched };
}
