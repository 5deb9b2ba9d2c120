import { describe, expect, it } from "vitest";
import { normalizeSpeakerName, normalizeText } from "../ingestion/normalize";
import {
  DEFAULT_TIMESTAMP_PATTERN,
  maskTimestamps,
  splitLeadingTimestamp,
  splitTrailingTimestamp,
} from "../ingestion/timestamps";
import { parseTranscript } from "../ingestion/turnParser";

describe("normalizeText", () => {
  it("replaces smart quotes and dashes and collapses whitespace", () => {
    expect(normalizeText("  \u201CWe\u2019re  growing\u201D \u2013 fast\u00A0 ")).toBe(`"We're growing" - fast`);
  });

  it("folds ellipses, figure dashes and zero-width spaces", () => {
    expect(normalizeText("Well\u2026 it\u2012s up\u200B 20%")).toBe("Well... it-s up 20%");
  });
});

describe("normalizeSpeakerName", () => {
  it("ignores case, brackets, surrounding whitespace and a trailing colon", () => {
    expect(normalizeSpeakerName(" Sam: ")).toBe("sam");
    expect(normalizeSpeakerName("[SAM]")).toBe("sam");
    expect(normalizeSpeakerName("Sam  Vila")).toBe("sam vila");
  });
});

describe("timestamps", () => {
  it("splits a bracketed leading timestamp", () => {
    expect(splitLeadingTimestamp("[00:01:02] Jo: hi", DEFAULT_TIMESTAMP_PATTERN)).toEqual({
      timestamp: "00:01:02",
      rest: "Jo: hi",
    });
  });

  it("splits a trailing timestamp off a label", () => {
    expect(splitTrailingTimestamp("Jo (00:01:02)", DEFAULT_TIMESTAMP_PATTERN)).toEqual({
      timestamp: "00:01:02",
      rest: "Jo",
    });
  });

  it("masks timestamps keeping their length", () => {
    expect(maskTimestamps("at 10:30 and 1:02:03", DEFAULT_TIMESTAMP_PATTERN)).toBe("at ##### and #######");
  });
});

describe("parseTranscript", () => {
  it("drops the interviewer's turns and merges continuation lines", () => {
    const parsed = parseTranscript(
      ["Sam: How's business?", "Jo: Revenue is up.", "It keeps growing.", "SAM: And hiring?", "Jo: Hard."],
      " sam: "
    );

    expect(parsed.interviewerMatched).toBe(true);
    expect(parsed.speakers).toEqual(["Sam", "Jo"]);
    expect(parsed.utterances).toEqual([
      { idx: 0, speaker: "Jo", text: "Revenue is up. It keeps growing.", timestamp: null },
      { idx: 1, speaker: "Jo", text: "Hard.", timestamp: null },
    ]);
  });

  it("reads leading, bracketed and label timestamps", () => {
    const { utterances } = parseTranscript(
      ["00:01:02 Sam: Hello", "[00:01:10] Jo: We sell subscriptions.", "Jo (00:02:00): Margins are thin."],
      "Sam"
    );

    expect(utterances).toEqual([
      { idx: 0, speaker: "Jo", text: "We sell subscriptions.", timestamp: "00:01:10" },
      { idx: 1, speaker: "Jo", text: "Margins are thin.", timestamp: "00:02:00" },
    ]);
  });

  it("handles speaker marker lines and standalone timestamps", () => {
    const { utterances } = parseTranscript(
      [
        "Sam  00:00:05",
        "How did the quarter go?",
        "Jo  00:00:12",
        "Better than expected.",
        "",
        "00:01:30",
        "Jo: Costs rose too.",
      ],
      "Sam"
    );

    expect(utterances).toEqual([
      { idx: 0, speaker: "Jo", text: "Better than expected.", timestamp: "00:00:12" },
      { idx: 1, speaker: "Jo", text: "Costs rose too.", timestamp: "00:01:30" },
    ]);
  });

  it("keeps every turn when the interviewer never speaks", () => {
    const parsed = parseTranscript(["Jo: We are growing.", "Alex: Agreed."], "Sam");

    expect(parsed.interviewerMatched).toBe(false);
    expect(parsed.speakers).toEqual(["Jo", "Alex"]);
    expect(parsed.utterances).toEqual([
      { idx: 0, speaker: "Jo", text: "We are growing.", timestamp: null },
      { idx: 1, speaker: "Alex", text: "Agreed.", timestamp: null },
    ]);
  });

  it("does not match speaker names by prefix", () => {
    const { utterances } = parseTranscript(["Sam: Question?", "Samantha: Answer."], "Sam");
    expect(utterances).toEqual([{ idx: 0, speaker: "Samantha", text: "Answer.", timestamp: null }]);
  });

  it("attributes text before the first label to the interviewee", () => {
    const { utterances } = parseTranscript(["Intro text here", "Sam: Hi", "Jo: Hello there"], "Sam");
    expect(utterances).toEqual([
      { idx: 0, speaker: "Interviewee", text: "Intro text here", timestamp: null },
      { idx: 1, speaker: "Jo", text: "Hello there", timestamp: null },
    ]);
  });

  it("keeps a colon inside the interviewer's turn out of the interviewee text", () => {
    const parsed = parseTranscript(["Sam: Two questions.", "First: how big is the market?", "Jo: Revenue is up."], "Sam");

    expect(parsed.utterances).toEqual([{ idx: 0, speaker: "Jo", text: "Revenue is up.", timestamp: null }]);
    expect(parsed.speakers).toEqual(["Sam", "Jo"]);
  });

  it("keeps prose colons in the interviewee's turn", () => {
    const { utterances } = parseTranscript(
      ["Sam: Numbers?", "Jo: Good year.", "Revenue: up 20% on last year.", "The problem is this: Hiring."],
      "Sam"
    );

    expect(utterances).toEqual([
      {
        idx: 0,
        speaker: "Jo",
        text: "Good year. Revenue: up 20% on last year. The problem is this: Hiring.",
        timestamp: null,
      },
    ]);
  });

  it("takes a recurring label for a speaker even before lower-case text", () => {
    const { utterances } = parseTranscript(["Sam: Hi.", "Jo: yeah we grew.", "Sam: And?", "Jo: yes."], "Sam");
    expect(utterances.map((u) => [u.speaker, u.text])).toEqual([
      ["Jo", "yeah we grew."],
      ["Jo", "yes."],
    ]);
  });

  it("accepts a custom timestamp pattern", () => {
    const { utterances } = parseTranscript(["[12s] Jo: Hello"], "Sam", { timestampPattern: /\d+s/ });
    expect(utterances).toEqual([{ idx: 0, speaker: "Jo", text: "Hello", timestamp: "12s" }]);
  });

  it("returns nothing for an empty document", () => {
    expect(parseTranscript([], "Sam")).toEqual({ utterances: [], speakers: [], interviewerMatched: false });
    expect(parseTranscript(["", "   "], "Sam").utterances).toEqual([]);
  });

  it("never attributes an utterance to the interviewer", () => {
    const spellings = ["Sam", "sam", "SAM", "[Sam]"];
    const others = ["Jo", "Alex Kim", "Dr. Lee"];
    const bodies = ["We grew 10% at 10:30.", "Note: costs rose.", "Hiring is hard", "ok"];

    let seed = 7;
    const pick = <T>(items: readonly T[]): T => {
      seed = (seed * 31 + 11) % 997;
      return items[seed % items.length];
    };

    for (let doc = 0; doc < 25; doc++) {
      const lines: string[] = [];
      for (let i = 0; i < 12; i++) {
        const speaker = i % 2 === 0 ? pick(spellings) : pick(others);
        lines.push(`${speaker}: ${pick(bodies)}`);
      }

      const { utterances, interviewerMatched } = parseTranscript(lines, "Sam");
      expect(interviewerMatched).toBe(true);
      expect(utterances.length).toBeGreaterThan(0);
      for (const u of utterances) {
        expect(normalizeSpeakerName(u.speaker)).not.toBe("sam");
      }
    }
  });
});
