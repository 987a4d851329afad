import { describe, expect, it } from "vitest";

import { MalformedSrtCueError, MalformedTimeCodeError } from "../src/errors";
import { parseSrtCues, srtCuesToSpeechCues } from "../src/srt";

const content =
  "1\n00:00:01,000 --> 00:00:03,000\nGood morning, everyone.\n\n" +
  "2\n00:00:03,500 --> 00:00:06,250\nLet us begin with the agenda.\n\n";

describe("parseSrtCues", () => {
  it("pairs time ranges with the following text line", () => {
    expect(parseSrtCues(content)).toEqual([
      { startSeconds: 1, endSeconds: 3, text: "Good morning, everyone." },
      { startSeconds: 3.5, endSeconds: 6.25, text: "Let us begin with the agenda." }
    ]);
  });

  it("reads CRLF line endings", () => {
    expect(parseSrtCues(content.replace(/\n/g, "\r\n"))).toEqual(parseSrtCues(content));
  });

  it("keeps only the first line of a multi-line cue", () => {
    const cues = parseSrtCues("1\n00:00:01,000 --> 00:00:02,000\nfirst line\nsecond line\n");
    expect(cues).toEqual([{ startSeconds: 1, endSeconds: 2, text: "first line" }]);
  });

  it("ignores cue settings after the end time", () => {
    const [cue] = parseSrtCues("00:00:01.000 --> 00:00:02.500 align:middle\nHi\n");
    expect(cue.endSeconds).toBe(2.5);
  });

  it("rejects a time range without text", () => {
    expect(() => parseSrtCues("1\n00:00:01,000 --> 00:00:02,000\n\n")).toThrowError(MalformedSrtCueError);
    expect(() =>
      parseSrtCues("1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:02,000 --> 00:00:03,000\nText\n")
    ).toThrowError(MalformedSrtCueError);
  });

  it("rejects an unreadable time code", () => {
    expect(() => parseSrtCues("1\n00:00:01,000 --> soon\nText\n")).toThrowError(MalformedTimeCodeError);
  });

  it("returns no cues for an empty document", () => {
    expect(parseSrtCues("")).toEqual([]);
  });
});

describe("srtCuesToSpeechCues", () => {
  it("scales cue durations", () => {
    expect(srtCuesToSpeechCues(parseSrtCues(content), 1.5)).toEqual([
      { durationSeconds: 3, text: "Good morning, everyone." },
      { durationSeconds: 4.125, text: "Let us begin with the agenda." }
    ]);
  });
});
