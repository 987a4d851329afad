import path from "node:path";

import { Phrase, Token, TranscriptItem } from "../src/types";

export const samplesDir = path.resolve(__dirname, "..", "samples");
export const transcriptPath = path.join(samplesDir, "transcript.json");
export const srtPath = path.join(samplesDir, "subtitles.srt");

export function pronunciation(content: string, start: number, end: number): TranscriptItem {
  return {
    type: "pronunciation",
    start_time: String(start),
    end_time: String(end),
    alternatives: [{ confidence: "0.98", content }]
  };
}

export function punctuation(content: string): TranscriptItem {
  return { type: "punctuation", alternatives: [{ confidence: "0.0", content }] };
}

export function word(text: string, startSeconds: number, endSeconds: number): Token {
  return { kind: "word", text, startSeconds, endSeconds };
}

export function mark(text: string): Token {
  return { kind: "punctuation", text };
}

export function phrase(startSeconds: number, endSeconds: number, texts: string[]): Phrase {
  return {
    startSeconds,
    endSeconds,
    tokens: texts.map((text) =>
      /^[A-Za-z0-9]/.test(text) ? word(text, startSeconds, endSeconds) : mark(text)
    )
  };
}

export const SAMPLE_SRT =
  "1\n00:00:00,000 --> 00:00:03,250\nHello, and welcome to the show. Today we\n\n" +
  "2\n00:00:03,250 --> 00:00:06,750\ntalk about captions, timing, and speech synthesis.\n\n";
