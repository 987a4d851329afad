import fs from "node:fs";
import path from "node:path";

import { MalformedTranscriptError } from "./errors";
import { Token, Transcript, TranscriptItem } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findItems(transcript: unknown): unknown[] {
  if (Array.isArray(transcript)) {
    return transcript;
  }
  if (isRecord(transcript)) {
    const results = transcript.results;
    if (isRecord(results) && Array.isArray(results.items)) {
      return results.items;
    }
  }
  throw new MalformedTranscriptError("Transcript has no results.items list.");
}

function readSeconds(item: Record<string, unknown>, field: "start_time" | "end_time", index: number): number {
  const raw = item[field];
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim().length > 0) {
    value = Number(raw);
  } else {
    throw new MalformedTranscriptError(`Item ${index}: pronunciation is missing ${field}.`);
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new MalformedTranscriptError(`Item ${index}: ${field} is not a valid time (${String(raw)}).`);
  }
  return value;
}

function readContent(item: Record<string, unknown>, index: number): string {
  const alternatives = item.alternatives;
  if (!Array.isArray(alternatives) || alternatives.length === 0) {
    throw new MalformedTranscriptError(`Item ${index}: no alternatives.`);
  }
  const first: unknown = alternatives[0];
  if (!isRecord(first) || typeof first.content !== "string" || first.content.length === 0) {
    throw new MalformedTranscriptError(`Item ${index}: first alternative has no content.`);
  }
  return first.content;
}

function toToken(item: unknown, index: number): Token {
  if (!isRecord(item)) {
    throw new MalformedTranscriptError(`Item ${index}: expected an object.`);
  }
  const text = readContent(item, index);
  switch (item.type) {
    case "pronunciation": {
      const startSeconds = readSeconds(item, "start_time", index);
      const endSeconds = readSeconds(item, "end_time", index);
      if (endSeconds < startSeconds) {
        throw new MalformedTranscriptError(
          `Item ${index}: end_time ${endSeconds} is before start_time ${startSeconds}.`
        );
      }
      return { kind: "word", text, startSeconds, endSeconds };
    }
    case "punctuation":
      return { kind: "punctuation", text };
    default:
      throw new MalformedTranscriptError(`Item ${index}: unknown item type ${JSON.stringify(item.type)}.`);
  }
}

/**
 * Reads the word and punctuation items of a transcription result, in order.
 * Takes either the full `{ results: { items } }` document or the bare item list.
 */
export function extractTokens(transcript: Transcript | TranscriptItem[]): Token[] {
  return findItems(transcript).map((item, index) => toToken(item, index));
}

export function loadTranscript(transcriptPath: string): Transcript {
  const resolved = path.resolve(transcriptPath);
  console.info(`Loading transcript from ${resolved}`);
  const raw = fs.readFileSync(resolved, "utf-8");
  try {
    return JSON.parse(raw) as Transcript;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedTranscriptError(`Transcript ${resolved} is not valid JSON: ${reason}`);
  }
}
