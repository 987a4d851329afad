import { ConfigurationError } from "./errors";
import { Phrase, Token } from "./types";

export const DEFAULT_SEGMENT_SIZE = 10;

const WORD_START = /^[A-Za-z0-9]/;

export interface SegmentOptions {
  segmentSize?: number;
  keepTrailingPhrase?: boolean;
}

export function assertSegmentSize(segmentSize: number): void {
  if (!Number.isInteger(segmentSize) || segmentSize <= 0) {
    throw new ConfigurationError(`Segment size must be a positive integer, got ${segmentSize}.`);
  }
}

/**
 * Groups tokens into phrases of exactly `segmentSize` tokens.
 *
 * A phrase starts at its first word and ends at the end of its latest word,
 * so trailing punctuation does not move the end time. A phrase without any
 * word keeps the end time of the phrase before it.
 *
 * Tokens left over after the last full phrase are dropped unless
 * `keepTrailingPhrase` is set.
 */
export function segmentPhrases(tokens: Iterable<Token>, options: SegmentOptions = {}): Phrase[] {
  const segmentSize = options.segmentSize ?? DEFAULT_SEGMENT_SIZE;
  assertSegmentSize(segmentSize);

  const phrases: Phrase[] = [];
  let lastEnd = 0;
  let current: Phrase = { startSeconds: lastEnd, endSeconds: lastEnd, tokens: [] };
  let awaitingStart = true;

  const seal = (): void => {
    phrases.push(current);
    lastEnd = current.endSeconds;
    current = { startSeconds: lastEnd, endSeconds: lastEnd, tokens: [] };
    awaitingStart = true;
  };

  for (const token of tokens) {
    if (token.kind === "word") {
      if (awaitingStart) {
        current.startSeconds = token.startSeconds;
        awaitingStart = false;
      }
      current.endSeconds = token.endSeconds;
    }
    current.tokens.push(token);
    if (current.tokens.length === segmentSize) {
      seal();
    }
  }

  if (options.keepTrailingPhrase && current.tokens.length > 0) {
    seal();
  }
  return phrases;
}

/** Joins token texts, spacing before words and letting punctuation hug the previous word. */
export function renderPhraseText(phrase: Pick<Phrase, "tokens">): string {
  let out = "";
  phrase.tokens.forEach((token, index) => {
    if (index > 0 && WORD_START.test(token.text)) {
      out += ` ${token.text}`;
    } else {
      out += token.text;
    }
  });
  return out;
}
