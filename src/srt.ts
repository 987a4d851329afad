import { MalformedSrtCueError, MalformedTimeCodeError } from "./errors";
import { DEFAULT_TIME_PAD_FACTOR, paddedDuration } from "./formats";
import { parseTimeCode } from "./timecode";
import { SpeechCue, SrtCue } from "./types";

const RANGE_MARKER = "-->";
const CUE_NUMBER = /^\d+$/;

function parseRange(line: string): [number, number] {
  const markerAt = line.indexOf(RANGE_MARKER);
  const startCode = line.slice(0, markerAt).trim();
  const endCode = line.slice(markerAt + RANGE_MARKER.length).trim().split(/\s+/)[0] ?? "";
  if (!startCode || !endCode) {
    throw new MalformedTimeCodeError(`Incomplete time range: "${line}"`);
  }
  return [parseTimeCode(startCode), parseTimeCode(endCode)];
}

/**
 * Reads the timed cues of an SRT document.
 *
 * Cue numbers and blank lines are skipped; each time range is paired with
 * the line right after it. Only the first text line of a cue is kept, and a
 * text line made of digits alone is mistaken for a cue number.
 */
export function parseSrtCues(content: string): SrtCue[] {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !CUE_NUMBER.test(line));

  const cues: SrtCue[] = [];
  lines.forEach((line, position) => {
    if (!line.includes(RANGE_MARKER)) {
      return;
    }
    const [startSeconds, endSeconds] = parseRange(line);
    const text = lines[position + 1];
    if (text === undefined || text.includes(RANGE_MARKER)) {
      throw new MalformedSrtCueError(`Time range "${line}" has no text line after it.`);
    }
    cues.push({ startSeconds, endSeconds, text });
  });
  return cues;
}

export function srtCuesToSpeechCues(cues: SrtCue[], timePadFactor = DEFAULT_TIME_PAD_FACTOR): SpeechCue[] {
  return cues.map((cue) => ({
    durationSeconds: paddedDuration(cue.startSeconds, cue.endSeconds, timePadFactor),
    text: cue.text
  }));
}
