import { MalformedTimeCodeError } from "./errors";
import { TimeCodeStyle } from "./types";

const TIME_CODE_PATTERN = /^(?:(\d+):)?(\d+):(\d{1,2})(?:[,.](\d{1,9}))?$/;

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}

/**
 * Formats a non-negative number of seconds as `00:MM:SS,mmm` (SRT) or
 * `00:MM:SS.mmm` (WebVTT).
 *
 * The hour field is always `00`: minutes keep counting past 59, so anything
 * at or beyond one hour yields a code such as `00:62:05,000` that players
 * will not accept. Captions produced here are expected to be short-form.
 * Milliseconds are truncated, not rounded.
 */
export function formatTimeCode(seconds: number, style: TimeCodeStyle = "srt"): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new MalformedTimeCodeError(`Cannot format a time code for ${seconds} seconds.`);
  }
  // Settle to whole microseconds before truncating so 1.1 stays 1.100, not 1.099.
  const millis = Math.floor(Math.round(seconds * 1_000_000) / 1000);
  const remainderMillis = millis % 1000;
  const totalSeconds = Math.floor(millis / 1000);
  const secs = totalSeconds % 60;
  const minutes = Math.floor(totalSeconds / 60);
  const separator = style === "vtt" ? "." : ",";
  return `00:${pad(minutes, 2)}:${pad(secs, 2)}${separator}${pad(remainderMillis, 3)}`;
}

/**
 * Parses `HH:MM:SS,mmm`, `HH:MM:SS.mmm` or `MM:SS.mmm` back into seconds.
 * Minutes are not range-checked so that codes from {@link formatTimeCode}
 * past the one hour mark still read back to the value they were made from.
 */
export function parseTimeCode(text: string): number {
  const match = TIME_CODE_PATTERN.exec(text.trim());
  if (!match) {
    throw new MalformedTimeCodeError(`Unrecognized time code: "${text}"`);
  }
  const [, hoursRaw, minutesRaw, secondsRaw, fractionRaw] = match;
  const hours = hoursRaw === undefined ? 0 : parseInt(hoursRaw, 10);
  const minutes = parseInt(minutesRaw, 10);
  const seconds = parseInt(secondsRaw, 10);
  if (seconds >= 60) {
    throw new MalformedTimeCodeError(`Seconds out of range in time code: "${text}"`);
  }
  const fraction = fractionRaw === undefined ? 0 : Number(`0.${fractionRaw}`);
  return hours * 3600 + minutes * 60 + seconds + fraction;
}
