import { renderPhraseText } from "./phrases";
import { formatTimeCode, parseTimeCode } from "./timecode";
import { Phrase, SpeechCue, SubtitleFormat, TimeCodeStyle } from "./types";

export const DEFAULT_TIME_PAD_FACTOR = 1.0;

export interface EmitOptions {
  timePadFactor?: number;
  vttCueStyle?: string;
}

/**
 * One output format. Every emitter takes the same phrase list, so the
 * segmenter runs once regardless of which document is wanted.
 */
export interface PhraseEmitter {
  readonly format: SubtitleFormat;
  readonly extension: string;
  emit(phrases: Phrase[], options?: EmitOptions): string;
}

function renderCues(phrases: Phrase[], style: TimeCodeStyle, rangeSuffix?: string): string {
  const chunks: string[] = [];
  phrases.forEach((phrase, index) => {
    const range = `${formatTimeCode(phrase.startSeconds, style)} --> ${formatTimeCode(phrase.endSeconds, style)}`;
    chunks.push(`${index + 1}\n${rangeSuffix ? `${range} ${rangeSuffix}` : range}\n${renderPhraseText(phrase)}\n\n`);
  });
  return chunks.join("");
}

/**
 * SubRip: `index`, `start --> end`, text, blank line, for every phrase.
 */
export class SrtEmitter implements PhraseEmitter {
  readonly format = "srt" as const;
  readonly extension = "srt";

  emit(phrases: Phrase[]): string {
    return renderCues(phrases, "srt");
  }
}

/**
 * WebVTT: the SRT layout behind a `WEBVTT` header, with dot millisecond
 * separators and the cue settings (e.g. `align:middle line:90%`) after each
 * time range.
 */
export class VttEmitter implements PhraseEmitter {
  readonly format = "vtt" as const;
  readonly extension = "vtt";

  emit(phrases: Phrase[], options: EmitOptions = {}): string {
    const style = options.vttCueStyle?.trim();
    return `WEBVTT\n\n${renderCues(phrases, "vtt", style)}`;
  }
}

/**
 * Two decimal places, ties to the even cent. `toFixed` alone sends exact
 * ties such as 2.625 up to 2.63.
 */
export function formatDuration(seconds: number): string {
  // Exact cent ties are the odd multiples of 1/8.
  if (Number.isInteger(seconds * 8) && !Number.isInteger(seconds * 4)) {
    let cents = Math.floor(seconds * 100);
    if (cents % 2 !== 0) {
      cents += 1;
    }
    return (cents / 100).toFixed(2);
  }
  return seconds.toFixed(2);
}

export function paddedDuration(startSeconds: number, endSeconds: number, timePadFactor: number): number {
  return (endSeconds - startSeconds) * timePadFactor;
}

/** Cue text goes in as-is; markup already present in it, such as `<i>`, is kept. */
export function renderSsml(cues: SpeechCue[]): string {
  let ssml = "<speak>\n";
  for (const cue of cues) {
    ssml += `<prosody amazon:max-duration="${formatDuration(cue.durationSeconds)}">${cue.text}</prosody>\n`;
  }
  ssml += "</speak>";
  return ssml;
}

/**
 * Durations come from the SRT time codes rather than the raw token times,
 * which keeps them identical to an SSML document derived from the SRT file.
 */
export function phrasesToSpeechCues(phrases: Phrase[], timePadFactor = DEFAULT_TIME_PAD_FACTOR): SpeechCue[] {
  return phrases.map((phrase) => {
    const start = parseTimeCode(formatTimeCode(phrase.startSeconds, "srt"));
    const end = parseTimeCode(formatTimeCode(phrase.endSeconds, "srt"));
    return {
      durationSeconds: paddedDuration(start, end, timePadFactor),
      text: renderPhraseText(phrase)
    };
  });
}

export class SsmlEmitter implements PhraseEmitter {
  readonly format = "ssml" as const;
  readonly extension = "ssml";

  emit(phrases: Phrase[], options: EmitOptions = {}): string {
    return renderSsml(phrasesToSpeechCues(phrases, options.timePadFactor));
  }
}

const EMITTERS: Record<SubtitleFormat, PhraseEmitter> = {
  srt: new SrtEmitter(),
  vtt: new VttEmitter(),
  ssml: new SsmlEmitter()
};

export function emitterFor(format: SubtitleFormat): PhraseEmitter {
  return EMITTERS[format];
}
