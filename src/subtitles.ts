import fs from "node:fs";
import path from "node:path";

import { ConfigurationError } from "./errors";
import { DEFAULT_TIME_PAD_FACTOR, EmitOptions, emitterFor, renderSsml } from "./formats";
import { DEFAULT_SEGMENT_SIZE, assertSegmentSize, segmentPhrases } from "./phrases";
import { parseSrtCues, srtCuesToSpeechCues } from "./srt";
import { extractTokens, loadTranscript } from "./transcript";
import { Phrase, SubtitleConfigOptions, SubtitleFormat, Transcript, TranscriptItem } from "./types";

export class SubtitleConfig {
  segment_size: number;
  time_pad_factor: number;
  vtt_cue_style: string | undefined;
  keep_trailing_phrase: boolean;

  constructor(options: SubtitleConfigOptions = {}) {
    this.segment_size = options.segmentSize ?? DEFAULT_SEGMENT_SIZE;
    assertSegmentSize(this.segment_size);
    this.time_pad_factor = options.timePadFactor ?? DEFAULT_TIME_PAD_FACTOR;
    if (!Number.isFinite(this.time_pad_factor) || this.time_pad_factor <= 0) {
      throw new ConfigurationError(`Time pad factor must be a positive number, got ${this.time_pad_factor}.`);
    }
    const style = options.vttCueStyle?.trim();
    this.vtt_cue_style = style ? style : undefined;
    this.keep_trailing_phrase = options.keepTrailingPhrase ?? false;
  }

  emitOptions(): EmitOptions {
    return {
      timePadFactor: this.time_pad_factor,
      vttCueStyle: this.vtt_cue_style
    };
  }
}

type TranscriptInput = Transcript | TranscriptItem[];

/** `subtitles.srt`, `subtitles.vtt` or `speech.ssml`. */
export function defaultOutputPath(format: SubtitleFormat): string {
  const stem = format === "ssml" ? "speech" : "subtitles";
  return `${stem}.${emitterFor(format).extension}`;
}

export function transcriptToPhrases(
  transcript: TranscriptInput,
  config: SubtitleConfig = new SubtitleConfig()
): Phrase[] {
  return segmentPhrases(extractTokens(transcript), {
    segmentSize: config.segment_size,
    keepTrailingPhrase: config.keep_trailing_phrase
  });
}

export function convertTranscript(
  transcript: TranscriptInput,
  format: SubtitleFormat,
  config: SubtitleConfig = new SubtitleConfig()
): string {
  const phrases = transcriptToPhrases(transcript, config);
  return emitterFor(format).emit(phrases, config.emitOptions());
}

export function convertSrtToSsml(srtText: string, config: SubtitleConfig = new SubtitleConfig()): string {
  return renderSsml(srtCuesToSpeechCues(parseSrtCues(srtText), config.time_pad_factor));
}

export function writeSubtitleFile(content: string, outputPath: string): string {
  const resolved = path.resolve(outputPath);
  fs.writeFileSync(resolved, content, { encoding: "utf-8" });
  return resolved;
}

function writeFromTranscript(
  transcript: TranscriptInput | string,
  format: SubtitleFormat,
  outputPath: string,
  config: SubtitleConfig
): string {
  const data = typeof transcript === "string" ? loadTranscript(transcript) : transcript;
  const phrases = transcriptToPhrases(data, config);
  if (phrases.length === 0) {
    console.warn(`Transcript produced no ${format.toUpperCase()} cues; writing an empty document.`);
  }
  const content = emitterFor(format).emit(phrases, config.emitOptions());
  const resolvedOutput = path.resolve(outputPath);
  console.info(`Writing ${phrases.length} ${format.toUpperCase()} cues to ${resolvedOutput}`);
  return writeSubtitleFile(content, resolvedOutput);
}

export function srt(
  transcript: TranscriptInput | string,
  outputPath = defaultOutputPath("srt"),
  config: SubtitleConfig = new SubtitleConfig()
): string {
  return writeFromTranscript(transcript, "srt", outputPath, config);
}

export function vtt(
  transcript: TranscriptInput | string,
  outputPath = defaultOutputPath("vtt"),
  config: SubtitleConfig = new SubtitleConfig()
): string {
  return writeFromTranscript(transcript, "vtt", outputPath, config);
}

export function ssml(
  transcript: TranscriptInput | string,
  outputPath = defaultOutputPath("ssml"),
  config: SubtitleConfig = new SubtitleConfig()
): string {
  return writeFromTranscript(transcript, "ssml", outputPath, config);
}

export function ssmlFromSrt(
  srtPath: string,
  outputPath = defaultOutputPath("ssml"),
  config: SubtitleConfig = new SubtitleConfig()
): string {
  const resolved = path.resolve(srtPath);
  console.info(`Loading SRT from ${resolved}`);
  const cues = parseSrtCues(fs.readFileSync(resolved, "utf-8"));
  if (cues.length === 0) {
    console.warn(`No timed cues found in ${resolved}; writing an empty document.`);
  }
  const content = renderSsml(srtCuesToSpeechCues(cues, config.time_pad_factor));
  const resolvedOutput = path.resolve(outputPath);
  console.info(`Writing ${cues.length} SSML cues to ${resolvedOutput}`);
  return writeSubtitleFile(content, resolvedOutput);
}
