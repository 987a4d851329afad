export interface TranscriptAlternative {
  content?: string;
  confidence?: string;
  [key: string]: unknown;
}

export interface TranscriptItem {
  type?: string;
  start_time?: string | number;
  end_time?: string | number;
  alternatives?: TranscriptAlternative[];
  [key: string]: unknown;
}

export interface Transcript {
  jobName?: string;
  results?: {
    transcripts?: { transcript?: string }[];
    items?: TranscriptItem[];
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export interface WordToken {
  kind: "word";
  text: string;
  startSeconds: number;
  endSeconds: number;
}

export interface PunctuationToken {
  kind: "punctuation";
  text: string;
}

export type Token = WordToken | PunctuationToken;

export interface Phrase {
  startSeconds: number;
  endSeconds: number;
  tokens: Token[];
}

export interface SrtCue {
  startSeconds: number;
  endSeconds: number;
  text: string;
}

export interface SpeechCue {
  durationSeconds: number;
  text: string;
}

export type SubtitleFormat = "srt" | "vtt" | "ssml";

export type TimeCodeStyle = "srt" | "vtt";

export interface SubtitleConfigOptions {
  segmentSize?: number;
  timePadFactor?: number;
  vttCueStyle?: string;
  keepTrailingPhrase?: boolean;
}
