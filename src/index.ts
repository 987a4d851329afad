export {
  SubtitleConfig,
  convertSrtToSsml,
  convertTranscript,
  defaultOutputPath,
  srt,
  ssml,
  ssmlFromSrt,
  transcriptToPhrases,
  vtt,
  writeSubtitleFile
} from "./subtitles";

export {
  DEFAULT_TIME_PAD_FACTOR,
  SrtEmitter,
  SsmlEmitter,
  VttEmitter,
  emitterFor,
  formatDuration,
  phrasesToSpeechCues,
  renderSsml
} from "./formats";

export type { EmitOptions, PhraseEmitter } from "./formats";

export { DEFAULT_SEGMENT_SIZE, renderPhraseText, segmentPhrases } from "./phrases";

export type { SegmentOptions } from "./phrases";

export { formatTimeCode, parseTimeCode } from "./timecode";

export { parseSrtCues, srtCuesToSpeechCues } from "./srt";

export { extractTokens, loadTranscript } from "./transcript";

export {
  ENV_SEGMENT_SIZE,
  ENV_TIME_PAD_FACTOR,
  ENV_VTT_STYLE,
  loadEnvConfig
} from "./config";

export {
  ConfigurationError,
  MalformedSrtCueError,
  MalformedTimeCodeError,
  MalformedTranscriptError,
  SubtitleError
} from "./errors";

export type {
  Phrase,
  PunctuationToken,
  SpeechCue,
  SrtCue,
  SubtitleConfigOptions,
  SubtitleFormat,
  TimeCodeStyle,
  Token,
  Transcript,
  TranscriptItem,
  WordToken
} from "./types";
