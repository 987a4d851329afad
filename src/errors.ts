export class SubtitleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubtitleError";
  }
}

export class MalformedTranscriptError extends SubtitleError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedTranscriptError";
  }
}

export class MalformedTimeCodeError extends SubtitleError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedTimeCodeError";
  }
}

export class MalformedSrtCueError extends SubtitleError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedSrtCueError";
  }
}

export class ConfigurationError extends SubtitleError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
