import { Command, CommanderError, InvalidArgumentError } from "commander";
import fs from "node:fs";
import path from "node:path";

import { loadEnvConfig } from "../config";
import { SubtitleConfig, defaultOutputPath } from "../subtitles";
import { SubtitleConfigOptions, SubtitleFormat } from "../types";

export type TranscriptCommandOptions = {
  input: string;
  output: string;
  segmentSize?: number;
  keepTrailingPhrase: boolean;
};

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return parsed;
}

export function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

/** Options shared by every command that reads a transcription JSON file. */
export function buildTranscriptCommand(description: string, format: SubtitleFormat): Command {
  const program = new Command();
  program
    .description(description)
    .option("--input <path>", "Path to the transcription JSON", "transcript.json")
    .option("--output <path>", "Path for the generated file", defaultOutputPath(format))
    .option("--segment-size <count>", "Number of words and punctuation marks per cue", parseInteger)
    .option(
      "--keep-trailing-phrase",
      "Emit the final cue even when it holds fewer tokens than the segment size.",
      false
    );
  return program;
}

export function requireInputFile(inputPath: string): string {
  const resolved = path.resolve(inputPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Input file not found: ${resolved}`);
  }
  return resolved;
}

/** Command-line values take precedence over SUBTITLES_* environment defaults. */
export function resolveConfig(cli: SubtitleConfigOptions): SubtitleConfig {
  const fromEnv = loadEnvConfig();
  return new SubtitleConfig({
    segmentSize: cli.segmentSize ?? fromEnv.segmentSize,
    timePadFactor: cli.timePadFactor ?? fromEnv.timePadFactor,
    vttCueStyle: cli.vttCueStyle ?? fromEnv.vttCueStyle,
    keepTrailingPhrase: cli.keepTrailingPhrase
  });
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    // --help and --version surface as errors once exitOverride() is set
    return error.exitCode === 0 ? 0 : 1;
  }
  console.error(error instanceof Error ? error.message : String(error));
  return 1;
}

export function runAsScript(main: (argv: string[]) => Promise<number>): void {
  main(process.argv).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}
