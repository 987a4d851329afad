#!/usr/bin/env node
import { Command } from "commander";
import path from "node:path";

import { srt } from "../subtitles";
import {
  TranscriptCommandOptions,
  buildTranscriptCommand,
  exitCodeFor,
  requireInputFile,
  resolveConfig,
  runAsScript
} from "./common";

function buildCommand(): Command {
  return buildTranscriptCommand(
    "Convert a transcription JSON into an SRT subtitle file.",
    "srt"
  );
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<TranscriptCommandOptions>();
    const inputPath = requireInputFile(options.input);
    const config = resolveConfig({
      segmentSize: options.segmentSize,
      keepTrailingPhrase: options.keepTrailingPhrase
    });

    srt(inputPath, options.output, config);
    console.info(`Wrote subtitles to ${path.resolve(options.output)}`);
    return 0;
  } catch (error) {
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  runAsScript(main);
}

export default main;
