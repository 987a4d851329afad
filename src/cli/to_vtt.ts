#!/usr/bin/env node
import { Command } from "commander";
import path from "node:path";

import { vtt } from "../subtitles";
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
    "Convert a transcription JSON into a WebVTT caption file.",
    "vtt"
  ).option(
    "--style <settings>",
    'Cue settings appended to every time range, e.g. "align:middle line:90%"'
  );
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<TranscriptCommandOptions & { style?: string }>();
    const inputPath = requireInputFile(options.input);
    const config = resolveConfig({
      segmentSize: options.segmentSize,
      keepTrailingPhrase: options.keepTrailingPhrase,
      vttCueStyle: options.style
    });

    vtt(inputPath, options.output, config);
    console.info(`Wrote captions to ${path.resolve(options.output)}`);
    return 0;
  } catch (error) {
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  runAsScript(main);
}

export default main;
