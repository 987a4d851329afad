#!/usr/bin/env node
import { Command } from "commander";
import path from "node:path";

import { ssml } from "../subtitles";
import {
  TranscriptCommandOptions,
  buildTranscriptCommand,
  exitCodeFor,
  parseDecimal,
  requireInputFile,
  resolveConfig,
  runAsScript
} from "./common";

function buildCommand(): Command {
  return buildTranscriptCommand(
    "Convert a transcription JSON into SSML with a maximum duration per phrase.",
    "ssml"
  ).option(
    "--time-pad <factor>",
    "Multiplier applied to each phrase duration (1.0 keeps the original pacing)",
    parseDecimal
  );
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<TranscriptCommandOptions & { timePad?: number }>();
    const inputPath = requireInputFile(options.input);
    const config = resolveConfig({
      segmentSize: options.segmentSize,
      keepTrailingPhrase: options.keepTrailingPhrase,
      timePadFactor: options.timePad
    });
    console.info(`Time padding: ${config.time_pad_factor} (${Math.round(config.time_pad_factor * 100)}%)`);

    ssml(inputPath, options.output, config);
    console.info(`Wrote SSML to ${path.resolve(options.output)}`);
    return 0;
  } catch (error) {
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  runAsScript(main);
}

export default main;
