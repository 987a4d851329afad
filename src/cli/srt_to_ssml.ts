#!/usr/bin/env node
import { Command } from "commander";
import path from "node:path";

import { defaultOutputPath, ssmlFromSrt } from "../subtitles";
import { exitCodeFor, parseDecimal, requireInputFile, resolveConfig, runAsScript } from "./common";

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Read an SRT file and write SSML that keeps each cue within its original duration.")
    .option("--input <path>", "Path to the SRT file", defaultOutputPath("srt"))
    .option("--output <path>", "Path for the generated SSML file", defaultOutputPath("ssml"))
    .option(
      "--time-pad <factor>",
      "Multiplier applied to each cue duration (1.0 keeps the original pacing)",
      parseDecimal
    );
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{
      input: string;
      output: string;
      timePad?: number;
    }>();
    const inputPath = requireInputFile(options.input);
    const config = resolveConfig({ timePadFactor: options.timePad });
    console.info(`Time padding: ${config.time_pad_factor} (${Math.round(config.time_pad_factor * 100)}%)`);

    ssmlFromSrt(inputPath, options.output, config);
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
