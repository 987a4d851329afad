import dotenv from "dotenv";
import fs from "node:fs";
import path from "node:path";

import { ConfigurationError } from "./errors";
import { SubtitleConfigOptions } from "./types";

export const ENV_SEGMENT_SIZE = "SUBTITLES_SEGMENT_SIZE";
export const ENV_TIME_PAD_FACTOR = "SUBTITLES_TIME_PAD_FACTOR";
export const ENV_VTT_STYLE = "SUBTITLES_VTT_STYLE";

type Env = Record<string, string | undefined>;

function loadEnvFile(filePath: string, env: Env): void {
  const parsed = dotenv.parse(fs.readFileSync(filePath, "utf-8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

function candidateEnvPaths(extraPaths?: string[]): string[] {
  const seen = new Set<string>();
  const add = (p: string): void => {
    seen.add(path.resolve(p));
  };

  for (const p of extraPaths ?? []) {
    add(p);
  }
  add(path.join(process.cwd(), ".env"));
  add(path.join(path.resolve(__dirname, ".."), ".env"));

  return Array.from(seen);
}

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}".`);
  }
  return value;
}

export interface LoadEnvConfigOptions {
  searchPaths?: string[];
  env?: Env;
}

/**
 * Subtitle defaults from the environment. `.env` files fill in variables
 * that are not already set; the first file to define a variable wins.
 */
export function loadEnvConfig(options: LoadEnvConfigOptions = {}): SubtitleConfigOptions {
  const env = options.env ?? process.env;
  for (const envPath of candidateEnvPaths(options.searchPaths)) {
    if (fs.existsSync(envPath)) {
      loadEnvFile(envPath, env);
    }
  }

  const config: SubtitleConfigOptions = {};

  const segmentSize = readNumber(env, ENV_SEGMENT_SIZE);
  if (segmentSize !== undefined) {
    if (!Number.isInteger(segmentSize) || segmentSize <= 0) {
      throw new ConfigurationError(`${ENV_SEGMENT_SIZE} must be a positive integer, got ${segmentSize}.`);
    }
    config.segmentSize = segmentSize;
  }

  const timePadFactor = readNumber(env, ENV_TIME_PAD_FACTOR);
  if (timePadFactor !== undefined) {
    if (timePadFactor <= 0) {
      throw new ConfigurationError(`${ENV_TIME_PAD_FACTOR} must be positive, got ${timePadFactor}.`);
    }
    config.timePadFactor = timePadFactor;
  }

  const style = env[ENV_VTT_STYLE]?.trim();
  if (style) {
    config.vttCueStyle = style;
  }

  return config;
}
