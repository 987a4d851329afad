import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import srtToSsmlMain from "../src/cli/srt_to_ssml";
import toSrtMain from "../src/cli/to_srt";
import toSsmlMain from "../src/cli/to_ssml";
import toVttMain from "../src/cli/to_vtt";
import { ENV_SEGMENT_SIZE, ENV_TIME_PAD_FACTOR, ENV_VTT_STYLE } from "../src/config";
import { SAMPLE_SRT, srtPath, transcriptPath } from "./fixtures";

const ENV_VARS = [ENV_SEGMENT_SIZE, ENV_TIME_PAD_FACTOR, ENV_VTT_STYLE];
let savedEnv: Record<string, string | undefined> = {};

function tempOutput(name: string): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "transcript-subtitles-"));
  return path.join(tmpDir, name);
}

beforeEach(() => {
  savedEnv = {};
  for (const name of ENV_VARS) {
    savedEnv[name] = process.env[name];
    delete process.env[name];
  }
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  for (const name of ENV_VARS) {
    const value = savedEnv[name];
    if (value !== undefined) {
      process.env[name] = value;
    } else {
      delete process.env[name];
    }
  }
  vi.restoreAllMocks();
});

describe("CLI", () => {
  it("converts JSON to SRT", async () => {
    const output = tempOutput("subtitles.srt");
    const exitCode = await toSrtMain(["node", "to_srt", "--input", transcriptPath, "--output", output]);

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(output, "utf-8")).toBe(SAMPLE_SRT);
  });

  it("converts JSON to WebVTT with a cue style", async () => {
    const output = tempOutput("subtitles.vtt");
    const exitCode = await toVttMain([
      "node",
      "to_vtt",
      "--input",
      transcriptPath,
      "--output",
      output,
      "--style",
      "align:middle"
    ]);

    expect(exitCode).toBe(0);
    const lines = fs.readFileSync(output, "utf-8").split("\n");
    expect(lines[0]).toBe("WEBVTT");
    expect(lines[3]).toBe("00:00:00.000 --> 00:00:03.250 align:middle");
  });

  it("converts JSON to SSML with time padding", async () => {
    const output = tempOutput("speech.ssml");
    const exitCode = await toSsmlMain([
      "node",
      "to_ssml",
      "--input",
      transcriptPath,
      "--output",
      output,
      "--time-pad",
      "2"
    ]);

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(output, "utf-8")).toBe(
      "<speak>\n" +
        '<prosody amazon:max-duration="6.50">Hello, and welcome to the show. Today we</prosody>\n' +
        '<prosody amazon:max-duration="7.00">talk about captions, timing, and speech synthesis.</prosody>\n' +
        "</speak>"
    );
  });

  it("converts SRT to SSML", async () => {
    const output = tempOutput("speech.ssml");
    const exitCode = await srtToSsmlMain(["node", "srt_to_ssml", "--input", srtPath, "--output", output]);

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(output, "utf-8")).toBe(
      "<speak>\n" +
        '<prosody amazon:max-duration="2.00">Good morning, everyone.</prosody>\n' +
        '<prosody amazon:max-duration="2.75">Let us begin with the agenda.</prosody>\n' +
        "</speak>"
    );
  });

  it("takes the segment size from the environment", async () => {
    process.env[ENV_SEGMENT_SIZE] = "20";
    const output = tempOutput("subtitles.srt");
    const exitCode = await toSrtMain(["node", "to_srt", "--input", transcriptPath, "--output", output]);

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(output, "utf-8")).toBe(
      "1\n00:00:00,000 --> 00:00:06,750\n" +
        "Hello, and welcome to the show. Today we talk about captions, timing, and speech synthesis.\n\n"
    );
  });

  it("fails when the input file is missing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const missing = path.join(os.tmpdir(), "missing-transcript.json");
    expect(await toSrtMain(["node", "to_srt", "--input", missing])).toBe(1);
  });

  it("fails on a non-positive time pad", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const output = tempOutput("speech.ssml");
    const exitCode = await srtToSsmlMain([
      "node",
      "srt_to_ssml",
      "--input",
      srtPath,
      "--output",
      output,
      "--time-pad",
      "0"
    ]);

    expect(exitCode).toBe(1);
    expect(fs.existsSync(output)).toBe(false);
  });

  it("fails on a malformed transcript", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const exitCode = await toSrtMain([
      "node",
      "to_srt",
      "--input",
      srtPath,
      "--output",
      tempOutput("subtitles.srt")
    ]);

    expect(exitCode).toBe(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain("is not valid JSON");
  });
});
