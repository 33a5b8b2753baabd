import path from "node:path";
import fs from "node:fs";
import { rm } from "node:fs/promises";
import {
  CANONICAL_CHANNELS,
  CANONICAL_CODEC,
  CANONICAL_SAMPLE_RATE,
} from "../constants.js";
import { ConversionFailed, FileNotFound } from "../errors.js";
import { logger } from "../utils/logger.js";
import { runExternal, type CommandRunner } from "../utils/process.js";

export interface NormalizeOptions {
  ffmpegCmd: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export function canonicalPathFor(filePath: string): string {
  const parsed = path.parse(filePath);
  const sameBase = path.join(parsed.dir, `${parsed.name}.wav`);
  // ffmpeg cannot transcode a file onto itself
  return sameBase === filePath ? path.join(parsed.dir, `${parsed.name}_mono16k.wav`) : sameBase;
}

/**
 * Transcodes any input ffmpeg can read into mono 16kHz PCM16 WAV, overwriting
 * a previous output. Failures are surfaced as is; retrying is the caller's call.
 */
export async function normalizeAudio(
  filePath: string,
  opts: NormalizeOptions
): Promise<string> {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFound(filePath);
  }

  const run = opts.runner ?? runExternal;
  const outPath = canonicalPathFor(filePath);
  const { exitCode, stderr } = await run(
    [
      opts.ffmpegCmd,
      "-i", filePath,
      "-vn",
      "-acodec", CANONICAL_CODEC,
      "-ar", String(CANONICAL_SAMPLE_RATE),
      "-ac", String(CANONICAL_CHANNELS),
      "-y",
      outPath,
    ],
    { timeoutMs: opts.timeoutMs }
  );

  if (exitCode !== 0) {
    throw new ConversionFailed(filePath, stderr.toString("utf8"));
  }

  logger.debug({ input: filePath, output: outPath }, "Converted to canonical wav");
  return outPath;
}

// Removes request-owned audio files; missing ones are skipped
export async function discardIntermediates(paths: Array<string | undefined>): Promise<void> {
  const unique = [...new Set(paths.filter((p): p is string => Boolean(p)))];
  await Promise.all(unique.map((p) => rm(p, { force: true })));
}
