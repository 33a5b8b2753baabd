import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { canonicalPathFor, discardIntermediates, normalizeAudio } from "./normalize.js";
import { ConversionFailed, FileNotFound } from "../errors.js";
import type { CommandRunner } from "../utils/process.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "normalize-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("canonicalPathFor", () => {
  it("swaps the extension for .wav", () => {
    expect(canonicalPathFor("/data/req.mp3")).toBe("/data/req.wav");
    expect(canonicalPathFor("/data/req")).toBe("/data/req.wav");
  });

  it("never targets the input itself", () => {
    expect(canonicalPathFor("/data/req.wav")).toBe("/data/req_mono16k.wav");
  });
});

describe("normalizeAudio", () => {
  it("runs ffmpeg with the canonical format arguments", async () => {
    const input = path.join(dir, "req.mp3");
    fs.writeFileSync(input, "mp3");
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: 0,
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0),
    }));

    const out = await normalizeAudio(input, { ffmpegCmd: "ffmpeg", timeoutMs: 1000, runner });

    expect(out).toBe(path.join(dir, "req.wav"));
    expect(path.extname(out)).toBe(".wav");
    expect(runner).toHaveBeenCalledWith(
      [
        "ffmpeg",
        "-i", input,
        "-vn",
        "-acodec", "pcm_s16le",
        "-ar", "16000",
        "-ac", "1",
        "-y",
        out,
      ],
      { timeoutMs: 1000 }
    );
  });

  it("fails before spawning anything when the input is missing", async () => {
    const runner = vi.fn<CommandRunner>();
    await expect(
      normalizeAudio(path.join(dir, "missing.mp3"), { ffmpegCmd: "ffmpeg", runner })
    ).rejects.toBeInstanceOf(FileNotFound);
    expect(runner).not.toHaveBeenCalled();
  });

  it("reports ffmpeg's stderr on a non-zero exit", async () => {
    const input = path.join(dir, "broken.ogg");
    fs.writeFileSync(input, "not audio");
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: 1,
      stdout: Buffer.alloc(0),
      stderr: Buffer.from("Invalid data found when processing input"),
    }));

    const attempt = normalizeAudio(input, { ffmpegCmd: "ffmpeg", runner });
    await expect(attempt).rejects.toBeInstanceOf(ConversionFailed);
    await expect(attempt).rejects.toMatchObject({
      stderrText: "Invalid data found when processing input",
    });
    expect(runner).toHaveBeenCalledTimes(1);
  });
});

describe("discardIntermediates", () => {
  it("removes existing files and skips missing ones", async () => {
    const a = path.join(dir, "a.mp3");
    const b = path.join(dir, "a.wav");
    fs.writeFileSync(a, "x");
    fs.writeFileSync(b, "y");

    await discardIntermediates([a, b, undefined, path.join(dir, "gone.wav"), a]);

    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
