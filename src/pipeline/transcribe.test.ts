import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { transcribeAudio, type PipelineConfig } from "./transcribe.js";
import type { AnalysisBackend, AnalysisJob } from "../backend/analysis.js";
import { ConversionFailed } from "../errors.js";
import { createTranscriptionOptions } from "../models.js";
import type { CommandRunner } from "../utils/process.js";
import type { RawTranscriptSegment } from "../types.js";

let dir: string;
let config: PipelineConfig;

const segments: RawTranscriptSegment[] = [
  { start: 0, end: 1000, speaker: 0, text: "Hello ... World!" },
  { start: 1000, end: 2000, speaker: 0, text: "  " },
];

class FakeBackend implements AnalysisBackend {
  jobs: AnalysisJob[] = [];
  manifests: string[] = [];

  async analyze(job: AnalysisJob): Promise<RawTranscriptSegment[]> {
    this.jobs.push(job);
    this.manifests.push(fs.readFileSync(job.diarization.manifestPath, "utf-8"));
    return segments;
  }
}

const succeed: CommandRunner = async () => ({
  exitCode: 0,
  stdout: Buffer.alloc(0),
  stderr: Buffer.alloc(0),
});

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "pipeline-"));
  config = {
    audioDir: dir,
    ffmpegCmd: "ffmpeg",
    ytdlpCmd: "yt-dlp",
    ffmpegTimeoutMs: 1000,
    ytdlpTimeoutMs: 1000,
    diarizationDomain: "general",
  };
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("transcribeAudio", () => {
  it("formats the backend transcript and drops empty segments", async () => {
    const upload = path.join(dir, "req-1.mp3");
    fs.writeFileSync(upload, "mp3");
    const backend = new FakeBackend();

    const response = await transcribeAudio(
      {
        requestId: "req-1",
        source: { kind: "local", path: upload },
        options: createTranscriptionOptions({ timestamps: "s" }),
      },
      { config, backend, runner: succeed }
    );

    expect(response).toEqual({
      utterances: [{ speaker: 0, start: 0, end: 1, text: "Hello World!" }],
      alignment: false,
      source_lang: "en",
      timestamps: "s",
    });
    expect(backend.jobs[0].wavPath).toBe(path.join(dir, "req-1.wav"));
    expect(backend.jobs[0].diarization.manifestPath).toBe(
      path.join(dir, "req-1_diarization", "infer_manifest.json")
    );
    expect(JSON.parse(backend.manifests[0]).audio_filepath).toBe(path.join(dir, "req-1.wav"));
  });

  it("echoes job and request ids in batch mode", async () => {
    const upload = path.join(dir, "req-2.ogg");
    fs.writeFileSync(upload, "ogg");

    const response = await transcribeAudio(
      {
        requestId: "req-2",
        source: { kind: "local", path: upload },
        options: createTranscriptionOptions({ timestamps: "hms" }),
        jobName: "job_abc123",
      },
      { config, backend: new FakeBackend(), runner: succeed }
    );

    expect(response.job_name).toBe("job_abc123");
    expect(response.request_id).toBe("req-2");
    expect(response.utterances[0]).toEqual({
      speaker: 0,
      start: "00:00:00.000",
      end: "00:00:01.000",
      text: "Hello World!",
    });
  });

  it("cleans up intermediates after a run", async () => {
    const upload = path.join(dir, "req-3.mp3");
    fs.writeFileSync(upload, "mp3");
    const runner = vi.fn<CommandRunner>(async (command) => {
      fs.writeFileSync(command[command.length - 1], "wav");
      return succeed(command);
    });

    await transcribeAudio(
      {
        requestId: "req-3",
        source: { kind: "local", path: upload },
        options: createTranscriptionOptions({}),
      },
      { config, backend: new FakeBackend(), runner }
    );

    expect(runner).toHaveBeenCalledTimes(1);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("runs a video source through extraction and normalization", async () => {
    const backend = new FakeBackend();
    const runner = vi.fn<CommandRunner>(async (command) => {
      const out =
        command[0] === "yt-dlp" ? `${command[command.indexOf("-o") + 1]}.wav` : command[command.length - 1];
      fs.writeFileSync(out, "wav");
      return succeed(command);
    });

    await transcribeAudio(
      {
        requestId: "req-5",
        source: { kind: "video", url: "https://video.example.com/watch?v=abc", target: path.join(dir, "req-5") },
        options: createTranscriptionOptions({}),
      },
      { config, backend, runner }
    );

    expect(runner).toHaveBeenCalledTimes(2);
    const ffmpeg = runner.mock.calls[1][0];
    expect(ffmpeg[0]).toBe("ffmpeg");
    expect(ffmpeg[ffmpeg.indexOf("-i") + 1]).toBe(path.join(dir, "req-5.wav"));
    expect(ffmpeg[ffmpeg.length - 1]).toBe(path.join(dir, "req-5_mono16k.wav"));
    expect(backend.jobs[0].wavPath).toBe(path.join(dir, "req-5_mono16k.wav"));
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("propagates a conversion failure and still cleans up", async () => {
    const upload = path.join(dir, "req-4.mp3");
    fs.writeFileSync(upload, "mp3");
    const backend = new FakeBackend();
    const failing: CommandRunner = async () => ({
      exitCode: 1,
      stdout: Buffer.alloc(0),
      stderr: Buffer.from("moov atom not found"),
    });

    await expect(
      transcribeAudio(
        {
          requestId: "req-4",
          source: { kind: "local", path: upload },
          options: createTranscriptionOptions({}),
        },
        { config, backend, runner: failing }
      )
    ).rejects.toBeInstanceOf(ConversionFailed);
    expect(backend.jobs).toHaveLength(0);
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
