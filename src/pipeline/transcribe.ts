import path from "node:path";
import crypto from "node:crypto";
import { rm } from "node:fs/promises";
import type { Dispatcher } from "undici";
import type { ServiceConfig } from "../config.js";
import type { AnalysisBackend } from "../backend/analysis.js";
import { formatUtterances } from "../format/text.js";
import { assembleResponse } from "../format/response.js";
import { logger } from "../utils/logger.js";
import type { CommandRunner } from "../utils/process.js";
import type {
  AcquisitionResult,
  AudioSource,
  TranscriptionOptions,
  TranscriptionResponse,
} from "../types.js";
import { acquireAudio } from "./acquire.js";
import { discardIntermediates, normalizeAudio } from "./normalize.js";
import { buildDiarizationConfig } from "./diarization.js";

export type PipelineConfig = Pick<
  ServiceConfig,
  "audioDir" | "ffmpegCmd" | "ytdlpCmd" | "ffmpegTimeoutMs" | "ytdlpTimeoutMs" | "diarizationDomain"
>;

export interface PipelineDeps {
  config: PipelineConfig;
  backend: AnalysisBackend;
  runner?: CommandRunner;
  dispatcher?: Dispatcher;
}

export interface TranscriptionRequest {
  requestId: string;
  source: AudioSource;
  options: TranscriptionOptions;
  jobName?: string;
}

export function newRequestId(): string {
  return crypto.randomUUID();
}

// Every file a request writes lives under names derived from its id
export function requestRoot(audioDir: string, requestId: string): string {
  return path.join(audioDir, requestId);
}

/**
 * Runs one request end to end: acquire, normalize, diarization prep,
 * backend analysis, formatting. Audio intermediates and the diarization
 * workspace are removed whether or not the run succeeds.
 */
export async function transcribeAudio(
  req: TranscriptionRequest,
  deps: PipelineDeps
): Promise<TranscriptionResponse> {
  const { config } = deps;
  const root = requestRoot(config.audioDir, req.requestId);
  const diarizationDir = `${root}_diarization`;
  const log = logger.child({ requestId: req.requestId, source: req.source.kind });

  let acquired: AcquisitionResult | undefined;
  let wavPath: string | undefined;
  try {
    acquired = await acquireAudio(req.source, {
      dispatcher: deps.dispatcher,
      runner: deps.runner,
      ytdlpCmd: config.ytdlpCmd,
      ffmpegCmd: config.ffmpegCmd,
      timeoutMs: config.ytdlpTimeoutMs,
    });
    log.info({ path: acquired.path, mediaType: acquired.mediaType }, "Audio acquired");

    wavPath = await normalizeAudio(acquired.path, {
      ffmpegCmd: config.ffmpegCmd,
      timeoutMs: config.ffmpegTimeoutMs,
      runner: deps.runner,
    });

    const diarization = await buildDiarizationConfig(
      config.diarizationDomain,
      diarizationDir,
      path.join(diarizationDir, "outputs"),
      wavPath
    );

    const segments = await deps.backend.analyze({
      requestId: req.requestId,
      wavPath,
      options: req.options,
      diarization,
    });

    const utterances = formatUtterances(segments, req.options.timestamps);
    log.info({ segments: segments.length, utterances: utterances.length }, "Transcript formatted");

    return req.jobName !== undefined
      ? assembleResponse(utterances, req.options, req.jobName, req.requestId)
      : assembleResponse(utterances, req.options);
  } finally {
    await discardIntermediates([acquired?.path, wavPath]);
    await rm(diarizationDir, { recursive: true, force: true });
  }
}
