import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import { isDomainProfile, type DomainProfile } from "./constants.js";

// Which intake routes the server exposes
export interface RouteFlags {
  audioFile: boolean;
  audioUrl: boolean;
  youtube: boolean;
  cortex: boolean;
}

export interface ServiceConfig {
  audioDir: string;
  ffmpegCmd: string;
  ytdlpCmd: string;
  ffmpegTimeoutMs: number;
  ytdlpTimeoutMs: number;
  port: number;
  logLevel: string;
  apiKey?: string;
  routes: RouteFlags;
  // Analysis backend (ASR + diarization)
  asrBaseUrl: string; // e.g., http://localhost:5689
  asrTimeoutMs: number;
  diarizationDomain: DomainProfile;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function parseMs(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const audioDir = env.AUDIO_DIR || path.join(rootDir, "audio_file");
  const ffmpegCmd = env.FFMPEG_CMD || "ffmpeg";
  const ytdlpCmd = env.YTDLP_CMD || "yt-dlp";
  const port = parseInt(env.PORT || "5688", 10);

  const diarizationDomain = env.DIARIZATION_DOMAIN || "general";
  if (!isDomainProfile(diarizationDomain)) {
    throw new Error(
      `DIARIZATION_DOMAIN must be one of general, meeting, telephonic (got ${diarizationDomain})`
    );
  }

  // Only create directories that are actually needed (audio files)
  ensureDir(audioDir);

  return {
    audioDir,
    ffmpegCmd,
    ytdlpCmd,
    ffmpegTimeoutMs: parseMs(env.FFMPEG_TIMEOUT_MS, 600000),
    ytdlpTimeoutMs: parseMs(env.YTDLP_TIMEOUT_MS, 1800000),
    port,
    logLevel: env.LOG_LEVEL || "info",
    apiKey: env.API_KEY || undefined,
    routes: {
      audioFile: parseFlag(env.ENABLE_AUDIO_FILE, true),
      audioUrl: parseFlag(env.ENABLE_AUDIO_URL, true),
      youtube: parseFlag(env.ENABLE_YOUTUBE, true),
      cortex: parseFlag(env.ENABLE_CORTEX, true),
    },
    asrBaseUrl: env.ASR_BASE_URL || "http://localhost:5689",
    // Default 2 hours for full file processing
    asrTimeoutMs: Math.max(60000, parseMs(env.ASR_TIMEOUT_MS, 7200000)),
    diarizationDomain,
  };
}
