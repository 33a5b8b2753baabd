import path from "node:path";
import fs from "node:fs";
import { open, rm, type FileHandle } from "node:fs/promises";
import { request, type Dispatcher } from "undici";
import {
  AUDIO_EXTENSIONS,
  DOWNLOAD_CHUNK_BYTES,
  MAX_DOWNLOAD_REDIRECTS,
  UNKNOWN_EXTENSION,
} from "../constants.js";
import { DownloadFailed, ExtractionFailed, FileNotFound } from "../errors.js";
import { logger } from "../utils/logger.js";
import { runExternal, type CommandRunner } from "../utils/process.js";
import type { AcquisitionResult, AudioSource } from "../types.js";

export interface DownloadOptions {
  dispatcher?: Dispatcher;
}

export interface VideoDownloadOptions {
  ytdlpCmd: string;
  ffmpegCmd: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export type AcquireDeps = DownloadOptions & VideoDownloadOptions;

export function extensionForContentType(contentType: string | undefined): string {
  if (!contentType) return UNKNOWN_EXTENSION;
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  return AUDIO_EXTENSIONS[mediaType] ?? UNKNOWN_EXTENSION;
}

export function mediaTypeForPath(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  const match = Object.entries(AUDIO_EXTENSIONS).find(([, e]) => e === ext);
  return match ? match[0] : "application/octet-stream";
}

export async function acquireLocalFile(filePath: string): Promise<AcquisitionResult> {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFound(filePath);
  }
  return { path: filePath, mediaType: mediaTypeForPath(filePath) };
}

/**
 * Streams a remote audio file to `target` plus an extension taken from the
 * declared content type. Redirects are followed; nothing is written unless
 * the final response is a 200.
 */
export async function downloadAudioFile(
  url: string,
  target: string,
  headers: Readonly<Record<string, string>> = {},
  opts: DownloadOptions = {}
): Promise<AcquisitionResult> {
  logger.info({ url, target }, "Downloading audio file");
  const { statusCode, headers: resHeaders, body } = await request(url, {
    method: "GET",
    headers: { ...headers },
    maxRedirections: MAX_DOWNLOAD_REDIRECTS,
    dispatcher: opts.dispatcher,
  });

  if (statusCode !== 200) {
    await body.dump();
    throw new DownloadFailed(url, statusCode);
  }

  const declared = resHeaders["content-type"];
  const contentType = Array.isArray(declared) ? declared[0] : declared;
  const outPath = `${target}${extensionForContentType(contentType)}`;
  logger.info({ outPath }, "New file name");

  let handle: FileHandle;
  try {
    handle = await open(outPath, "w");
  } catch (err) {
    // release the connection before giving up
    await body.dump();
    throw err;
  }
  try {
    for await (const chunk of body) {
      const buf: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      for (let offset = 0; offset < buf.length; offset += DOWNLOAD_CHUNK_BYTES) {
        await handle.write(buf.subarray(offset, offset + DOWNLOAD_CHUNK_BYTES));
      }
    }
  } catch (err) {
    await handle.close();
    await rm(outPath, { force: true });
    throw err;
  }
  await handle.close();

  return {
    path: outPath,
    mediaType: contentType?.split(";")[0].trim() || "application/octet-stream",
  };
}

/**
 * Pulls the best audio-only stream with yt-dlp and lets its ffmpeg
 * post-processor write `<target>.wav`. The result still goes through
 * the normalizer: yt-dlp does not guarantee mono 16kHz PCM16.
 */
export async function downloadVideoAudio(
  url: string,
  target: string,
  opts: VideoDownloadOptions
): Promise<AcquisitionResult> {
  const run = opts.runner ?? runExternal;
  const outPath = `${target}.wav`;

  logger.info({ url, target }, "Downloading audio track with yt-dlp");
  const { exitCode, stderr } = await run(
    [
      opts.ytdlpCmd,
      "-f", "bestaudio",
      "-x",
      "--audio-format", "wav",
      // A bare command name is resolved from PATH by yt-dlp itself
      ...(opts.ffmpegCmd.includes(path.sep) ? ["--ffmpeg-location", opts.ffmpegCmd] : []),
      "--no-progress",
      "-o", target,
      url,
    ],
    { timeoutMs: opts.timeoutMs }
  );

  if (exitCode !== 0) {
    throw new ExtractionFailed(url, stderr.toString("utf8"));
  }
  // Verify the file was created
  if (!fs.existsSync(outPath)) {
    throw new ExtractionFailed(url, `yt-dlp did not produce ${outPath}`);
  }
  return { path: outPath, mediaType: "audio/wav" };
}

export async function acquireAudio(
  source: AudioSource,
  deps: AcquireDeps
): Promise<AcquisitionResult> {
  switch (source.kind) {
    case "local":
      return acquireLocalFile(source.path);
    case "remote":
      return downloadAudioFile(source.url, source.target, source.headers, {
        dispatcher: deps.dispatcher,
      });
    case "video":
      return downloadVideoAudio(source.url, source.target, deps);
  }
}
