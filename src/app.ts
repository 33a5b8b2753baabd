import Fastify, { type FastifyError } from "fastify";
import { z } from "zod";
import fs from "node:fs";
import { rm } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Dispatcher } from "undici";
import type { ServiceConfig } from "./config.js";
import {
  AnalysisFailed,
  AnalysisTimeout,
  ConversionFailed,
  DownloadFailed,
  ExtractionFailed,
  FileNotFound,
  InvalidRequestOption,
  InvalidTimestampUnit,
  ProcessTimeout,
  TranscribeError,
} from "./errors.js";
import { createAudioSource, createTranscriptionOptions, toInvalidOption } from "./models.js";
import { HttpAnalysisBackend, type AnalysisBackend } from "./backend/analysis.js";
import { extensionForContentType } from "./pipeline/acquire.js";
import { newRequestId, requestRoot, transcribeAudio } from "./pipeline/transcribe.js";
import type { CommandRunner } from "./utils/process.js";

export interface AppDeps {
  config: ServiceConfig;
  backend?: AnalysisBackend;
  runner?: CommandRunner;
  dispatcher?: Dispatcher;
}

const UrlRequestSchema = z.object({
  url: z.string().url(),
  alignment: z.boolean().optional(),
  source_lang: z.string().optional(),
  timestamps: z.string().optional(),
  job_name: z.string().min(1).optional(),
});

const AudioUrlRequestSchema = UrlRequestSchema.extend({
  headers: z.record(z.string()).optional(),
});

// Single entry point for the job platform; dispatches on url_type
const CortexRequestSchema = z.object({
  url_type: z.enum(["audio_url", "youtube"]).default("audio_url"),
  url: z.string().url().optional(),
  api_key: z.string().optional(),
  alignment: z.boolean().optional(),
  source_lang: z.string().optional(),
  timestamps: z.string().optional(),
  job_name: z.string().min(1).optional(),
  ping: z.boolean().default(false),
});

const BodyApiKeySchema = z.object({ api_key: z.string() });

const UploadQuerySchema = z.object({
  alignment: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
  source_lang: z.string().optional(),
  timestamps: z.string().optional(),
  job_name: z.string().min(1).optional(),
});

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw toInvalidOption(parsed.error);
  }
  return parsed.data;
}

export function statusCodeFor(error: Error): number {
  if (error instanceof InvalidRequestOption || error instanceof InvalidTimestampUnit) return 400;
  if (error instanceof FileNotFound) return 404;
  if (error instanceof ConversionFailed) return 422;
  if (
    error instanceof DownloadFailed ||
    error instanceof ExtractionFailed ||
    error instanceof AnalysisFailed
  ) {
    return 502;
  }
  if (error instanceof ProcessTimeout || error instanceof AnalysisTimeout) return 504;
  return 500;
}

export function buildApp(deps: AppDeps) {
  const cfg = deps.config;
  const backend =
    deps.backend ??
    new HttpAnalysisBackend({
      baseUrl: cfg.asrBaseUrl,
      timeoutMs: cfg.asrTimeoutMs,
      dispatcher: deps.dispatcher,
    });
  const pipelineDeps = {
    config: cfg,
    backend,
    runner: deps.runner,
    dispatcher: deps.dispatcher,
  };

  const app = Fastify({
    logger: { level: cfg.logLevel },
    connectionTimeout: 0,
    keepAliveTimeout: 0,
    requestTimeout: 0, // long downloads and transcodes
  });

  // Raw audio uploads are handed to the route as a stream
  app.addContentTypeParser(/^audio\//, (_req, payload, done) => done(null, payload));
  app.addContentTypeParser("application/octet-stream", (_req, payload, done) =>
    done(null, payload)
  );

  app.addHook("preHandler", async (request, reply) => {
    if (!cfg.apiKey || request.routeOptions.url === "/healthz") return;
    let apiKey = request.headers["x-api-key"];
    if (!apiKey && request.routeOptions.url === "/api/v1/cortex") {
      const fromBody = BodyApiKeySchema.safeParse(request.body);
      if (fromBody.success) apiKey = fromBody.data.api_key;
    }
    if (!apiKey || apiKey !== cfg.apiKey) {
      return reply.code(401).send({ detail: "Unauthorized: Invalid or missing API key" });
    }
  });

  app.setErrorHandler((error: FastifyError | TranscribeError, request, reply) => {
    const statusCode =
      error instanceof TranscribeError ? statusCodeFor(error) : error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    } else {
      request.log.warn({ err: error }, "Request rejected");
    }
    return reply.code(statusCode).send({ detail: error.message });
  });

  if (cfg.routes.audioFile) {
    app.post("/api/v1/audio", async (req) => {
      const query = parseWith(UploadQuerySchema, req.query);
      const options = createTranscriptionOptions(query);
      if (!(req.body instanceof Readable)) {
        throw new InvalidRequestOption("body", "expected an audio/* or application/octet-stream payload");
      }

      const requestId = newRequestId();
      const uploadPath = `${requestRoot(cfg.audioDir, requestId)}${extensionForContentType(
        req.headers["content-type"]
      )}`;
      try {
        await pipeline(req.body, fs.createWriteStream(uploadPath));
      } catch (err) {
        await rm(uploadPath, { force: true });
        throw err;
      }

      return transcribeAudio(
        {
          requestId,
          source: createAudioSource({ kind: "local", path: uploadPath }),
          options,
          jobName: query.job_name,
        },
        pipelineDeps
      );
    });
  }

  if (cfg.routes.audioUrl) {
    app.post("/api/v1/audio-url", async (req) => {
      const body = parseWith(AudioUrlRequestSchema, req.body);
      const options = createTranscriptionOptions(body);
      const requestId = newRequestId();
      return transcribeAudio(
        {
          requestId,
          source: createAudioSource({
            kind: "remote",
            url: body.url,
            headers: body.headers,
            target: requestRoot(cfg.audioDir, requestId),
          }),
          options,
          jobName: body.job_name,
        },
        pipelineDeps
      );
    });
  }

  if (cfg.routes.youtube) {
    app.post("/api/v1/youtube", async (req) => {
      const body = parseWith(UrlRequestSchema, req.body);
      const options = createTranscriptionOptions(body);
      const requestId = newRequestId();
      return transcribeAudio(
        {
          requestId,
          source: createAudioSource({
            kind: "video",
            url: body.url,
            target: requestRoot(cfg.audioDir, requestId),
          }),
          options,
          jobName: body.job_name,
        },
        pipelineDeps
      );
    });
  }

  if (cfg.routes.cortex) {
    app.post("/api/v1/cortex", async (req) => {
      const body = parseWith(CortexRequestSchema, req.body);
      if (body.ping) {
        return { message: "pong" };
      }
      if (body.url === undefined) {
        throw new InvalidRequestOption("url", "required unless ping is set");
      }

      const options = createTranscriptionOptions(body);
      const requestId = newRequestId();
      const target = requestRoot(cfg.audioDir, requestId);
      const source =
        body.url_type === "youtube"
          ? createAudioSource({ kind: "video", url: body.url, target })
          : createAudioSource({ kind: "remote", url: body.url, target });
      return transcribeAudio(
        { requestId, source, options, jobName: body.job_name ?? requestId },
        pipelineDeps
      );
    });
  }

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
