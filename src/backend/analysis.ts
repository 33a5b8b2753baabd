import fs from "node:fs";
import path from "node:path";
import { Blob } from "node:buffer";
import { fetch, FormData, type Dispatcher } from "undici";
import { z } from "zod";
import { AnalysisFailed, AnalysisTimeout } from "../errors.js";
import { logger } from "../utils/logger.js";
import type {
  DiarizationJobConfig,
  RawTranscriptSegment,
  TranscriptionOptions,
} from "../types.js";

export interface AnalysisJob {
  requestId: string;
  wavPath: string;
  options: TranscriptionOptions;
  diarization: DiarizationJobConfig;
}

// Speech-to-text plus diarization, run outside this service
export interface AnalysisBackend {
  analyze(job: AnalysisJob): Promise<RawTranscriptSegment[]>;
}

const AnalysisReplySchema = z.object({
  segments: z.array(
    z.object({
      start: z.number(),
      end: z.number(),
      speaker: z.number().int(),
      text: z.string(),
    })
  ),
});

export interface HttpAnalysisBackendOptions {
  baseUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export class HttpAnalysisBackend implements AnalysisBackend {
  constructor(private readonly opts: HttpAnalysisBackendOptions) {}

  async analyze(job: AnalysisJob): Promise<RawTranscriptSegment[]> {
    const form = new FormData();
    const audioBuffer = fs.readFileSync(job.wavPath);
    form.append("file", new Blob([audioBuffer], { type: "audio/wav" }), path.basename(job.wavPath));
    form.append("source_lang", job.options.sourceLang);
    form.append("alignment", String(job.options.alignment));
    form.append("diarization", JSON.stringify(job.diarization));

    logger.info({ requestId: job.requestId, baseUrl: this.opts.baseUrl }, "Sending audio to analysis backend");
    try {
      const response = await fetch(`${this.opts.baseUrl}/v1/analyze`, {
        method: "POST",
        body: form,
        headers: { "x-request-id": job.requestId },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
        dispatcher: this.opts.dispatcher,
      });

      if (!response.ok) {
        throw new AnalysisFailed(response.status, await response.text());
      }

      const reply = AnalysisReplySchema.parse(await response.json());
      return reply.segments;
    } catch (err) {
      // AbortSignal.timeout rejects with a DOMException named TimeoutError
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new AnalysisTimeout(this.opts.timeoutMs);
      }
      throw err;
    }
  }
}
