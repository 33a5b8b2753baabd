import type { DomainProfile, TimestampUnit } from "./constants.js";

export type AudioSource =
  | { readonly kind: "local"; readonly path: string }
  | {
      readonly kind: "remote";
      readonly url: string;
      readonly headers?: Readonly<Record<string, string>>;
      readonly target: string; // destination path without extension
    }
  | { readonly kind: "video"; readonly url: string; readonly target: string };

export interface AcquisitionResult {
  path: string;
  mediaType: string;
}

export interface TranscriptionOptions {
  readonly alignment: boolean;
  readonly sourceLang: string; // ISO-639-1
  readonly timestamps: TimestampUnit;
}

// Segment as produced by the analysis backend, offsets in milliseconds
export interface RawTranscriptSegment {
  start: number;
  end: number;
  speaker: number;
  text: string;
}

export interface FormattedSegment {
  start: number;
  end: number;
  word: string;
}

export interface FormattedUtterance {
  speaker: number;
  start: number | string;
  end: number | string;
  text: string;
}

export interface DiarizationJobConfig {
  profile: DomainProfile;
  manifestPath: string;
  outputDir: string;
  numWorkers: 0;
  engine: Record<string, unknown>;
}

export interface TranscriptionResponse {
  utterances: FormattedUtterance[];
  alignment: boolean;
  source_lang: string;
  timestamps: TimestampUnit;
  job_name?: string;
  request_id?: string;
}
