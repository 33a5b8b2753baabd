import { z } from "zod";
import { TIMESTAMP_UNITS } from "./constants.js";
import { InvalidRequestOption } from "./errors.js";
import type { AudioSource, TranscriptionOptions } from "./types.js";

export const OptionsSchema = z.object({
  alignment: z.boolean().default(false),
  source_lang: z
    .string()
    .regex(/^[a-z]{2}$/, "must be a two-letter ISO-639-1 code")
    .default("en"),
  timestamps: z.enum(TIMESTAMP_UNITS).default("s"),
});

const AudioSourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("local"), path: z.string().min(1) }),
  z.object({
    kind: z.literal("remote"),
    url: z.string().url(),
    headers: z.record(z.string()).optional(),
    target: z.string().min(1),
  }),
  z.object({
    kind: z.literal("video"),
    url: z.string().url(),
    target: z.string().min(1),
  }),
]);

export function toInvalidOption(error: z.ZodError): InvalidRequestOption {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "request";
  return new InvalidRequestOption(field, issue ? issue.message : "invalid value");
}

/**
 * Builds validated options from a wire-shaped descriptor. Missing fields take
 * their defaults; an invalid one is rejected here rather than mid-pipeline.
 */
export function createTranscriptionOptions(input: unknown): TranscriptionOptions {
  const parsed = OptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw toInvalidOption(parsed.error);
  }
  return Object.freeze({
    alignment: parsed.data.alignment,
    sourceLang: parsed.data.source_lang,
    timestamps: parsed.data.timestamps,
  });
}

export function createAudioSource(input: unknown): AudioSource {
  const parsed = AudioSourceSchema.safeParse(input);
  if (!parsed.success) {
    throw toInvalidOption(parsed.error);
  }
  const source = parsed.data;
  if (source.kind === "remote" && source.headers) {
    return Object.freeze({ ...source, headers: Object.freeze({ ...source.headers }) });
  }
  return Object.freeze(source);
}
