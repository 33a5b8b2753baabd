import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { isDomainProfile, MANIFEST_FILE_NAME } from "../constants.js";
import { InvalidRequestOption } from "../errors.js";
import type { DiarizationJobConfig } from "../types.js";

export const DEFAULT_PROFILES_DIR = fileURLToPath(
  new URL("../../config/diarization/", import.meta.url)
);

const ProfileSchema = z
  .object({
    name: z.string(),
    num_workers: z.number().int().nonnegative(),
    sample_rate: z.number().int().positive(),
    diarizer: z
      .object({
        manifest_filepath: z.string().nullable(),
        out_dir: z.string().nullable(),
        oracle_vad: z.boolean(),
        collar: z.number(),
        ignore_overlap: z.boolean(),
      })
      .passthrough(),
  })
  .passthrough();

export interface BuildConfigOptions {
  profilesDir?: string;
}

/**
 * Prepares a diarization run: loads the profile preset, creates the storage
 * and output directories, and writes the one-line manifest pointing at the
 * canonical audio. Directories and manifest are left for the caller to remove.
 */
export async function buildDiarizationConfig(
  profile: string,
  storageDir: string,
  outputDir: string,
  audioPath: string,
  opts: BuildConfigOptions = {}
): Promise<DiarizationJobConfig> {
  if (!isDomainProfile(profile)) {
    throw new InvalidRequestOption(
      "domain_type",
      `${profile} is not one of general, meeting, telephonic`
    );
  }

  const profilePath = path.join(
    opts.profilesDir ?? DEFAULT_PROFILES_DIR,
    `diar_infer_${profile}.json`
  );
  const base = ProfileSchema.parse(JSON.parse(await readFile(profilePath, "utf-8")));

  const storage = path.resolve(storageDir);
  const output = path.resolve(outputDir);
  await mkdir(storage, { recursive: true });
  await mkdir(output, { recursive: true });

  const meta = {
    audio_filepath: path.resolve(audioPath),
    offset: 0,
    duration: null,
    label: "infer",
    text: "-",
    rttm_filepath: null,
    uem_filepath: null,
  };
  const manifestPath = path.join(storage, MANIFEST_FILE_NAME);
  await writeFile(manifestPath, `${JSON.stringify(meta)}\n`, "utf-8");

  return {
    profile,
    manifestPath,
    outputDir: output,
    numWorkers: 0,
    engine: {
      ...base,
      num_workers: 0,
      diarizer: { ...base.diarizer, manifest_filepath: manifestPath, out_dir: output },
    },
  };
}
