/**
 * Centralized constants for the intake pipeline
 * Canonical audio parameters must match what the analysis backend expects
 */

// Canonical audio format: mono, 16kHz, 16-bit signed little-endian PCM WAV
export const CANONICAL_SAMPLE_RATE = 16000;
export const CANONICAL_CHANNELS = 1;
export const CANONICAL_CODEC = "pcm_s16le";

// Remote downloads are written to disk in chunks of this size
export const DOWNLOAD_CHUNK_BYTES = 1024;
export const MAX_DOWNLOAD_REDIRECTS = 5;

export const MANIFEST_FILE_NAME = "infer_manifest.json";

export const TIMESTAMP_UNITS = ["s", "ms", "hms"] as const;

export type TimestampUnit = (typeof TIMESTAMP_UNITS)[number];

export function isTimestampUnit(unit: string): unit is TimestampUnit {
  return TIMESTAMP_UNITS.includes(unit as TimestampUnit);
}

// Acoustic scenarios the diarization engine ships presets for
export const DOMAIN_PROFILES = ["general", "meeting", "telephonic"] as const;

export type DomainProfile = (typeof DOMAIN_PROFILES)[number];

export function isDomainProfile(profile: string): profile is DomainProfile {
  return DOMAIN_PROFILES.includes(profile as DomainProfile);
}

// Declared content type -> file extension for downloaded audio
export const AUDIO_EXTENSIONS: Record<string, string> = {
  "audio/mpeg": ".mp3",
  "audio/mp3": ".mp3",
  "audio/wav": ".wav",
  "audio/x-wav": ".wav",
  "audio/wave": ".wav",
  "audio/mp4": ".m4a",
  "audio/x-m4a": ".m4a",
  "audio/aac": ".aac",
  "audio/ogg": ".ogg",
  "audio/opus": ".opus",
  "audio/flac": ".flac",
  "audio/x-flac": ".flac",
  "audio/webm": ".webm",
  "video/mp4": ".mp4",
  "video/webm": ".webm",
};

export const UNKNOWN_EXTENSION = ".bin";
