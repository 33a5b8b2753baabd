import type {
  FormattedUtterance,
  TranscriptionOptions,
  TranscriptionResponse,
} from "../types.js";

export function assembleResponse(
  utterances: FormattedUtterance[],
  options: TranscriptionOptions,
  jobName?: string,
  requestId?: string
): TranscriptionResponse {
  const response: TranscriptionResponse = {
    utterances,
    alignment: options.alignment,
    source_lang: options.sourceLang,
    timestamps: options.timestamps,
  };
  if (jobName !== undefined) response.job_name = jobName;
  if (requestId !== undefined) response.request_id = requestId;
  return response;
}
