/**
 * Failure kinds raised by the intake pipeline.
 * The HTTP layer maps each one to a status code; nothing here is retried.
 */
export class TranscribeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FileNotFound extends TranscribeError {
  constructor(readonly filePath: string) {
    super(`File ${filePath} does not exist.`);
  }
}

export class DownloadFailed extends TranscribeError {
  constructor(readonly url: string, readonly statusCode: number) {
    super(`Failed to download file from ${url}. Status: ${statusCode}`);
  }
}

export class ExtractionFailed extends TranscribeError {
  constructor(readonly url: string, readonly stderrText: string) {
    super(`Failed to extract audio from ${url}: ${stderrText}`);
  }
}

export class ConversionFailed extends TranscribeError {
  constructor(readonly filePath: string, readonly stderrText: string) {
    super(`Error converting file ${filePath} to wav format: ${stderrText}`);
  }
}

export class InvalidTimestampUnit extends TranscribeError {
  constructor(readonly unit: string) {
    super(`Invalid conversion target: ${unit}. Valid targets are: ms, hms, s.`);
  }
}

export class InvalidRequestOption extends TranscribeError {
  constructor(readonly field: string, detail: string) {
    super(`Invalid value for ${field}: ${detail}`);
  }
}

export class AnalysisFailed extends TranscribeError {
  constructor(readonly statusCode: number, body: string) {
    super(`Analysis backend failed: ${statusCode} ${body}`);
  }
}

export class AnalysisTimeout extends TranscribeError {
  constructor(readonly timeoutMs: number) {
    super(`Analysis backend did not answer within ${timeoutMs}ms`);
  }
}

export class ProcessTimeout extends TranscribeError {
  constructor(readonly command: string, readonly timeoutMs: number) {
    super(`Command ${command} did not finish within ${timeoutMs}ms`);
  }
}

export class ProcessAborted extends TranscribeError {
  constructor(readonly command: string) {
    super(`Command ${command} was aborted`);
  }
}
