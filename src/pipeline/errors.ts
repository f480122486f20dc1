/**
 * Error taxonomy for the pipeline. Every failure that crosses a module
 * boundary is one of these, so callers can contain it per video, per file or
 * per clip request.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  details?: ErrorDetails;

  constructor(message: string, code: string, details?: ErrorDetails) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name}: ${this.message} (code: ${this.code})`;
  }
}

export type AcquisitionStage = 'resolve' | 'audio' | 'transcription' | 'unexpected';

/**
 * Download or transcription unavailable for one video
 */
export class AcquisitionError extends PipelineError {
  videoId: string;
  stage: AcquisitionStage;

  constructor(message: string, videoId: string, stage: AcquisitionStage, details?: ErrorDetails) {
    super(message, `acquisition_${stage}_failed`, { videoId, ...details });
    this.name = 'AcquisitionError';
    this.videoId = videoId;
    this.stage = stage;
  }
}

/**
 * Malformed transcript file
 */
export class TranscriptParseError extends PipelineError {
  file: string;
  line: number;

  constructor(message: string, file: string, line: number) {
    super(`${file}:${line}: ${message}`, 'transcript_parse_failed', { file, line });
    this.name = 'TranscriptParseError';
    this.file = file;
    this.line = line;
  }
}

export class TranscriptionError extends PipelineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'transcription_failed', details);
    this.name = 'TranscriptionError';
  }
}

export class EmbeddingError extends PipelineError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'embedding_failed', details);
    this.name = 'EmbeddingError';
  }
}

/**
 * Query embedded with a different model than the corpus
 */
export class EmbeddingModelMismatchError extends EmbeddingError {
  constructor(corpusModel: string, queryModel: string) {
    super(`Corpus was embedded with ${corpusModel} but queries use ${queryModel}`, {
      corpusModel,
      queryModel,
    });
    this.name = 'EmbeddingModelMismatchError';
    this.code = 'embedding_model_mismatch';
  }
}

export class ClipDownloadError extends PipelineError {
  videoId: string;

  constructor(message: string, videoId: string, details?: ErrorDetails) {
    super(message, 'clip_download_failed', { videoId, ...details });
    this.name = 'ClipDownloadError';
    this.videoId = videoId;
  }
}

export class ClipEncodeError extends PipelineError {
  videoId: string;

  constructor(message: string, videoId: string, details?: ErrorDetails) {
    super(message, 'clip_encode_failed', { videoId, ...details });
    this.name = 'ClipEncodeError';
    this.videoId = videoId;
  }
}
