export type BatchErrorCode =
  | 'INVALID_DIRECTORY'
  | 'EMPTY_INPUT_LIST'
  | 'NO_OUTPUT_DIRECTORY'
  | 'BATCH_ALREADY_RUNNING'
  | 'MEDIA_TOOL_UNAVAILABLE'
  | 'NO_AUDIO_TRACK'
  | 'CONVERSION_FAILED'
  | 'UNRECOVERABLE_JOB_ERROR';

/**
 * Base class for every failure the batch pipeline reports on purpose.
 * `status` is the HTTP status a router answers with when the error reaches it.
 */
export class BatchError extends Error {
  constructor(
    message: string,
    readonly code: BatchErrorCode,
    readonly status: number = 500
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDirectoryError extends BatchError {
  constructor(message: string, readonly directory: string) {
    super(message, 'INVALID_DIRECTORY', 400);
  }
}

export class EmptyInputListError extends BatchError {
  constructor() {
    super('Please select video files to convert.', 'EMPTY_INPUT_LIST', 400);
  }
}

export class NoOutputDirectoryError extends BatchError {
  constructor() {
    super('Please select an output directory.', 'NO_OUTPUT_DIRECTORY', 400);
  }
}

export class BatchAlreadyRunningError extends BatchError {
  constructor() {
    super('A conversion batch is already running.', 'BATCH_ALREADY_RUNNING', 409);
  }
}

export class MediaToolUnavailableError extends BatchError {
  constructor(executable: string) {
    super(
      `The media toolkit could not be launched at "${executable}". Install ffmpeg or set FFMPEG_PATH and FFPROBE_PATH.`,
      'MEDIA_TOOL_UNAVAILABLE',
      503
    );
  }
}

export class NoAudioTrackError extends BatchError {
  constructor(readonly inputPath: string) {
    super('no audio track', 'NO_AUDIO_TRACK');
  }
}

export class ConversionError extends BatchError {
  constructor(message: string) {
    super(message, 'CONVERSION_FAILED');
  }
}

// Raised outside the per-file scope; ends the whole batch.
export class UnrecoverableJobError extends BatchError {
  constructor(message: string) {
    super(message, 'UNRECOVERABLE_JOB_ERROR');
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
