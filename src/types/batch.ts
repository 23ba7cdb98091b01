export type JobStatus = 'completed' | 'cancelled' | 'failed';

export type WorkerState = 'idle' | 'running' | JobStatus;

export interface ConversionJob {
  readonly id: string;
  readonly inputPaths: readonly string[];
  readonly outputDirectory: string;
  readonly createdAt: Date;
}

export type FileResult =
  | { status: 'succeeded'; inputPath: string; outputPath: string }
  | { status: 'failed'; inputPath: string; reason: string }
  | { status: 'skipped'; inputPath: string; reason: string };

export type ProgressPhase = 'converting' | 'converted';

export interface ProgressEvent {
  completed: number;
  total: number;
  fileName: string;
  phase: ProgressPhase;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface JobOutcome {
  jobId: string;
  status: JobStatus;
  summary: BatchSummary;
  error?: string;
}

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
}
