import { randomUUID } from 'crypto';
import path from 'path';

import { hasAcceptedExtension } from '../config/formats';
import {
  BatchAlreadyRunningError,
  EmptyInputListError,
  MediaToolUnavailableError,
  NoOutputDirectoryError
} from '../errors/batchErrors';
import type {
  BatchSummary,
  ConversionJob,
  FileResult,
  JobOutcome,
  LogEntry,
  LogLevel,
  ProgressEvent
} from '../types/batch';
import { BatchWorker } from './batchWorker';
import type { MediaService } from './mediaService';
import { validateOutputDirectory } from './outputDirectory';

export interface BatchOrchestratorOptions {
  inputExtensions: readonly string[];
  /** Oldest entries are dropped past this size. */
  maxLogEntries?: number;
}

export interface RejectedFile {
  path: string;
  reason: string;
}

export interface AddFilesResult {
  added: string[];
  rejected: RejectedFile[];
  duplicates: string[];
}

export type BatchState = 'idle' | 'running' | JobOutcome['status'];

export interface BatchProgress {
  completed: number;
  total: number;
  percent: number;
  currentFile?: string;
}

export interface BatchSnapshot {
  files: string[];
  outputDirectory?: string;
  state: BatchState;
  canStart: boolean;
  canCancel: boolean;
  cancelRequested: boolean;
  job?: ConversionJob;
  progress: BatchProgress;
  results: FileResult[];
  summary?: BatchSummary;
  outcome?: JobOutcome;
}

// Everything that belongs to one started batch; rebuilt on every start.
interface BatchRun {
  job: ConversionJob;
  controller: AbortController;
  progress: BatchProgress;
  results: FileResult[];
  completion: Promise<JobOutcome>;
  outcome?: JobOutcome;
}

const DEFAULT_MAX_LOG_ENTRIES = 1000;

export class BatchOrchestrator {
  private readonly files: string[] = [];
  private outputDirectory?: string;
  private run?: BatchRun;
  private readonly log: LogEntry[] = [];
  private readonly inputExtensions: readonly string[];
  private readonly maxLogEntries: number;

  constructor(
    private readonly mediaService: MediaService,
    options: BatchOrchestratorOptions
  ) {
    this.inputExtensions = options.inputExtensions;
    this.maxLogEntries = options.maxLogEntries ?? DEFAULT_MAX_LOG_ENTRIES;
    this.appendLog('info', 'Ready. Please select video files and an output directory.');
  }

  addFiles(paths: readonly string[]): AddFilesResult {
    const result: AddFilesResult = { added: [], rejected: [], duplicates: [] };

    for (const candidate of paths) {
      const resolved = path.resolve(candidate);

      if (!hasAcceptedExtension(resolved, this.inputExtensions)) {
        const reason = `expected one of ${this.inputExtensions.join(', ')}`;
        result.rejected.push({ path: candidate, reason });
        this.appendLog('warn', `Rejected ${candidate}: ${reason}`);
        continue;
      }

      if (this.files.includes(resolved)) {
        result.duplicates.push(resolved);
        continue;
      }

      this.files.push(resolved);
      result.added.push(resolved);
    }

    if (result.added.length > 0) {
      this.appendLog('info', `Added ${result.added.length} file(s). Total: ${this.files.length}`);
    }

    return result;
  }

  removeFile(filePath: string): boolean {
    const index = this.files.indexOf(path.resolve(filePath));
    if (index === -1) {
      return false;
    }

    const [removed] = this.files.splice(index, 1);
    this.appendLog('info', `Removed ${path.basename(removed)}. Total: ${this.files.length}`);
    return true;
  }

  clearFiles(): void {
    this.files.length = 0;
    this.appendLog('info', 'File list cleared.');
  }

  getFiles(): string[] {
    return [...this.files];
  }

  async setOutputDirectory(directory: string): Promise<string> {
    const resolved = await validateOutputDirectory(directory);
    this.outputDirectory = resolved;
    this.appendLog('info', `Output directory set to: ${resolved}`);
    return resolved;
  }

  getOutputDirectory(): string | undefined {
    return this.outputDirectory;
  }

  isRunning(): boolean {
    return this.run !== undefined && this.run.outcome === undefined;
  }

  async startBatch(): Promise<ConversionJob> {
    if (this.isRunning()) {
      throw new BatchAlreadyRunningError();
    }

    // Snapshot before awaiting so queue edits cannot empty the job.
    const inputPaths = [...this.files];
    if (inputPaths.length === 0) {
      throw new EmptyInputListError();
    }

    if (!this.outputDirectory) {
      throw new NoOutputDirectoryError();
    }

    const outputDirectory = await validateOutputDirectory(this.outputDirectory);

    if (!(await this.mediaService.isAvailable())) {
      throw new MediaToolUnavailableError(this.mediaService.getExecutablePath());
    }

    // Validation awaited; another start may have won the race.
    if (this.isRunning()) {
      throw new BatchAlreadyRunningError();
    }

    const job: ConversionJob = Object.freeze({
      id: randomUUID(),
      inputPaths: Object.freeze(inputPaths),
      outputDirectory,
      createdAt: new Date()
    });

    const worker = new BatchWorker(job, this.mediaService);
    const controller = new AbortController();

    worker
      .on('progress', (event, jobId) => this.onProgress(event, jobId))
      .on('fileResult', (result, jobId) => this.onFileResult(result, jobId))
      .on('finished', (outcome) => this.onJobFinished(outcome));

    this.appendLog('info', `Starting conversion of ${job.inputPaths.length} file(s)...`);
    console.log(`[Batch] Job ${job.id} started with ${job.inputPaths.length} file(s) -> ${outputDirectory}`);

    // The worker starts on the next microtask, once this run is the current one.
    this.run = {
      job,
      controller,
      progress: { completed: 0, total: job.inputPaths.length, percent: 0 },
      results: [],
      completion: Promise.resolve().then(() => worker.run(controller.signal))
    };

    return job;
  }

  cancel(): boolean {
    const run = this.run;
    if (!run || run.outcome || run.controller.signal.aborted) {
      return false;
    }

    run.controller.abort();
    this.appendLog('info', 'Cancelling conversion...');
    return true;
  }

  /**
   * Resolves with the outcome of the current batch, or of the last one when nothing runs.
   */
  async waitForIdle(): Promise<JobOutcome | undefined> {
    return this.run?.completion;
  }

  onProgress(event: ProgressEvent, jobId: string): void {
    const run = this.currentRun(jobId);
    if (!run) {
      return;
    }

    run.progress = {
      completed: event.completed,
      total: event.total,
      percent: toPercent(event.completed, event.total),
      currentFile: event.fileName
    };

    if (event.phase === 'converting') {
      this.appendLog('info', `Converting: ${event.fileName} (${event.completed + 1}/${event.total})`);
    } else {
      this.appendLog('info', `Progress: ${run.progress.percent}% (${event.completed}/${event.total})`);
    }
  }

  onFileResult(result: FileResult, jobId: string): void {
    const run = this.currentRun(jobId);
    if (!run) {
      return;
    }

    run.results.push(result);
    const fileName = path.basename(result.inputPath);

    switch (result.status) {
      case 'succeeded':
        this.appendLog('info', `✓ Completed: ${fileName} -> ${result.outputPath}`);
        break;
      case 'failed':
        this.appendLog('error', `✗ Failed: ${fileName} - ${result.reason}`);
        break;
      case 'skipped':
        this.appendLog('warn', `Skipped: ${fileName} - ${result.reason}`);
        break;
    }
  }

  onJobFinished(outcome: JobOutcome): void {
    const run = this.currentRun(outcome.jobId);
    if (!run) {
      return;
    }

    run.outcome = outcome;
    const counts = formatSummary(outcome.summary);

    switch (outcome.status) {
      case 'completed':
        this.appendLog('info', `Conversion process completed: ${counts}.`);
        break;
      case 'cancelled':
        this.appendLog('warn', `Conversion cancelled by user: ${counts}.`);
        break;
      case 'failed':
        this.appendLog('error', `Conversion aborted: ${outcome.error ?? 'unknown error'}. ${counts}.`);
        break;
    }

    console.log(`[Batch] Job ${outcome.jobId} ${outcome.status}: ${counts}`);
  }

  getLog(): LogEntry[] {
    return [...this.log];
  }

  getSnapshot(): BatchSnapshot {
    const run = this.run;
    const running = this.isRunning();

    return {
      files: this.getFiles(),
      outputDirectory: this.outputDirectory,
      state: run ? run.outcome?.status ?? 'running' : 'idle',
      canStart: !running && this.files.length > 0 && this.outputDirectory !== undefined,
      canCancel: running && !(run?.controller.signal.aborted ?? false),
      cancelRequested: run?.controller.signal.aborted ?? false,
      job: run?.job,
      progress: run ? { ...run.progress } : { completed: 0, total: 0, percent: 0 },
      results: run ? [...run.results] : [],
      summary: run?.outcome?.summary,
      outcome: run?.outcome
    };
  }

  // Events from a worker other than the current run's are dropped.
  private currentRun(jobId: string): BatchRun | undefined {
    return this.run?.job.id === jobId ? this.run : undefined;
  }

  private appendLog(level: LogLevel, message: string): void {
    this.log.push({ timestamp: new Date(), level, message });
    if (this.log.length > this.maxLogEntries) {
      this.log.splice(0, this.log.length - this.maxLogEntries);
    }
  }
}

function toPercent(completed: number, total: number): number {
  return total === 0 ? 0 : Math.floor((completed / total) * 100);
}

function formatSummary(summary: BatchSummary): string {
  return `${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`;
}
