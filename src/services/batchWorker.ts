import { EventEmitter } from 'events';
import path from 'path';

import { buildOutputPath } from '../config/formats';
import { describeError, NoAudioTrackError, UnrecoverableJobError } from '../errors/batchErrors';
import type {
  BatchSummary,
  ConversionJob,
  FileResult,
  JobOutcome,
  JobStatus,
  ProgressEvent,
  WorkerState
} from '../types/batch';
import type { MediaHandle, MediaService } from './mediaService';
import { isReadableFile, validateOutputDirectory } from './outputDirectory';

export interface BatchWorkerEvents {
  progress: (event: ProgressEvent, jobId: string) => void;
  fileResult: (result: FileResult, jobId: string) => void;
  finished: (outcome: JobOutcome) => void;
}

/**
 * Runs one {@link ConversionJob} file by file. Events for a file (progress, result,
 * progress) are emitted synchronously before the next file starts. The abort signal
 * is only consulted between files; a conversion already in progress runs to its end.
 */
export class BatchWorker {
  private readonly emitter = new EventEmitter();
  private currentState: WorkerState = 'idle';
  private readonly results: FileResult[] = [];

  constructor(
    private readonly job: ConversionJob,
    private readonly mediaService: MediaService
  ) {}

  get state(): WorkerState {
    return this.currentState;
  }

  on<K extends keyof BatchWorkerEvents>(event: K, listener: BatchWorkerEvents[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof BatchWorkerEvents>(event: K, listener: BatchWorkerEvents[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  async run(signal: AbortSignal): Promise<JobOutcome> {
    if (this.currentState !== 'idle') {
      throw new Error(`Batch worker for job ${this.job.id} has already been started.`);
    }

    this.currentState = 'running';
    const total = this.job.inputPaths.length;

    try {
      for (let index = 0; index < total; index += 1) {
        if (signal.aborted) {
          return this.finish('cancelled');
        }

        await this.assertOutputDirectory();

        const inputPath = this.job.inputPaths[index];
        const fileName = path.basename(inputPath);

        this.emitProgress({ completed: index, total, fileName, phase: 'converting' });
        this.emitResult(await this.convertFile(inputPath));
        this.emitProgress({ completed: index + 1, total, fileName, phase: 'converted' });
      }
    } catch (error) {
      console.error(`[Batch] Job ${this.job.id} aborted:`, describeError(error));
      return this.finish('failed', describeError(error));
    }

    return this.finish('completed');
  }

  private async convertFile(inputPath: string): Promise<FileResult> {
    let media: MediaHandle | undefined;

    try {
      if (!(await isReadableFile(inputPath))) {
        return { status: 'skipped', inputPath, reason: 'input file not found' };
      }

      media = await this.mediaService.loadMedia(inputPath);
      const audio = media.audioTrack();
      if (!audio) {
        throw new NoAudioTrackError(inputPath);
      }

      const outputPath = buildOutputPath(inputPath, this.job.outputDirectory);
      await this.mediaService.writeAudio(audio, outputPath);
      return { status: 'succeeded', inputPath, outputPath };
    } catch (error) {
      return { status: 'failed', inputPath, reason: describeError(error) };
    } finally {
      if (media) {
        await media.close().catch((closeError: unknown) => {
          console.error(`[Batch] Failed to release media handle for ${inputPath}:`, describeError(closeError));
        });
      }
    }
  }

  private async assertOutputDirectory(): Promise<void> {
    try {
      await validateOutputDirectory(this.job.outputDirectory);
    } catch (error) {
      throw new UnrecoverableJobError(describeError(error));
    }
  }

  private emitProgress(event: ProgressEvent): void {
    this.emitter.emit('progress', event, this.job.id);
  }

  private emitResult(result: FileResult): void {
    this.results.push(result);
    this.emitter.emit('fileResult', result, this.job.id);
  }

  private finish(status: JobStatus, error?: string): JobOutcome {
    this.currentState = status;
    const outcome: JobOutcome = {
      jobId: this.job.id,
      status,
      summary: summarize(this.job.inputPaths.length, this.results),
      ...(error ? { error } : {})
    };

    this.emitter.emit('finished', outcome);
    return outcome;
  }
}

export function summarize(total: number, results: readonly FileResult[]): BatchSummary {
  const summary: BatchSummary = { total, succeeded: 0, failed: 0, skipped: 0 };

  for (const result of results) {
    summary[result.status] += 1;
  }

  return summary;
}
