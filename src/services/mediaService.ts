import { spawn, type ChildProcess } from 'child_process';

import { ConversionError } from '../errors/batchErrors';

export interface AudioTrack {
  sourcePath: string;
  /** Position among the audio streams, used for `-map 0:a:<audioIndex>`. */
  audioIndex: number;
  streamIndex: number;
  codecName?: string;
  channels?: number;
  sampleRate?: number;
  durationSeconds?: number;
}

export interface MediaHandle {
  readonly sourcePath: string;
  audioTrack(): AudioTrack | undefined;
  close(): Promise<void>;
}

/**
 * Decode/encode capability the batch worker delegates to.
 */
export interface MediaService {
  isAvailable(): Promise<boolean>;
  loadMedia(sourcePath: string): Promise<MediaHandle>;
  writeAudio(track: AudioTrack, outputPath: string): Promise<void>;
  getExecutablePath(): string;
}

export interface FfmpegMediaServiceOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  audioBitrate?: string;
}

interface ProbedStream {
  index: number;
  codecType?: string;
  codecName?: string;
  channels?: number;
  sampleRate?: number;
}

export interface ProbeResult {
  streams: ProbedStream[];
  durationSeconds?: number;
}

interface ProcessOutput {
  stdout: string;
  stderr: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  return undefined;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function parseProbeOutput(output: string): ProbeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    throw new ConversionError('ffprobe returned output that is not valid JSON.');
  }

  if (!isRecord(parsed)) {
    throw new ConversionError('ffprobe returned an unexpected payload.');
  }

  const rawStreams = Array.isArray(parsed.streams) ? parsed.streams : [];
  const streams: ProbedStream[] = [];

  rawStreams.forEach((stream: unknown, position: number) => {
    if (!isRecord(stream)) {
      return;
    }

    streams.push({
      index: readNumber(stream.index) ?? position,
      codecType: readString(stream.codec_type),
      codecName: readString(stream.codec_name),
      channels: readNumber(stream.channels),
      sampleRate: readNumber(stream.sample_rate)
    });
  });

  const format = isRecord(parsed.format) ? parsed.format : undefined;

  return {
    streams,
    durationSeconds: format ? readNumber(format.duration) : undefined
  };
}

export function findFirstAudioTrack(sourcePath: string, probe: ProbeResult): AudioTrack | undefined {
  const audioStreams = probe.streams.filter((stream) => stream.codecType === 'audio');
  const [first] = audioStreams;

  if (!first) {
    return undefined;
  }

  return {
    sourcePath,
    audioIndex: 0,
    streamIndex: first.index,
    codecName: first.codecName,
    channels: first.channels,
    sampleRate: first.sampleRate,
    durationSeconds: probe.durationSeconds
  };
}

export function buildProbeArgs(sourcePath: string): string[] {
  return ['-v', 'error', '-print_format', 'json', '-show_streams', '-show_format', sourcePath];
}

export function buildExtractArgs(track: AudioTrack, outputPath: string, bitrate: string): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-y',
    '-i',
    track.sourcePath,
    '-map',
    `0:a:${track.audioIndex}`,
    '-vn',
    '-codec:a',
    'libmp3lame',
    '-b:a',
    bitrate,
    outputPath
  ];
}

class FfmpegMediaHandle implements MediaHandle {
  private closed = false;

  constructor(
    readonly sourcePath: string,
    private readonly probe: ProbeResult,
    private readonly children: Set<ChildProcess>,
    private readonly release: () => void
  ) {}

  audioTrack(): AudioTrack | undefined {
    if (this.closed) {
      return undefined;
    }

    return findFirstAudioTrack(this.sourcePath, this.probe);
  }

  async close(): Promise<void> {
    this.closed = true;

    for (const child of this.children) {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL');
      }
    }
    this.children.clear();
    this.release();
  }
}

export class FfmpegMediaService implements MediaService {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly audioBitrate: string;
  private readonly activeChildren = new Map<string, Set<ChildProcess>>();

  constructor(options: FfmpegMediaServiceOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.audioBitrate = options.audioBitrate ?? '192k';
  }

  getExecutablePath(): string {
    return this.ffmpegPath;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.run(this.ffmpegPath, ['-version']);
      return true;
    } catch {
      return false;
    }
  }

  async loadMedia(sourcePath: string): Promise<MediaHandle> {
    const children = new Set<ChildProcess>();
    this.activeChildren.set(sourcePath, children);

    try {
      const { stdout } = await this.run(this.ffprobePath, buildProbeArgs(sourcePath), children);
      const probe = parseProbeOutput(stdout);
      return new FfmpegMediaHandle(sourcePath, probe, children, () => {
        if (this.activeChildren.get(sourcePath) === children) {
          this.activeChildren.delete(sourcePath);
        }
      });
    } catch (error) {
      this.activeChildren.delete(sourcePath);
      throw error;
    }
  }

  async writeAudio(track: AudioTrack, outputPath: string): Promise<void> {
    const args = buildExtractArgs(track, outputPath, this.audioBitrate);
    console.log(`[Media] Extracting audio stream ${track.streamIndex} of ${track.sourcePath} to ${outputPath}`);
    await this.run(this.ffmpegPath, args, this.activeChildren.get(track.sourcePath));
  }

  private run(executable: string, args: string[], tracked?: Set<ChildProcess>): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const child = spawn(executable, args);
      tracked?.add(child);

      let stdout = '';
      let stderr = '';

      // Decoded by the stream so multi-byte characters split across chunks survive.
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');

      child.stdout.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        tracked?.delete(child);
        if (error.code === 'ENOENT') {
          reject(new ConversionError(`Media tool executable not found at "${executable}".`));
          return;
        }

        reject(error);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        tracked?.delete(child);
        if (code === 0) {
          resolve({ stdout, stderr });
          return;
        }

        const detail = stderr.trim() || (signal ? `terminated by ${signal}` : `exited with code ${code}`);
        reject(new ConversionError(`${executable} failed: ${detail}`));
      });
    });
  }
}
