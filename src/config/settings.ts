import path from 'path';

import { parseExtensionList } from './formats';

export interface AppSettings {
  port: number;
  host: string;
  ffmpegPath: string;
  ffprobePath: string;
  inputExtensions: string[];
  audioBitrate: string;
  outputDirectory?: string;
}

const DEFAULT_PORT = 3200;
const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_BITRATE = '192k';
const BITRATE_PATTERN = /^\d+k$/i;

function readString(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function readPort(value: string | undefined): number {
  if (!value?.trim()) {
    return DEFAULT_PORT;
  }

  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, received "${value}".`);
  }

  return port;
}

function readBitrate(value: string | undefined): string {
  const bitrate = readString(value, DEFAULT_BITRATE);
  if (!BITRATE_PATTERN.test(bitrate)) {
    throw new Error(`AUDIO_BITRATE must look like "192k", received "${bitrate}".`);
  }

  return bitrate.toLowerCase();
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const outputDirectory = env.OUTPUT_DIR?.trim();

  return {
    port: readPort(env.PORT),
    host: readString(env.HOST, DEFAULT_HOST),
    ffmpegPath: readString(env.FFMPEG_PATH, 'ffmpeg'),
    ffprobePath: readString(env.FFPROBE_PATH, 'ffprobe'),
    inputExtensions: parseExtensionList(env.INPUT_EXTENSIONS),
    audioBitrate: readBitrate(env.AUDIO_BITRATE),
    outputDirectory: outputDirectory ? path.resolve(outputDirectory) : undefined
  };
}
