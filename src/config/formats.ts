import path from 'path';

export const DEFAULT_INPUT_EXTENSIONS = ['.mp4'];
export const OUTPUT_EXTENSION = '.mp3';
export const OUTPUT_FORMAT = 'mp3';

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) {
    return '';
  }

  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

export function parseExtensionList(value: string | undefined): string[] {
  if (!value) {
    return [...DEFAULT_INPUT_EXTENSIONS];
  }

  const extensions = value
    .split(',')
    .map(normalizeExtension)
    .filter((extension) => extension.length > 1);

  return extensions.length > 0 ? Array.from(new Set(extensions)) : [...DEFAULT_INPUT_EXTENSIONS];
}

export function hasAcceptedExtension(filePath: string, extensions: readonly string[]): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return extension.length > 0 && extensions.includes(extension);
}

/**
 * `clips/a.MP4` -> `<outputDirectory>/a.mp3`. Inputs sharing a stem map to the same file.
 */
export function buildOutputPath(inputPath: string, outputDirectory: string): string {
  const { name } = path.parse(inputPath);
  return path.join(outputDirectory, `${name}${OUTPUT_EXTENSION}`);
}
