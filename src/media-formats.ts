import { join } from 'path';
import type { FormatClass } from './media-types.js';

export const SIDECAR_EXTENSION = '.xmp';

const FORMAT_CLASS_BY_EXTENSION: Record<string, FormatClass> = {
  '.xmp': 'sidecar',
  '.jpg': 'writable-image',
  '.jpeg': 'writable-image',
  '.heic': 'writable-image',
  '.heif': 'writable-image',
  '.arw': 'raw',
  '.cr2': 'raw',
  '.cr3': 'raw',
  '.dng': 'raw',
  '.nef': 'raw',
  '.orf': 'raw',
  '.raf': 'raw',
  '.rw2': 'raw',
};

export const RECOGNIZED_EXTENSIONS: readonly string[] = Object.keys(FORMAT_CLASS_BY_EXTENSION);

export interface ClassifyOptions {
  /** Treat jpg/heic renders as unrecognized, e.g. inside a Capture One session */
  ignoreWritableImages?: boolean;
}

/**
 * Final path component, accepting both separators so that input lists written
 * on Windows resolve the same way.
 */
export function baseName(filePath: string): string {
  const segments = filePath.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

/**
 * Lower-cased extension of the final component, including the dot. Dotfiles
 * such as `.xmp` on their own have no extension.
 */
export function extensionOf(filePath: string): string {
  const name = baseName(filePath);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

export function stemOf(filePath: string): string {
  const name = baseName(filePath.trim());
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

export function classifyExtension(extension: string, options: ClassifyOptions = {}): FormatClass {
  const formatClass = FORMAT_CLASS_BY_EXTENSION[extension.toLowerCase()] ?? 'unrecognized';
  if (formatClass === 'writable-image' && options.ignoreWritableImages) {
    return 'unrecognized';
  }
  return formatClass;
}

export function classifyPath(filePath: string, options: ClassifyOptions = {}): FormatClass {
  return classifyExtension(extensionOf(filePath), options);
}

/**
 * Code-unit order, so tie-breaks do not depend on the host locale.
 */
export function comparePaths(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function sidecarPathFor(directory: string, stem: string): string {
  return join(directory, `${stem}${SIDECAR_EXTENSION}`);
}

/**
 * Lower- and upper-case spellings of a sidecar path. Either one already on
 * disk means the sidecar exists, even on a case-sensitive filesystem.
 */
export function sidecarSpellings(sidecarPath: string): string[] {
  const base = sidecarPath.slice(0, sidecarPath.length - extensionOf(sidecarPath).length);
  const lower = `${base}${SIDECAR_EXTENSION}`;
  const upper = `${base}${SIDECAR_EXTENSION.toUpperCase()}`;
  return sidecarPath === lower || sidecarPath === upper ? [lower, upper] : [sidecarPath, lower, upper];
}
