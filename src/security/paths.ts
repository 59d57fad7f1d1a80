import { statSync } from 'node:fs';
import { extname, resolve, sep } from 'node:path';
import { SanitizationError } from '../shared/errors.js';

export type PathPurpose = 'media' | 'subtitle' | 'lut' | 'font';
export type MediaKind = 'video' | 'image' | 'audio';

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4', '.mov', '.mkv', '.webm', '.avi', '.flv', '.wmv', '.m4v', '.ts', '.mpg', '.mpeg', '.gif',
]);
export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png', '.jpg', '.jpeg', '.bmp', '.webp', '.tif', '.tiff',
]);
export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp3', '.wav', '.aac', '.m4a', '.flac', '.ogg', '.opus',
]);

const ALLOWED_EXTENSIONS: Record<PathPurpose, ReadonlySet<string>> = {
  media: new Set([...VIDEO_EXTENSIONS, ...IMAGE_EXTENSIONS, ...AUDIO_EXTENSIONS]),
  subtitle: new Set(['.srt', '.ass', '.ssa', '.vtt']),
  lut: new Set(['.cube', '.3dl']),
  font: new Set(['.ttf', '.otf', '.ttc', '.woff', '.woff2']),
};

// Output may never land inside these.
const DENIED_OUTPUT_DIRS = [
  '/bin', '/boot', '/dev', '/etc', '/lib', '/lib64', '/proc', '/sbin', '/sys', '/usr',
  '/System', '/Library',
  'C:\\Windows', 'C:\\Program Files', 'C:\\Program Files (x86)',
];

export interface ValidatePathOptions {
  /** Read paths must exist as regular files. */
  mustExist?: boolean;
}

export function allowedExtensions(purpose: PathPurpose): ReadonlySet<string> {
  return ALLOWED_EXTENSIONS[purpose];
}

export function hasTraversal(path: string): boolean {
  return path.split(/[\\/]+/).some((segment) => segment === '..');
}

export function classifyMedia(path: string): MediaKind | undefined {
  const ext = extname(path).toLowerCase();
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  if (AUDIO_EXTENSIONS.has(ext)) return 'audio';
  return undefined;
}

/**
 * Resolve a path the compiler is about to embed or hand to the runner.
 * Returns the absolute path.
 */
export function validatePath(path: string, purpose: PathPurpose, opts: ValidatePathOptions = {}): string {
  const mustExist = opts.mustExist ?? true;
  if (!path || !path.trim()) {
    throw new SanitizationError(`${purpose} path cannot be empty`, path);
  }
  if (path.includes('\0')) {
    throw new SanitizationError(`${purpose} path contains a NUL byte`, path);
  }
  if (hasTraversal(path)) {
    throw new SanitizationError(`Path contains directory traversal (..): ${path}`, path);
  }

  const resolved = resolve(path);
  const ext = extname(resolved).toLowerCase();
  const allowed = ALLOWED_EXTENSIONS[purpose];
  if (!allowed.has(ext)) {
    throw new SanitizationError(
      `Extension "${ext || '(none)'}" is not allowed for ${purpose} files (allowed: ${[...allowed].join(', ')})`,
      path,
    );
  }

  if (mustExist) {
    const stats = statSync(resolved, { throwIfNoEntry: false });
    if (!stats) {
      throw new SanitizationError(`File not found: ${resolved}`, path);
    }
    if (!stats.isFile()) {
      throw new SanitizationError(`Path is not a regular file: ${resolved}`, path);
    }
  }

  return resolved;
}

export function isDeniedOutputLocation(resolved: string): boolean {
  const windows = /^[A-Za-z]:\\/.test(resolved);
  const target = windows ? resolved.toLowerCase() : resolved;
  return DENIED_OUTPUT_DIRS.some((dir) => {
    const candidate = windows ? dir.toLowerCase() : dir;
    const separator = windows ? '\\' : sep;
    return target === candidate || target.startsWith(candidate + separator);
  });
}

export function validateOutputPath(path: string): string {
  const resolved = validatePath(path, 'media', { mustExist: false });
  if (isDeniedOutputLocation(resolved)) {
    throw new SanitizationError(`Refusing to write output into a system directory: ${resolved}`, path);
  }
  return resolved;
}
