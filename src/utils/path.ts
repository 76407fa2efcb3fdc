import { dirname, extname, isAbsolute, join } from 'node:path';

export function getExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

/**
 * Path of an included changelog. Relative includes resolve against the
 * including file's directory, others against `baseDir`.
 */
export function resolveIncludePath(
  target: string,
  fromFile: string,
  relativeToChangelogFile: boolean,
  baseDir: string,
): string {
  if (isAbsolute(target)) return target;
  return relativeToChangelogFile ? join(dirname(fromFile), target) : join(baseDir, target);
}
