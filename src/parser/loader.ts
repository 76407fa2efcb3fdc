import { readFileSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { ChangeSet } from '../model/changelog.js';
import type { ParserRegistry } from './registry.js';
import { ChangeLogParameters } from './parameters.js';
import { ChangelogParseError } from '../errors.js';
import { getExtension, resolveIncludePath } from '../utils/path.js';

export interface LoadOptions {
  parameters?: ChangeLogParameters;
  /** Directory non-relative includes resolve against. Defaults to ".". */
  baseDir?: string;
  readText?: (filePath: string) => string;
  listDir?: (dirPath: string) => string[];
}

export interface LoadResult {
  /** Every change-set, in execution order across all files. */
  changeSets: ChangeSet[];
  /** Files parsed, including followed includes. */
  files: string[];
}

/**
 * Parses the given changelogs in order, following include and includeAll
 * where they appear. A file reached twice is parsed once.
 */
export function loadChangelogs(
  filePaths: readonly string[],
  registry: ParserRegistry,
  opts: LoadOptions = {},
): LoadResult {
  const parameters = opts.parameters ?? new ChangeLogParameters();
  const baseDir = opts.baseDir ?? '.';
  const readText = opts.readText ?? ((path: string) => readFileSync(path, 'utf-8'));
  const listDir = opts.listDir ?? ((path: string) => readdirSync(path));

  const changeSets: ChangeSet[] = [];
  const files: string[] = [];
  const seen = new Set<string>();

  const load = (filePath: string): void => {
    const key = resolve(filePath);
    if (seen.has(key)) return;
    seen.add(key);

    const plugin = registry.getPlugin(filePath);
    if (!plugin) {
      throw new ChangelogParseError(filePath, `Unsupported changelog format "${getExtension(filePath) || filePath}"`);
    }

    files.push(filePath);
    const entries = plugin.parseChangelog(readText(filePath), filePath, parameters);

    for (const entry of entries) {
      switch (entry.type) {
        case 'changeSet':
          changeSets.push(entry.changeSet);
          break;
        case 'include':
          load(resolveIncludePath(entry.path, filePath, entry.relativeToChangelogFile, baseDir));
          break;
        case 'includeAll': {
          const dir = resolveIncludePath(entry.path, filePath, entry.relativeToChangelogFile, baseDir);
          const supported = new Set(registry.supportedExtensions());
          const names = listDir(dir)
            .filter(name => supported.has(getExtension(name)))
            .sort();
          for (const name of names) {
            load(join(dir, name));
          }
          break;
        }
      }
    }
  };

  for (const filePath of filePaths) {
    load(filePath);
  }

  return { changeSets, files };
}
