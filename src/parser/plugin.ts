import type { ChangelogEntry } from '../model/changelog.js';
import type { ChangeLogParameters } from './parameters.js';

export interface ChangelogParserPlugin {
  id: string;
  extensions: string[];
  /**
   * Top-level entries of one changelog document, in document order.
   * Includes are returned unresolved; the loader follows them.
   */
  parseChangelog(content: string, filePath: string, parameters: ChangeLogParameters): ChangelogEntry[];
}
