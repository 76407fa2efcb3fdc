// Model types
export type {
  ChangeEvent,
  ChangeEventKind,
  TableCreated,
  TableDropped,
  ColumnDropped,
  NotNullAdded,
  ClassifiedEvent,
  LocatedEvent,
} from './model/event.js';
export { tableCreated, tableDropped, columnDropped, notNullAdded, eventTarget } from './model/event.js';
export type { RawChange, ChangeSet, ChangelogEntry } from './model/changelog.js';

// Analysis
export { extractEvents, toChangeEvent } from './analysis/extract.js';
export { isBreaking, describeEvent, classifyEvents } from './analysis/classify.js';
export { locate, locateInText, splitLines, lineAtOffset, SourceLocator } from './analysis/locate.js';
export { checkChangelogs } from './analysis/check.js';
export type { CheckOptions, CheckResult } from './analysis/check.js';

// Parser system
export type { ChangelogParserPlugin } from './parser/plugin.js';
export { ParserRegistry } from './parser/registry.js';
export { ChangeLogParameters, DEFAULT_DATABASE } from './parser/parameters.js';
export { loadChangelogs } from './parser/loader.js';
export type { LoadOptions, LoadResult } from './parser/loader.js';
export { createDefaultRegistry } from './parser/plugins/index.js';
export { XmlChangelogParserPlugin } from './parser/plugins/xml/index.js';

// Configuration and errors
export { loadConfig, parseConfig, findConfigFile } from './config.js';
export type { RollsafeConfig } from './config.js';
export { RollsafeError, ChangelogParseError, ConfigError } from './errors.js';
