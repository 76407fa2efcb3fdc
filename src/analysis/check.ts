import type { ChangeEvent, LocatedEvent } from '../model/event.js';
import type { ParserRegistry } from '../parser/registry.js';
import { loadChangelogs, type LoadOptions } from '../parser/loader.js';
import { extractEvents } from './extract.js';
import { classifyEvents } from './classify.js';
import { SourceLocator } from './locate.js';

export interface CheckOptions extends LoadOptions {
  /** Locate and return non-breaking events too. */
  includeSafe?: boolean;
}

export interface CheckResult {
  /** Breaking events, plus safe ones when `includeSafe` is set. */
  events: LocatedEvent[];
  breaking: LocatedEvent[];
  /** Every extracted event, located or not. */
  extracted: ChangeEvent[];
  fileCount: number;
  changeSetCount: number;
}

export function checkChangelogs(
  filePaths: readonly string[],
  registry: ParserRegistry,
  opts: CheckOptions = {},
): CheckResult {
  const { changeSets, files } = loadChangelogs(filePaths, registry, opts);

  // Classification needs every event from every file.
  const extracted = extractEvents(changeSets.flatMap(cs => cs.changes));
  const classified = classifyEvents(extracted);

  const locator = new SourceLocator(opts.readText);
  const events: LocatedEvent[] = classified
    .filter(c => c.breaking || opts.includeSafe)
    .map(c => ({ ...c, line: locator.locate(c.event) }));

  return {
    events,
    breaking: events.filter(e => e.breaking),
    extracted,
    fileCount: files.length,
    changeSetCount: changeSets.length,
  };
}
