import type { CheckResult } from '../../analysis/check.js';

export function formatJson(result: CheckResult): string {
  return JSON.stringify({
    summary: {
      files: result.fileCount,
      changeSets: result.changeSetCount,
      events: result.extracted.length,
      breaking: result.breaking.length,
    },
    changes: result.events.map(({ event, line, breaking, message }) => ({
      kind: event.kind,
      table: event.table,
      column: 'column' in event ? event.column : undefined,
      file: event.file,
      line,
      breaking,
      message,
    })),
  }, null, 2);
}
