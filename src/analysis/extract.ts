import type { RawChange } from '../model/changelog.js';
import type { ChangeEvent } from '../model/event.js';
import { columnDropped, notNullAdded, tableCreated, tableDropped } from '../model/event.js';

export function toChangeEvent(change: RawChange): ChangeEvent | undefined {
  const { tableName, columnName, filePath } = change;
  if (!tableName) return undefined;

  switch (change.kind) {
    case 'createTable':
      return tableCreated(tableName, filePath);
    case 'dropTable':
      return tableDropped(tableName, filePath);
    case 'dropColumn':
      return columnName ? columnDropped(tableName, columnName, filePath) : undefined;
    case 'addNotNullConstraint':
      return columnName ? notNullAdded(tableName, columnName, filePath) : undefined;
    default:
      return undefined;
  }
}

/** Keeps input order. Changes of any other kind are dropped. */
export function extractEvents(changes: Iterable<RawChange>): ChangeEvent[] {
  const events: ChangeEvent[] = [];
  for (const change of changes) {
    const event = toChangeEvent(change);
    if (event) events.push(event);
  }
  return events;
}
