import { describe, it, expect } from 'vitest';
import { extractEvents, toChangeEvent } from '../src/analysis/extract.js';
import type { RawChange } from '../src/model/changelog.js';

function raw(kind: string, tableName?: string, columnName?: string): RawChange {
  return { kind, tableName, columnName, filePath: 'db/changelog.xml', changeSetId: '1', author: 'release-bot' };
}

describe('extractEvents', () => {
  it('maps the four structural kinds', () => {
    const events = extractEvents([
      raw('createTable', 'person'),
      raw('dropTable', 'orders'),
      raw('dropColumn', 'orders', 'note'),
      raw('addNotNullConstraint', 'person', 'username'),
    ]);

    expect(events).toEqual([
      { kind: 'tableCreated', table: 'person', file: 'db/changelog.xml' },
      { kind: 'tableDropped', table: 'orders', file: 'db/changelog.xml' },
      { kind: 'columnDropped', table: 'orders', column: 'note', file: 'db/changelog.xml' },
      { kind: 'notNullAdded', table: 'person', column: 'username', file: 'db/changelog.xml' },
    ]);
  });

  it('drops other kinds and keeps order', () => {
    const events = extractEvents([
      raw('addColumn', 'person'),
      raw('dropTable', 'b'),
      raw('sql'),
      raw('tagDatabase'),
      raw('dropTable', 'a'),
    ]);

    expect(events.map(e => e.table)).toEqual(['b', 'a']);
  });

  it('returns an empty list for no input', () => {
    expect(extractEvents([])).toEqual([]);
  });

  it('produces frozen events', () => {
    const event = toChangeEvent(raw('dropTable', 'orders'));
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('does not attach a column to table-scoped kinds', () => {
    const event = toChangeEvent(raw('createTable', 'person', 'ignored'));
    expect(event).toEqual({ kind: 'tableCreated', table: 'person', file: 'db/changelog.xml' });
  });
});
