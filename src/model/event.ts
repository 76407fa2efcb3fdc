export type ChangeEventKind = 'tableCreated' | 'tableDropped' | 'columnDropped' | 'notNullAdded';

export interface TableCreated {
  readonly kind: 'tableCreated';
  readonly table: string;
  readonly file: string;
}

export interface TableDropped {
  readonly kind: 'tableDropped';
  readonly table: string;
  readonly file: string;
}

export interface ColumnDropped {
  readonly kind: 'columnDropped';
  readonly table: string;
  readonly column: string;
  readonly file: string;
}

export interface NotNullAdded {
  readonly kind: 'notNullAdded';
  readonly table: string;
  readonly column: string;
  readonly file: string;
}

export type ChangeEvent = TableCreated | TableDropped | ColumnDropped | NotNullAdded;

export function tableCreated(table: string, file: string): TableCreated {
  const event: TableCreated = { kind: 'tableCreated', table, file };
  return Object.freeze(event);
}

export function tableDropped(table: string, file: string): TableDropped {
  const event: TableDropped = { kind: 'tableDropped', table, file };
  return Object.freeze(event);
}

export function columnDropped(table: string, column: string, file: string): ColumnDropped {
  const event: ColumnDropped = { kind: 'columnDropped', table, column, file };
  return Object.freeze(event);
}

export function notNullAdded(table: string, column: string, file: string): NotNullAdded {
  const event: NotNullAdded = { kind: 'notNullAdded', table, column, file };
  return Object.freeze(event);
}

/** "table" or "table.column", for display. */
export function eventTarget(event: ChangeEvent): string {
  switch (event.kind) {
    case 'columnDropped':
    case 'notNullAdded':
      return `${event.table}.${event.column}`;
    default:
      return event.table;
  }
}

export interface ClassifiedEvent {
  event: ChangeEvent;
  breaking: boolean;
  message: string;
}

export interface LocatedEvent extends ClassifiedEvent {
  /** 1-based; 1 when the locator finds no matching tag. */
  line: number;
}
