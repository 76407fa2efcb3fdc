export interface RawChange {
  /** Tag name of the change element, e.g. "createTable" or "addColumn". */
  kind: string;
  tableName?: string;
  columnName?: string;
  /** File holding the enclosing change-set. */
  filePath: string;
  changeSetId: string;
  author: string;
}

export interface ChangeSet {
  id: string;
  author: string;
  filePath: string;
  changes: RawChange[];
}

export type ChangelogEntry =
  | { type: 'changeSet'; changeSet: ChangeSet }
  | { type: 'include'; path: string; relativeToChangelogFile: boolean }
  | { type: 'includeAll'; path: string; relativeToChangelogFile: boolean };
