import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { ChangelogParserPlugin } from '../../plugin.js';
import type { ChangeLogParameters } from '../../parameters.js';
import type { ChangeSet, ChangelogEntry, RawChange } from '../../../model/changelog.js';
import { ChangelogParseError } from '../../../errors.js';

// Key fast-xml-parser uses for attributes when preserveOrder is on.
const ATTRIBUTES_KEY = ':@';

// Children of a changeSet that are not changes.
const NON_CHANGE_ELEMENTS = new Set(['comment', 'preConditions', 'validCheckSum', 'rollback']);
const TABLE_SCOPED = new Set(['createTable', 'dropTable', 'dropColumn', 'addNotNullConstraint']);
const COLUMN_SCOPED = new Set(['dropColumn', 'addNotNullConstraint']);

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
}

export class XmlChangelogParserPlugin implements ChangelogParserPlugin {
  id = 'xml';
  extensions = ['.xml'];

  private validationOptions = { allowBooleanAttributes: true };

  private parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseAttributeValue: false,
    allowBooleanAttributes: this.validationOptions.allowBooleanAttributes,
  });

  parseChangelog(content: string, filePath: string, parameters: ChangeLogParameters): ChangelogEntry[] {
    const validation = XMLValidator.validate(content, this.validationOptions);
    if (validation !== true) {
      throw new ChangelogParseError(filePath, validation.err.msg, validation.err.line);
    }

    const root = toElements(this.parser.parse(content)).find(el => el.name === 'databaseChangeLog');
    if (!root) {
      throw new ChangelogParseError(filePath, 'missing <databaseChangeLog> root element');
    }

    // Properties apply to the whole document, wherever they are declared.
    for (const el of root.children) {
      if (el.name === 'property') this.defineProperty(el, filePath, parameters);
    }

    const entries: ChangelogEntry[] = [];
    for (const el of root.children) {
      switch (el.name) {
        case 'changeSet': {
          const changeSet = this.readChangeSet(el, filePath, parameters);
          if (changeSet) entries.push({ type: 'changeSet', changeSet });
          break;
        }
        case 'include':
        case 'includeAll': {
          const attr = el.name === 'include' ? 'file' : 'path';
          const target = el.attributes[attr];
          if (!target) {
            throw new ChangelogParseError(filePath, `<${el.name}> requires a "${attr}" attribute`);
          }
          entries.push({
            type: el.name === 'include' ? 'include' : 'includeAll',
            path: parameters.expand(target),
            relativeToChangelogFile: el.attributes.relativeToChangelogFile === 'true',
          });
          break;
        }
      }
    }
    return entries;
  }

  private defineProperty(el: XmlElement, filePath: string, parameters: ChangeLogParameters): void {
    const { name, value, file, dbms } = el.attributes;
    if (file !== undefined) {
      throw new ChangelogParseError(filePath, `property files are not supported (${file})`);
    }
    if (!name || value === undefined) {
      throw new ChangelogParseError(filePath, '<property> requires "name" and "value" attributes');
    }
    if (parameters.matchesDbms(dbms)) {
      parameters.set(name, value);
    }
  }

  private readChangeSet(el: XmlElement, filePath: string, parameters: ChangeLogParameters): ChangeSet | undefined {
    const { id, author, dbms } = el.attributes;
    if (!id || !author) {
      throw new ChangelogParseError(filePath, '<changeSet> requires "id" and "author" attributes');
    }
    if (!parameters.matchesDbms(dbms)) return undefined;

    const changes: RawChange[] = [];
    for (const child of el.children) {
      if (NON_CHANGE_ELEMENTS.has(child.name)) continue;
      changes.push(...this.readChanges(child, { filePath, changeSetId: id, author }, parameters));
    }
    return { id, author, filePath, changes };
  }

  private readChanges(
    el: XmlElement,
    origin: Pick<RawChange, 'filePath' | 'changeSetId' | 'author'>,
    parameters: ChangeLogParameters,
  ): RawChange[] {
    const kind = el.name;
    const attr = (name: string): string | undefined => {
      const value = el.attributes[name];
      return value === undefined ? undefined : parameters.expand(value);
    };
    const tableName = attr('tableName');
    const columnName = attr('columnName');
    const where = `<${kind}> in changeSet "${origin.changeSetId}"`;

    if (TABLE_SCOPED.has(kind) && !tableName) {
      throw new ChangelogParseError(origin.filePath, `${where} requires "tableName"`);
    }

    // <dropColumn tableName="t"><column name="a"/><column name="b"/></dropColumn>
    if (kind === 'dropColumn' && !columnName) {
      const nested = el.children
        .filter(c => c.name === 'column' && c.attributes.name)
        .map(c => parameters.expand(c.attributes.name));
      if (nested.length === 0) {
        throw new ChangelogParseError(origin.filePath, `${where} requires "columnName" or nested <column> elements`);
      }
      return nested.map(column => ({ kind, tableName, columnName: column, ...origin }));
    }

    if (COLUMN_SCOPED.has(kind) && !columnName) {
      throw new ChangelogParseError(origin.filePath, `${where} requires "columnName"`);
    }

    return [{ kind, tableName, columnName, ...origin }];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') attributes[key] = raw;
    else if (typeof raw === 'number' || typeof raw === 'boolean') attributes[key] = String(raw);
  }
  return attributes;
}

/** Converts fast-xml-parser's ordered output to a plain element tree. */
export function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const key = Object.keys(node).find(k => k !== ATTRIBUTES_KEY && !k.startsWith('#'));
    if (!key) continue;
    elements.push({
      name: key.slice(key.indexOf(':') + 1),
      attributes: readAttributes(node[ATTRIBUTES_KEY]),
      children: toElements(node[key]),
    });
  }
  return elements;
}
