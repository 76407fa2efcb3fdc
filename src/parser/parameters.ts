export const DEFAULT_DATABASE = 'postgresql';

/**
 * Values substituted for `${name}` in changelog attributes, plus the target
 * database dialect. Nothing here connects to a database; the dialect only
 * decides which `dbms`-targeted change-sets apply.
 */
export class ChangeLogParameters {
  readonly database: string;
  private values = new Map<string, string>();

  constructor(database: string = DEFAULT_DATABASE, properties: Record<string, string> = {}) {
    this.database = database.toLowerCase();
    for (const [name, value] of Object.entries(properties)) {
      this.set(name, value);
    }
  }

  /** First definition wins, as later changelogs cannot override a property. */
  set(name: string, value: string): void {
    if (!this.values.has(name)) {
      this.values.set(name, value);
    }
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  expand(text: string): string {
    return text.replace(/\$\{([^}]+)\}/g, (ref, name: string) => this.values.get(name) ?? ref);
  }

  matchesDbms(dbms: string | undefined): boolean {
    if (dbms === undefined) return true;
    const entries = dbms.split(',').map(d => d.trim().toLowerCase()).filter(d => d.length > 0);
    if (entries.length === 0) return true;
    if (entries.includes('none')) return false;
    if (entries.includes('all')) return true;
    if (entries.includes(`!${this.database}`)) return false;

    const included = entries.filter(d => !d.startsWith('!'));
    return included.length === 0 || included.includes(this.database);
  }
}
