import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, parseConfig, findConfigFile } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseConfig', () => {
  it('reads YAML', () => {
    const config = parseConfig([
      'changelogs:',
      '  - db/changelog.xml',
      'database: h2',
      'failOnBreaking: false',
      'properties:',
      '  schema: app',
    ].join('\n'), '.rollsaferc.yml');

    expect(config).toEqual({
      changelogs: ['db/changelog.xml'],
      database: 'h2',
      failOnBreaking: false,
      properties: { schema: 'app' },
    });
  });

  it('reads JSON', () => {
    expect(parseConfig('{ "format": "json" }', '.rollsaferc.json')).toEqual({ format: 'json' });
  });

  it('treats an empty YAML document as an empty config', () => {
    expect(parseConfig('', '.rollsaferc.yaml')).toEqual({});
  });

  it('reports schema violations with their path', () => {
    expect(() => parseConfig('format: xml', '.rollsaferc.yml')).toThrow(ConfigError);
    expect(() => parseConfig('changelogs: [1]', '.rollsaferc.yml')).toThrow(/^\.rollsaferc\.yml: changelogs\.0: /);
    expect(() => parseConfig('unknownKey: true', '.rollsaferc.yml')).toThrow(/\(root\): Unrecognized key/);
  });

  it('reports syntax errors', () => {
    expect(() => parseConfig('{ "format": ', '.rollsaferc.json')).toThrow(/^\.rollsaferc\.json: invalid JSON: /);
    expect(() => parseConfig('changelogs: [', '.rollsaferc.yml')).toThrow(/^\.rollsaferc\.yml: invalid YAML: /);
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('returns an empty config when no file exists', async () => {
    dir = mkdtempSync(join(tmpdir(), 'rollsafe-'));
    expect(findConfigFile(dir)).toBeUndefined();
    expect(await loadConfig(dir)).toEqual({});
  });

  it('prefers .rollsaferc.json over YAML', async () => {
    dir = mkdtempSync(join(tmpdir(), 'rollsafe-'));
    writeFileSync(join(dir, '.rollsaferc.json'), '{ "database": "mysql" }');
    writeFileSync(join(dir, '.rollsaferc.yml'), 'database: oracle\n');

    expect(findConfigFile(dir)).toBe(join(dir, '.rollsaferc.json'));
    expect(await loadConfig(dir)).toEqual({ database: 'mysql' });
  });

  it('loads an explicit path relative to the working directory', async () => {
    dir = mkdtempSync(join(tmpdir(), 'rollsafe-'));
    writeFileSync(join(dir, 'ci.yml'), 'format: json\n');

    expect(await loadConfig(dir, 'ci.yml')).toEqual({ format: 'json' });
  });

  it('resolves changelogs against the config file directory', async () => {
    dir = mkdtempSync(join(tmpdir(), 'rollsafe-'));
    mkdirSync(join(dir, 'db'));
    writeFileSync(join(dir, 'db', 'ci.yml'), 'changelogs:\n  - changelog.xml\n  - /abs/changelog.xml\n');

    expect(await loadConfig(dir, 'db/ci.yml')).toEqual({
      changelogs: [join(dir, 'db', 'changelog.xml'), '/abs/changelog.xml'],
    });
  });

  it('fails on a missing explicit file', async () => {
    dir = mkdtempSync(join(tmpdir(), 'rollsafe-'));
    await expect(loadConfig(dir, 'missing.yml')).rejects.toThrow(/cannot read config/);
  });
});
