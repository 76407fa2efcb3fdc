import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { getExtension } from './utils/path.js';

export const CONFIG_FILES = ['.rollsaferc.json', '.rollsaferc.yml', '.rollsaferc.yaml'];

const ConfigSchema = z
  .object({
    changelogs: z.array(z.string().min(1)).optional(),
    database: z.string().min(1).optional(),
    format: z.enum(['terminal', 'json']).optional(),
    failOnBreaking: z.boolean().optional(),
    properties: z.record(z.string()).optional(),
  })
  .strict();

export type RollsafeConfig = z.infer<typeof ConfigSchema>;

export function findConfigFile(cwd: string): string | undefined {
  return CONFIG_FILES.map(name => resolve(cwd, name)).find(path => existsSync(path));
}

export function parseConfig(content: string, configPath: string): RollsafeConfig {
  let raw: unknown;
  try {
    raw = getExtension(configPath) === '.json' ? JSON.parse(content) : loadYaml(content);
  } catch (err) {
    throw new ConfigError(`invalid ${getExtension(configPath) === '.json' ? 'JSON' : 'YAML'}: ${errorMessage(err)}`, configPath);
  }

  // An empty YAML document is an empty config.
  if (raw === undefined || raw === null) return {};

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(issues, configPath);
  }
  return result.data;
}

/**
 * Loads `explicitPath`, or the first of CONFIG_FILES found in `cwd`.
 * No config file means an empty config. Relative `changelogs` entries resolve
 * against the config file's directory.
 */
export async function loadConfig(cwd: string, explicitPath?: string): Promise<RollsafeConfig> {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : findConfigFile(cwd);
  if (!configPath) return {};

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`cannot read config: ${errorMessage(err)}`, configPath);
  }
  const config = parseConfig(content, configPath);
  if (config.changelogs) {
    const configDir = dirname(configPath);
    config.changelogs = config.changelogs.map(f => resolve(configDir, f));
  }
  return config;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
