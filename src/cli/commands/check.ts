import { isAbsolute, join } from 'node:path';
import chalk from 'chalk';
import { checkChangelogs } from '../../analysis/check.js';
import { loadConfig, errorMessage } from '../../config.js';
import { RollsafeError } from '../../errors.js';
import { ChangeLogParameters } from '../../parser/parameters.js';
import type { ParserRegistry } from '../../parser/registry.js';
import { createDefaultRegistry } from '../../parser/plugins/index.js';
import { formatTerminal } from '../formatters/terminal.js';
import { formatJson } from '../formatters/json.js';

export const EXIT_OK = 0;
export const EXIT_BREAKING = 1;
export const EXIT_ERROR = 2;

export interface CheckCommandOptions {
  cwd?: string;
  format?: 'terminal' | 'json';
  database?: string;
  /** "key=value" pairs. */
  property?: string[];
  all?: boolean;
  /** Overrides `failOnBreaking` from the config when set. */
  fail?: boolean;
  config?: string;
  verbose?: boolean;
}

let _registry: ParserRegistry | undefined;
function getRegistry(): ParserRegistry {
  return (_registry ??= createDefaultRegistry());
}

export function parseProperties(pairs: readonly string[]): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new RollsafeError(`Invalid property "${pair}", expected key=value`);
    }
    properties[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return properties;
}

/** Runs the check and prints the report. Resolves to the process exit code. */
export async function checkCommand(files: string[], opts: CheckCommandOptions = {}): Promise<number> {
  const cwd = opts.cwd ?? process.cwd();
  const debug = (message: string) => {
    if (opts.verbose) console.error(chalk.dim(`[rollsafe] ${message}`));
  };

  try {
    const config = await loadConfig(cwd, opts.config);
    const targets = files.length > 0 ? files : config.changelogs ?? [];
    if (targets.length === 0) {
      console.error(chalk.red('Error: No changelog files given.'));
      console.error(chalk.dim('  Pass them as arguments or list them under "changelogs" in .rollsaferc.'));
      return EXIT_ERROR;
    }

    const paths = targets.map(f => (opts.cwd && !isAbsolute(f) ? join(cwd, f) : f));
    const parameters = new ChangeLogParameters(opts.database ?? config.database, {
      ...config.properties,
      ...parseProperties(opts.property ?? []),
    });
    debug(`database ${parameters.database}, changelogs: ${paths.join(', ')}`);

    const result = checkChangelogs(paths, getRegistry(), {
      parameters,
      baseDir: opts.cwd ? cwd : '.',
      includeSafe: opts.all,
    });
    debug(`parsed ${result.fileCount} file(s), ${result.changeSetCount} change-set(s), ${result.extracted.length} event(s)`);

    const format = opts.format ?? config.format ?? 'terminal';
    console.log(format === 'json' ? formatJson(result) : formatTerminal(result));

    const failOnBreaking = opts.fail ?? config.failOnBreaking ?? true;
    return failOnBreaking && result.breaking.length > 0 ? EXIT_BREAKING : EXIT_OK;
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    if (opts.verbose && !(err instanceof RollsafeError) && err instanceof Error && err.stack) {
      console.error(chalk.dim(err.stack));
    }
    return EXIT_ERROR;
  }
}
