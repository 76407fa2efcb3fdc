import { Command, Option } from 'commander';
import { checkCommand } from './commands/check.js';

interface CheckCliOptions {
  format?: 'terminal' | 'json';
  database?: string;
  property: string[];
  all?: boolean;
  /** undefined unless --fail or --no-fail is given. */
  fail?: boolean;
  config?: string;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Builds the CLI. The check action stores its result in process.exitCode. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('rollsafe')
    .description('Flag Liquibase changelog changes that break running instances during a rolling deployment')
    .version('0.1.0');

  program
    .command('check [files...]', { isDefault: true })
    .description('Report breaking changes in the given changelog files')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['terminal', 'json']))
    .option('-d, --database <dialect>', 'Database dialect used to filter dbms-targeted change-sets')
    .option('-p, --property <key=value>', 'Changelog parameter substituted for ${key} (repeatable)', collect, [])
    .option('-a, --all', 'Also report non-breaking changes')
    .option('--fail', 'Exit with 1 when breaking changes are found, even if the config disables it')
    .option('--no-fail', 'Exit with 0 even when breaking changes are found')
    .option('-c, --config <path>', 'Configuration file (default: .rollsaferc.json, .rollsaferc.yml)')
    .option('-v, --verbose', 'Print debug information to stderr')
    .action(async (files: string[], opts: CheckCliOptions) => {
      process.exitCode = await checkCommand(files, {
        format: opts.format,
        database: opts.database,
        property: opts.property,
        all: opts.all,
        fail: opts.fail,
        config: opts.config,
        verbose: opts.verbose,
      });
    });

  return program;
}
