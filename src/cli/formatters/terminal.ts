import chalk from 'chalk';
import type { CheckResult } from '../../analysis/check.js';
import type { LocatedEvent } from '../../model/event.js';
import { eventTarget } from '../../model/event.js';

const RULE = '------';

export function formatBreakingBlock(located: LocatedEvent): string {
  return [
    chalk.dim(RULE),
    `${chalk.red('Breaking change')} in file ${chalk.bold(located.event.file)} on line ${located.line}.`,
    located.message,
    chalk.dim(RULE),
  ].join('\n');
}

function formatSafeLine(located: LocatedEvent): string {
  const { event } = located;
  return chalk.dim(`  ok  ${event.kind} ${eventTarget(event)} (${event.file}:${located.line})`);
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

export function formatTerminal(result: CheckResult): string {
  const lines: string[] = [];

  for (const located of result.breaking) {
    lines.push(formatBreakingBlock(located));
  }

  const safe = result.events.filter(e => !e.breaking);
  for (const located of safe) {
    lines.push(formatSafeLine(located));
  }

  if (result.breaking.length === 0) {
    lines.push(chalk.green('No breaking changes detected.'));
  } else {
    const files = new Set(result.breaking.map(e => e.event.file));
    lines.push(chalk.red(`${plural(result.breaking.length, 'breaking change')} in ${plural(files.size, 'file')}`));
  }

  return lines.join('\n');
}
