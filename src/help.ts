import type { AppDescriptor, CommandDescriptor, FlagDescriptor } from './types';
import { bold } from './utils/colors';

const INDENT = '  ';

/** Render a flag key with the dash style it is usually typed with */
function dashed(key: string): string {
  return key.length === 1 ? `-${key}` : `--${key}`;
}

/**
 * Format flag keys with an optional value placeholder.
 * e.g., "--age, -a <int>" or "--bye, -b"
 */
function formatFlagKeys(flag: FlagDescriptor): string {
  const keys = [flag.name, ...flag.aliases].map(dashed).join(', ');
  return flag.type === 'bool' ? keys : `${keys} <${flag.type}>`;
}

function formatCommandKeys(command: CommandDescriptor): string {
  return [command.name, ...command.aliases].join(', ');
}

/**
 * Lay out `[left, right]` rows as two aligned columns.
 */
function formatColumns(rows: readonly (readonly [string, string])[]): string[] {
  const width = Math.max(...rows.map(([left]) => left.length));
  return rows.map(([left, right]) =>
    right ? `${INDENT}${left.padEnd(width + 2)}${right}` : `${INDENT}${left}`,
  );
}

export interface HelpHints {
  /** Positional that shows help for the command after it; null hides the hint */
  helpCommand?: string | null;
  /** Flag key that shows help; null hides the hint */
  helpFlag?: string | null;
}

function programName(app: AppDescriptor): string {
  return app.displayName ?? app.name;
}

/**
 * Render the help text for the last command of `path`.
 * `path` runs from the app root to the command, as produced by resolveCommand.
 */
export function renderHelp(
  app: AppDescriptor,
  path: readonly CommandDescriptor[],
  hints: HelpHints = {},
): string {
  const command = path[path.length - 1] ?? app;
  const isRoot = command === app;
  if (isRoot && app.customHelp !== undefined) {
    return app.customHelp;
  }

  const fullName = [app.name, ...path.slice(1).map((cmd) => cmd.name)].join(' ');
  const lines: string[] = [];

  // Header
  if (isRoot) {
    lines.push(app.version ? `${programName(app)} v${app.version}` : programName(app));
    if (app.author) {
      lines.push(`${INDENT}${app.author}`);
    }
  } else {
    lines.push(fullName);
  }
  lines.push('');

  if (command.description) {
    lines.push(`${INDENT}${command.description}`);
    lines.push('');
  }

  lines.push(bold('USAGE:'));
  lines.push(`${INDENT}${command.usage ?? `${fullName} [options] [args]`}`);
  lines.push('');

  if (command.aliases.length > 0) {
    lines.push(bold('ALIASES:'));
    lines.push(`${INDENT}${command.aliases.join(', ')}`);
    lines.push('');
  }

  if (command.flags.length > 0) {
    lines.push(bold('OPTIONS:'));
    lines.push(
      ...formatColumns(
        command.flags.map((flag): [string, string] => [
          formatFlagKeys(flag),
          flag.description ?? '',
        ]),
      ),
    );
    lines.push('');
  }

  if (command.children.length > 0) {
    lines.push(bold('COMMANDS:'));
    lines.push(
      ...formatColumns(
        command.children.map((child): [string, string] => [
          formatCommandKeys(child),
          child.description ?? '',
        ]),
      ),
    );
    lines.push('');

    const helpCommand = hints.helpCommand === undefined ? 'help' : hints.helpCommand;
    const helpFlag = hints.helpFlag === undefined ? 'help' : hints.helpFlag;
    const usages: [string, string][] = [];
    if (helpCommand) {
      usages.push([`${fullName} ${helpCommand} <command>`, 'Show help for a specific command']);
    }
    if (helpFlag) {
      usages.push([`${fullName} <command> ${dashed(helpFlag)}`, 'Show help for a specific command']);
    }
    if (usages.length > 0) {
      lines.push(bold('HELP:'));
      lines.push(...formatColumns(usages));
      lines.push('');
    }
  }

  return lines.join('\n').trimEnd();
}
