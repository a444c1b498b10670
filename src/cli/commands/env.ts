/**
 * Env Command - Edit the slurmdbd environment-defaults file
 */

import { Command } from 'commander';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, parseAssignments, type GlobalOptions } from '../options.js';
import { EnvDefaultsEditor } from '../../editor/env-defaults.js';

export interface EnvOptions extends GlobalOptions {
  /** Variables to remove */
  unset?: string[];
}

/**
 * Execute the env command. With nothing to change, prints the file.
 */
export async function envCommand(assignments: string[], options: EnvOptions): Promise<void> {
  try {
    log.debug('Env command invoked');
    const context = loadCliContext(options);
    const editor = new EnvDefaultsEditor(context.defaultsFile, { lock: context.lock });

    const changes: Record<string, string | null> = parseAssignments(assignments);
    for (const key of options.unset ?? []) {
      changes[key] = null;
    }

    if (Object.keys(changes).length === 0) {
      for (const line of editor.readLines()) {
        console.log(line);
      }
      return;
    }

    const { updated, added, removed } = editor.apply(changes);
    log.info(
      `Updated ${editor.path}: ` +
        `updated [${updated.join(', ')}], added [${added.join(', ')}], removed [${removed.join(', ')}]`,
    );
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * Register the env command with Commander
 */
export function registerEnvCommand(program: Command): void {
  program
    .command('env')
    .description('Set or remove variables in the slurmdbd environment-defaults file')
    .argument('[assignments...]', 'NAME=value pairs')
    .option('--unset <names...>', 'Variables to remove')
    .action((assignments: string[], _options: EnvOptions, command: Command) =>
      envCommand(assignments, command.optsWithGlobals()),
    )
    .addHelpText(
      'after',
      `
Examples:
  $ dbdconf env                                     # Print the file
  $ dbdconf env MYSQL_UNIX_PORT=/run/mysqld/mysqld.sock
  $ dbdconf env --unset MYSQL_UNIX_PORT

Names match case-insensitively and are written upper-case.
`,
    );
}
