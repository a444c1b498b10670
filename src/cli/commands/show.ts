/**
 * Show Command - Print the current slurmdbd.conf parameters
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, type GlobalOptions } from '../options.js';
import { SlurmdbdConfEditor } from '../../editor/conf-editor.js';
import { SECRET_TOKENS } from '../../editor/registry.js';

export interface ShowOptions extends GlobalOptions {
  json?: boolean;
  /** Print secret values instead of masking them */
  reveal?: boolean;
}

export const MASK = '********';

/**
 * Execute the show command
 */
export async function showCommand(options: ShowOptions): Promise<void> {
  try {
    log.debug('Show command invoked');
    const context = loadCliContext(options);

    const editor = new SlurmdbdConfEditor(context.confFile);
    editor.load();

    const entries = editor
      .entries()
      .map(([key, value]): [string, string] => [key, SECRET_TOKENS.has(key) && !options.reveal ? MASK : value]);

    if (options.json) {
      // Machine-readable JSON output
      console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
      return;
    }

    if (entries.length === 0) {
      log.info(`No parameters set in ${editor.path}`);
      return;
    }

    console.log(chalk.bold(editor.path));
    for (const [key, value] of entries) {
      console.log(`${chalk.cyan(key)}=${value}`);
    }
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * Register the show command with Commander
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Print the parameters set in slurmdbd.conf')
    .option('--json', 'Output in JSON format')
    .option('--reveal', 'Print StoragePass instead of masking it')
    .action((_options: ShowOptions, command: Command) => showCommand(command.optsWithGlobals()))
    .addHelpText(
      'after',
      `
Examples:
  $ dbdconf show                 # Key=Value listing
  $ dbdconf show --json          # Machine-readable JSON output

Related Commands:
  get             Print a single parameter
  validate        Check every stored value
`,
    );
}
