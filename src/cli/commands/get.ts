/**
 * Get Command - Print one slurmdbd.conf parameter
 */

import { Command } from 'commander';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, type GlobalOptions } from '../options.js';
import { SlurmdbdConfEditor } from '../../editor/conf-editor.js';
import { lookup } from '../../editor/tokens.js';

export interface GetOptions extends GlobalOptions {
  /** Print the decoded value as JSON */
  json?: boolean;
}

/**
 * Execute the get command. Exits with status 1 when the key is not set.
 */
export async function getCommand(key: string, options: GetOptions): Promise<void> {
  try {
    log.debug(`Get command invoked for ${key}`);
    const token = lookup(key);
    const context = loadCliContext(options);

    const editor = new SlurmdbdConfEditor(context.confFile);
    editor.load();

    if (!editor.has(token)) {
      log.error(`${token} is not set in ${editor.path}`);
      process.exit(1);
    }

    if (options.json) {
      console.log(JSON.stringify(editor.get(token)));
    } else {
      console.log(editor.getRaw(token));
    }
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * Register the get command with Commander
 */
export function registerGetCommand(program: Command): void {
  program
    .command('get')
    .description('Print one parameter from slurmdbd.conf')
    .argument('<key>', 'slurmdbd.conf key, e.g. StorageHost')
    .option('--json', 'Print the typed value as JSON')
    .action((key: string, _options: GetOptions, command: Command) => getCommand(key, command.optsWithGlobals()))
    .addHelpText(
      'after',
      `
Examples:
  $ dbdconf get StoragePort           # 3306
  $ dbdconf get PrivateData --json    # ["accounts","jobs"]
`,
    );
}
