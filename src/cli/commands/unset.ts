/**
 * Unset Command - Remove slurmdbd.conf parameters
 */

import { Command } from 'commander';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, type GlobalOptions } from '../options.js';
import { SlurmdbdConfEditor } from '../../editor/conf-editor.js';
import { KeyNotPresentError } from '../../editor/errors.js';
import { lookup } from '../../editor/tokens.js';

export interface UnsetOptions extends GlobalOptions {
  /** Skip keys that are not set instead of failing */
  ignoreMissing?: boolean;
}

/**
 * Execute the unset command. Without --ignore-missing, a key that is not
 * set fails the whole command before anything is removed.
 */
export async function unsetCommand(keys: string[], options: UnsetOptions): Promise<void> {
  try {
    log.debug(`Unset command invoked: ${keys.join(', ')}`);
    const tokens = keys.map(lookup);
    const context = loadCliContext(options);

    const editor = SlurmdbdConfEditor.open(context.confFile, { lock: context.lock });
    const present = tokens.filter((token) => editor.has(token));
    const missing = tokens.find((token) => !editor.has(token));
    if (missing !== undefined && !options.ignoreMissing) {
      throw new KeyNotPresentError(missing);
    }

    if (present.length === 0) {
      log.info(`Nothing to remove from ${editor.path}`);
      return;
    }

    for (const token of new Set(present)) {
      editor.delete(token);
    }
    editor.dump();

    log.info(`Removed ${[...new Set(present)].join(', ')} from ${editor.path}`);
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * Register the unset command with Commander
 */
export function registerUnsetCommand(program: Command): void {
  program
    .command('unset')
    .description('Remove one or more parameters from slurmdbd.conf')
    .argument('<keys...>', 'slurmdbd.conf keys')
    .option('--ignore-missing', 'Skip keys that are not set')
    .action((keys: string[], _options: UnsetOptions, command: Command) =>
      unsetCommand(keys, command.optsWithGlobals()),
    );
}
