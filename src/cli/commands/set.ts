/**
 * Set Command - Change slurmdbd.conf parameters
 */

import { Command } from 'commander';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, parseAssignments, type GlobalOptions } from '../options.js';
import { SlurmdbdConfEditor } from '../../editor/conf-editor.js';
import { applyParameters } from '../../render/parameters.js';

export type SetOptions = GlobalOptions;

/**
 * Execute the set command. Every assignment is validated before any is
 * stored; one bad value leaves the file untouched.
 */
export async function setCommand(assignments: string[], options: SetOptions): Promise<void> {
  try {
    log.debug(`Set command invoked: ${assignments.length} assignment(s)`);
    const parameters = parseAssignments(assignments);
    const context = loadCliContext(options);

    const editor = SlurmdbdConfEditor.open(context.confFile, { lock: context.lock });
    applyParameters(editor, parameters);
    editor.dump();

    log.info(`Updated ${Object.keys(parameters).join(', ')} in ${editor.path}`);
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * Register the set command with Commander
 */
export function registerSetCommand(program: Command): void {
  program
    .command('set')
    .description('Set one or more parameters in slurmdbd.conf')
    .argument('<assignments...>', 'Key=Value pairs')
    .action((assignments: string[], _options: SetOptions, command: Command) =>
      setCommand(assignments, command.optsWithGlobals()),
    )
    .addHelpText(
      'after',
      `
Examples:
  $ dbdconf set DebugLevel=verbose
  $ dbdconf set StorageHost=db0 StoragePort=3306
  $ dbdconf set PrivateData=accounts,jobs
`,
    );
}
