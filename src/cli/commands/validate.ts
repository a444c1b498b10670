/**
 * Validate Command - Check slurmdbd.conf and the tool configuration
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, type GlobalOptions } from '../options.js';
import { formatValidationErrors, getConfigSummary, validateConfig } from '../../config/index.js';
import { SlurmdbdConfEditor } from '../../editor/conf-editor.js';

export interface ValidateOptions extends GlobalOptions {
  json?: boolean;
}

export interface ValidateReport {
  file: string;
  valid: boolean;
  errors: string[];
}

/**
 * Execute the validate command. Exits with status 1 when any check fails.
 */
export async function validateCommand(options: ValidateOptions): Promise<void> {
  let report: ValidateReport;
  try {
    log.debug('Validate command invoked');
    const context = loadCliContext(options);
    log.debug(getConfigSummary(context.config));

    const editor = new SlurmdbdConfEditor(context.confFile);
    editor.load();

    const errors = [...validateConfig(context.config).errors, ...editor.validate().errors];
    report = { file: editor.path, valid: errors.length === 0, errors };
  } catch (error) {
    handleCommandError(error);
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else if (report.valid) {
    console.log(chalk.green('✓') + ` ${report.file} is valid`);
  } else {
    console.log(chalk.red('✗') + ` ${report.file}`);
    console.log(formatValidationErrors(report.errors));
  }

  if (!report.valid) {
    process.exit(1);
  }
}

/**
 * Register the validate command with Commander
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check every value in slurmdbd.conf and the tool configuration')
    .option('--json', 'Output in JSON format')
    .action((_options: ValidateOptions, command: Command) => validateCommand(command.optsWithGlobals()));
}
