#!/usr/bin/env node

/**
 * dbdconf CLI Entry Point
 *
 * Command-line interface for reading and writing slurmdbd.conf and the
 * slurmdbd environment-defaults file.
 *
 * Commands:
 * - show              - Print the parameters set in slurmdbd.conf
 * - get <key>         - Print one parameter
 * - set <Key=Value..> - Set parameters
 * - unset <keys..>    - Remove parameters
 * - validate          - Check every stored value
 * - render            - Regenerate slurmdbd.conf from parameter sources
 * - env               - Edit the environment-defaults file
 *
 * Global Options:
 * - --verbose, -v       - Enable detailed output
 * - --config <path>     - Specify tool config file
 * - --conf <path>       - slurmdbd.conf to edit
 * - --defaults <path>   - Environment-defaults file to edit
 * - --no-color          - Disable colored output
 * - --version, -V       - Show version information
 * - --help, -h          - Show help information
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import chalk from 'chalk';
import { z } from 'zod';
import { initLogger, log } from './logger.js';
import { isVerboseEnabled, loadCliContext } from './options.js';
import { registerShowCommand } from './commands/show.js';
import { registerGetCommand } from './commands/get.js';
import { registerSetCommand } from './commands/set.js';
import { registerUnsetCommand } from './commands/unset.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerRenderCommand } from './commands/render.js';
import { registerEnvCommand } from './commands/env.js';

// Get package.json for version info
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson = z
  .object({ version: z.string() })
  .passthrough()
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('dbdconf')
    .description('Read and write slurmdbd.conf and the slurmdbd environment defaults')
    .version(packageJson.version, '-V, --version', 'Output the current version');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output')
    .option('--config <path>', 'Path to tool configuration file')
    .option('--conf <path>', 'slurmdbd.conf to edit')
    .option('--defaults <path>', 'Environment-defaults file to edit')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      // Initialize logger with global options and the logging section
      const opts = thisCommand.opts();
      const { config } = loadCliContext(opts);
      const verbose = isVerboseEnabled(opts.verbose);
      const noColor = !opts.color; // Commander converts --no-color to color: false

      initLogger({
        level: config.logging.level,
        filePath: config.logging.filePath,
        consoleOutput: config.logging.consoleOutput,
        verbose,
        noColor,
      });

      if (opts.config) {
        log.debug(`Using config file: ${opts.config}`);
      }
    });

  return program;
}

/**
 * Register all commands with the program
 */
function registerCommands(program: Command): void {
  registerShowCommand(program);
  registerGetCommand(program);
  registerSetCommand(program);
  registerUnsetCommand(program);
  registerValidateCommand(program);
  registerRenderCommand(program);
  registerEnvCommand(program);
}

/**
 * Global error handler for unhandled errors
 */
function setupErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    console.error(chalk.red('Unhandled promise rejection:'));
    console.error(reason);
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    console.error(chalk.red('Uncaught exception:'));
    console.error(error);
    process.exit(1);
  });
}

/**
 * Main CLI execution
 */
async function main(): Promise<void> {
  try {
    setupErrorHandlers();

    const program = createProgram();
    registerCommands(program);

    // Enhanced help text
    program.addHelpText(
      'after',
      `
Environment Variables:
  DBDCONF_CONF_FILE       Override slurmdbd.conf path
  DBDCONF_DEFAULTS_FILE   Override environment-defaults file path
  DBDCONF_LOG_LEVEL       Set log level (error, warn, info, debug)
  DBDCONF_LOG_FILE        Also write logs to this file
  DBDCONF_CONSOLE_OUTPUT  Log to the console (true/false)
  DBDCONF_LOCK            Take the advisory lock on writes (true/false)
  DBDCONF_VERBOSE         Enable verbose mode (true/false)

Examples:
  $ dbdconf show                              # List current parameters
  $ dbdconf set DebugLevel=verbose            # Change one parameter
  $ dbdconf unset StorageHost StoragePort     # Remove parameters
  $ dbdconf --conf ./slurmdbd.conf validate   # Check a local copy
`,
    );

    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red('Error:'), error.message);
      if (error.stack) {
        log.debug(error.stack);
      }
    } else {
      console.error(chalk.red('Unknown error:'), error);
    }
    process.exit(1);
  }
}

// Run main if this is the entry point
void main();
