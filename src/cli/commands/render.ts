/**
 * Render Command - Regenerate slurmdbd.conf from parameter sources
 */

import { Command } from 'commander';
import { log } from '../logger.js';
import { handleCommandError, loadCliContext, resolvePath, ValidationError, type GlobalOptions } from '../options.js';
import type { DatabaseInfo } from '../../render/parameters.js';
import { loadRenderParams, renderConfiguration, type RenderParams } from '../../render/render.js';

export interface RenderCommandOptions extends GlobalOptions {
  /** YAML file with peer, overrides and database sections */
  params?: string;
  dbEndpoints?: string;
  dbUser?: string;
  dbPassword?: string;
  dbName?: string;
  dryRun?: boolean;
}

/**
 * Database data from the --db-* options, laid over the parameters file's
 * database section.
 *
 * @throws ValidationError if the result lacks endpoints or a username
 */
export function resolveDatabaseOptions(
  options: RenderCommandOptions,
  fromFile: RenderParams['database'],
): DatabaseInfo | undefined {
  const given =
    options.dbEndpoints !== undefined ||
    options.dbUser !== undefined ||
    options.dbPassword !== undefined ||
    options.dbName !== undefined;
  if (!given) {
    return fromFile;
  }

  const endpoints = options.dbEndpoints ?? fromFile?.endpoints;
  const username = options.dbUser ?? fromFile?.username;
  if (endpoints === undefined) {
    throw new ValidationError('Missing database endpoints', 'db-endpoints', undefined, 'Pass --db-endpoints host:port');
  }
  if (!username) {
    throw new ValidationError('Missing database username', 'db-user', username, 'Pass --db-user <name>');
  }

  return {
    endpoints,
    username,
    password: options.dbPassword ?? fromFile?.password ?? '',
    name: options.dbName ?? fromFile?.name,
  };
}

/**
 * Execute the render command
 */
export async function renderCommand(options: RenderCommandOptions): Promise<void> {
  try {
    log.debug('Render command invoked');
    const context = loadCliContext(options);
    const params: RenderParams = options.params ? loadRenderParams(resolvePath(options.params, true)) : {};

    const result = renderConfiguration({
      confFile: context.confFile,
      defaultsFile: context.defaultsFile,
      defaults: context.config.parameters,
      peer: params.peer,
      overrides: params.overrides,
      database: resolveDatabaseOptions(options, params.database),
      lock: context.lock,
      dryRun: options.dryRun,
    });

    if (options.dryRun) {
      log.info('[DRY RUN] Would write the following slurmdbd.conf:');
      process.stdout.write(result.content);
      return;
    }

    if (result.env) {
      const { updated, added, removed } = result.env;
      log.info(
        `Updated ${context.defaultsFile}: ` +
          `updated [${updated.join(', ')}], added [${added.join(', ')}], removed [${removed.join(', ')}]`,
      );
    }
    log.info('Restart slurmdbd to apply the new configuration');
  } catch (error) {
    handleCommandError(error);
  }
}

/**
 * Register the render command with Commander
 */
export function registerRenderCommand(program: Command): void {
  program
    .command('render')
    .description('Regenerate slurmdbd.conf from static, peer, database and override parameters')
    .option('--params <path>', 'YAML file with peer, overrides and database sections')
    .option('--db-endpoints <list>', 'Comma-separated database endpoints (host:port or file:///socket)')
    .option('--db-user <name>', 'Database username')
    .option('--db-password <password>', 'Database password')
    .option('--db-name <name>', 'Accounting database name (default: slurm_acct_db)')
    .option('--dry-run', 'Print the file instead of writing it')
    .action((_options: RenderCommandOptions, command: Command) => renderCommand(command.optsWithGlobals()))
    .addHelpText(
      'after',
      `
Examples:
  $ dbdconf render --db-endpoints 10.0.0.5:3306 --db-user slurm --db-password "$PW"
  $ dbdconf render --db-endpoints file:///run/mysqld/mysqld.sock --db-user slurm --dry-run
  $ dbdconf render --params render.yml

Precedence (lowest first):
  parameters from the tool configuration, peer, database, overrides
`,
    );
}
