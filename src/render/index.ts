/**
 * slurmdbd.conf Rendering
 *
 * Parameter assembly from defaults, peer, database and override sources, and
 * database endpoint resolution.
 */

export {
  type DatabaseEndpoint,
  type ParsedEndpoints,
  parseEndpoints,
  parseTcpEndpoint,
  parseSocketEndpoint,
  resolveDatabaseEndpoint,
} from './endpoints.js';

export {
  type ParameterValue,
  type ParameterMap,
  type ParameterSources,
  type DatabaseInfo,
  type DatabaseSettings,
  SLURM_ACCT_DB,
  MYSQL_UNIX_PORT,
  databaseParameters,
  assembleParameters,
  applyParameters,
} from './parameters.js';

export {
  type RenderParams,
  type RenderOptions,
  type RenderResult,
  DatabaseInfoSchema,
  RenderParamsSchema,
  loadRenderParams,
  renderConfiguration,
} from './render.js';
