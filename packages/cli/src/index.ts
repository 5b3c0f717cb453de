/**
 * @snowmatch/cli
 *
 * Config loading, store wiring and the reconcile and promote commands.
 */

export { run, processIo, USAGE } from './cli.js';
export type { CliIo } from './cli.js';
export { ConfigError, configFileSchema, expandEnvVars, loadConfig } from './config.js';
export type { ConfigFile, Env, ResolverConfig, StoresConfig } from './config.js';
export { createResolver, openStores } from './runtime.js';
export type { Runtime } from './runtime.js';
export { reconcileCommand, resultFormat } from './commands/reconcile.js';
export type { ReconcileOptions, ReconcileOutcome, ResultFormat } from './commands/reconcile.js';
export { promoteCommand, readPromotionSources } from './commands/promote.js';
export type { PromoteOptions } from './commands/promote.js';
