/**
 * @file bake-graph
 *
 * Build target graph resolver: variables, functions, target
 * inheritance and groups resolved into an ordered build plan.
 *
 * @module
 */

export * from './bake/index.js';
export { SettingsService, SETTINGS_ENV_KEYS } from './config/settings.js';
export type { ResolverSettings, SettingsKey, SettingSource, Environment } from './config/settings.js';
export { logger_create, logLevel_parse, silentLogger, LOG_LEVELS } from './log/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './log/logger.js';
