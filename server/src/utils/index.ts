/**
 * @fileoverview Barrel export for utility modules.
 * Re-exports all utility functions for convenient importing.
 *
 * @example
 * import { inferScriptName, getErrorMessage, createLogger, loadConfig } from '../utils/index.js'
 */

export * from './url.js'
export * from './errors.js'
export * from './logger.js'
export * from './config.js'
export * from './retry.js'
