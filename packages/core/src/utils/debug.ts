/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all audit logs
 * DEBUG=field-audit:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=field-audit:diff npm test
 * DEBUG=field-audit:write npm start
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for engine wiring and commit hooks
 */
export const coreLog: Debugger = debug('field-audit:core');

/**
 * Debug logger for change detection
 */
export const diffLog: Debugger = debug('field-audit:diff');

/**
 * Debug logger for audit row writes and identity resolution
 */
export const writeLog: Debugger = debug('field-audit:write');

/**
 * Debug logger for change retrieval
 */
export const queryLog: Debugger = debug('field-audit:query');

export const contextLog: Debugger = debug('field-audit:context');
