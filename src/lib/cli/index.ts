/**
 * CLI Module
 */

export { parseCheckArgs, USAGE, type CheckOptions, type CheckOptionsResult } from './check-options';
