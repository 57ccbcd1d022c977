/**
 * Configuration Module
 *
 * Exports all configuration utilities and constants.
 */

export { CHECKER_CONFIG, getCheckerConfig, type CheckerConfig } from './checker-config';
