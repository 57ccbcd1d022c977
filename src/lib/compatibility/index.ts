/**
 * Compatibility Module
 */

export { checkCompatibility, GENERAL_ADVISORIES, type CompatibilityResult } from './compatibility-checker';
