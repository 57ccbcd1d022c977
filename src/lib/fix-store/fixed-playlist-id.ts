import { randomBytes } from 'crypto';

/**
 * Generate a random 32-character hex id
 */
export function generateFixedPlaylistId(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Whether a string has the shape of a generated id
 */
export function isFixedPlaylistId(id: string): boolean {
  return /^[0-9a-f]{32}$/.test(id);
}
