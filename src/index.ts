/**
 * M3U / EPG Checker
 *
 * Validation and repair of extended-M3U playlists and XMLTV guides.
 */

export * from './lib/analysis';
export * from './lib/compatibility';
export * from './lib/config';
export * from './lib/diagnostics';
export * from './lib/epg';
export * from './lib/fix-store';
export * from './lib/m3u';
export * from './lib/report';
export { createLogger, Logger, type LogLevel, type LogContext } from './lib/logger';
