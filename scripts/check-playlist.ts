#!/usr/bin/env npx tsx

/**
 * Check Playlist Script
 *
 * Checks an extended-M3U playlist and/or an XMLTV guide from disk, prints
 * the report and optionally writes the corrected playlist.
 *
 * Usage:
 *   npm run check -- --playlist=channels.m3u --guide=guide.xml --output=fixed.m3u
 *
 * Exits with status 1 when any error-severity finding was reported.
 *
 * Optional environment variables:
 *   - LOG_LEVEL: debug, info, warn or error
 *   - MAX_PLAYLIST_CHANNELS, DEFAULT_GROUP_TITLE: checker thresholds
 *   - REDIS_URL, FIXED_PLAYLIST_TTL_SECONDS: fixed-playlist store for --store
 */

import { config } from 'dotenv';
import { readFile, writeFile } from 'fs/promises';

// Load environment variables from .env file
config();

import { analyzeSources, hasErrors } from '@/lib/analysis';
import { parseCheckArgs, USAGE } from '@/lib/cli';
import { getCheckerConfig } from '@/lib/config';
import { RedisFixedPlaylistStore } from '@/lib/fix-store';
import { createLogger } from '@/lib/logger';
import { renderReport } from '@/lib/report';

const logger = createLogger('CheckPlaylist');

async function readOptional(path: string | null): Promise<string | undefined> {
  return path ? readFile(path, 'utf-8') : undefined;
}

async function main(): Promise<void> {
  const parsed = parseCheckArgs(process.argv.slice(2));
  if (!parsed.success) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(2);
  }

  const { options } = parsed;
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const checkerConfig = getCheckerConfig();
  const [playlist, guide] = await Promise.all([
    readOptional(options.playlistPath),
    readOptional(options.guidePath),
  ]);

  const report = analyzeSources({ playlist, guide, mode: options.mode, config: checkerConfig });
  process.stdout.write(renderReport(report, { severities: options.severities ?? undefined }));

  const corrected = report.correctedPlaylist ?? playlist;

  if (options.outputPath && corrected !== undefined) {
    await writeFile(options.outputPath, corrected, 'utf-8');
    console.log(`\nCorrected playlist written to ${options.outputPath} (${report.fixCount} fix(es))`);
  }

  if (options.fixesPath) {
    await writeFile(options.fixesPath, report.fixesJson, 'utf-8');
    console.log(`Fix operations written to ${options.fixesPath}`);
  }

  if (options.store && corrected !== undefined) {
    if (!checkerConfig.redisUrl) {
      // An in-memory store would not outlive this process
      logger.warn('REDIS_URL is not set, skipping --store');
    } else {
      const store = new RedisFixedPlaylistStore({
        redisUrl: checkerConfig.redisUrl,
        ttlSeconds: checkerConfig.fixedPlaylistTtlSeconds,
      });
      try {
        const id = await store.put(corrected);
        console.log(`Corrected playlist stored with id ${id}`);
      } finally {
        await store.close();
      }
    }
  }

  if (hasErrors(report)) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
