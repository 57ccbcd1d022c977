/**
 * Fix Applicator Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { applyFixes } from './fix-applicator';
import { checkPlaylist } from './playlist-checker';
import type { FixOperation } from './fix-operations';

describe('applyFixes', () => {
  function captureWarnings() {
    return vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the content untouched when there is nothing to apply', () => {
    expect(applyFixes('#EXTM3U\r\n', [])).toEqual({ content: '#EXTM3U\r\n', applied: 0, skipped: 0 });
  });

  it('skips and logs operations outside the document', () => {
    const warn = captureWarnings();
    const content = '#EXTINF:-1,A\nhttp://x/a.ts\n';
    const result = applyFixes(content, [
      { type: 'rebuild_attributes', lineNum: 5, duration: '-1', nameText: 'A', finalAttributes: {} },
    ]);

    expect(result).toEqual({ content, applied: 0, skipped: 1 });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('[checker][FixApplicator] Skipping fix at invalid line index');
  });

  it('terminates a rebuilt last line', () => {
    const result = applyFixes('http://x\n#EXTINF:-1,A', [
      { type: 'rebuild_attributes', lineNum: 2, duration: '-1', nameText: 'A', finalAttributes: { 'tvg-id': 'a' } },
    ]);

    expect(result.content).toBe('http://x\n#EXTINF:-1 tvg-id="a",A\n');
  });

  it('escapes quotes and drops empty values when rebuilding', () => {
    const result = applyFixes('#EXTINF:0,A\n', [
      {
        type: 'rebuild_attributes',
        lineNum: 1,
        duration: '0',
        nameText: 'A',
        finalAttributes: { 'tvg-name': 'Say "hi"', 'tvg-logo': '', 'group-title': 'G' },
      },
    ]);

    expect(result.content).toBe('#EXTINF:0 group-title="G" tvg-name="Say \\"hi\\"",A\n');
  });

  it('inserts the URL even when it has moved from its original line', () => {
    const warn = captureWarnings();
    const operations: FixOperation[] = [
      { type: 'reorder_stream_url', lineNum: 1, originalLineNum: 2, url: 'http://x/a.ts', channelName: 'A' },
    ];
    const result = applyFixes('#EXTINF:-1 tvg-id="a",A\nother\n', operations);

    expect(result).toEqual({
      content: '#EXTINF:-1 tvg-id="a",A\nhttp://x/a.ts\nother\n',
      applied: 1,
      skipped: 0,
    });
    expect(warn.mock.calls[0][0]).toBe(
      '[checker][FixApplicator] Stream URL not found at its original line, inserting only'
    );
  });

  it('moves several URLs without disturbing earlier line numbers', () => {
    const content =
      '#EXTINF:-1 tvg-id="a",A\n#EXTVLCOPT:x\nhttp://x/a.ts\n#EXTINF:-1 tvg-id="b",B\n\nhttp://x/b.ts\n';
    const { fixes } = checkPlaylist(content, 'basic');

    expect(fixes).toEqual([
      { type: 'reorder_stream_url', lineNum: 1, originalLineNum: 3, url: 'http://x/a.ts', channelName: 'A' },
      { type: 'reorder_stream_url', lineNum: 4, originalLineNum: 6, url: 'http://x/b.ts', channelName: 'B' },
    ]);

    const result = applyFixes(content, fixes);
    expect(result).toEqual({
      content:
        '#EXTINF:-1 tvg-id="a",A\nhttp://x/a.ts\n#EXTVLCOPT:x\n#EXTINF:-1 tvg-id="b",B\nhttp://x/b.ts\n\n',
      applied: 2,
      skipped: 0,
    });

    const replay = applyFixes(result.content, fixes);
    expect(replay).toEqual({ content: result.content, applied: 0, skipped: 2 });
  });

  it('rebuilds and reorders the same header', () => {
    const content = '#EXTINF:-1,A\n\nhttp://x/a.ts';
    const { fixes } = checkPlaylist(content, 'basic');

    expect(fixes.map((fix) => fix.type)).toEqual(['rebuild_attributes', 'reorder_stream_url']);
    expect(applyFixes(content, fixes).content).toBe('#EXTINF:-1 tvg-id="a",A\nhttp://x/a.ts\n\n');
  });
});
