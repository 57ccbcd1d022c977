/**
 * Check Options Tests
 */

import { describe, it, expect } from 'vitest';
import { parseCheckArgs } from './check-options';

describe('parseCheckArgs', () => {
  it('applies defaults', () => {
    expect(parseCheckArgs(['--playlist=list.m3u'])).toEqual({
      success: true,
      options: {
        playlistPath: 'list.m3u',
        guidePath: null,
        mode: 'advanced',
        outputPath: null,
        fixesPath: null,
        severities: null,
        store: false,
        help: false,
      },
    });
  });

  it('reads every option', () => {
    const result = parseCheckArgs([
      '--playlist=in.m3u',
      '--guide=guide.xml',
      '--mode=basic',
      '--output=out.m3u',
      '--fixes=fixes.json',
      '--only=error,warning',
      '--store',
    ]);

    expect(result).toEqual({
      success: true,
      options: {
        playlistPath: 'in.m3u',
        guidePath: 'guide.xml',
        mode: 'basic',
        outputPath: 'out.m3u',
        fixesPath: 'fixes.json',
        severities: ['error', 'warning'],
        store: true,
        help: false,
      },
    });
  });

  it('keeps equals signs inside values', () => {
    const result = parseCheckArgs(['--guide=a=b.xml']);
    expect(result.success && result.options.guidePath).toBe('a=b.xml');
  });

  it('accepts --help without inputs', () => {
    const result = parseCheckArgs(['--help']);
    expect(result.success && result.options.help).toBe(true);
  });

  it.each([
    [[], 'Provide --playlist and/or --guide.'],
    [['--playlist=a', '--mode=strict'], "Invalid mode 'strict'. Expected basic or advanced."],
    [['--playlist=a', '--only=fatal'], "Invalid severity list 'fatal'."],
    [['--playlist=a', '--verbose'], "Unknown argument '--verbose'."],
  ])('rejects %j', (args, error) => {
    expect(parseCheckArgs(args)).toEqual({ success: false, error });
  });
});
