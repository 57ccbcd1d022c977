/**
 * Identifier Tests
 */

import { describe, it, expect } from 'vitest';
import { sanitizeChannelNameForId, isGracenoteId } from './identifiers';

describe('identifiers', () => {
  describe('sanitizeChannelNameForId', () => {
    it('lowercases and joins words with underscores', () => {
      expect(sanitizeChannelNameForId('My Channel')).toBe('my_channel');
    });

    it('drops punctuation and collapses space/hyphen runs', () => {
      expect(sanitizeChannelNameForId('Fox News - East!')).toBe('fox_news_east');
    });

    it('keeps non-ASCII letters', () => {
      expect(sanitizeChannelNameForId('Café Olé')).toBe('café_olé');
    });

    it('returns an empty string when nothing usable remains', () => {
      expect(sanitizeChannelNameForId('***')).toBe('');
    });
  });

  describe('isGracenoteId', () => {
    it.each(['EP012345678', 'SH12345678.F.EP', 'MV00112233', '12345678'])('accepts %s', (id) => {
      expect(isGracenoteId(id)).toBe(true);
    });

    it.each(['', '1234567', 'espn.us', 'XX12345678'])('rejects %s', (id) => {
      expect(isGracenoteId(id)).toBe(false);
    });
  });
});
