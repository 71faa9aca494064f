import { describe, it, expect } from 'vitest';
import { nextDelayMs } from '../../src/util/backoff.js';
import { parseRetryAfter } from '../../src/util/http.js';

describe('backoff', () => {
  describe('nextDelayMs', () => {
    it('should double the delay on each attempt', () => {
      expect(nextDelayMs(0, 500, 8000)).toBe(500);
      expect(nextDelayMs(1, 500, 8000)).toBe(1000);
      expect(nextDelayMs(3, 500, 8000)).toBe(4000);
    });

    it('should cap the delay', () => {
      expect(nextDelayMs(5, 500, 8000)).toBe(8000);
    });

    it('should prefer the server hint, capped the same way', () => {
      expect(nextDelayMs(0, 500, 8000, 2000)).toBe(2000);
      expect(nextDelayMs(0, 500, 8000, 20000)).toBe(8000);
      expect(nextDelayMs(2, 500, 8000, -5)).toBe(0);
    });
  });

  describe('parseRetryAfter', () => {
    it('should read delta seconds', () => {
      expect(parseRetryAfter('3')).toBe(3000);
    });

    it('should read an HTTP date relative to now', () => {
      const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT');
      expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:10 GMT', now)).toBe(10000);
      expect(parseRetryAfter('Wed, 21 Oct 2015 07:27:00 GMT', now)).toBe(0);
    });

    it('should ignore missing or unreadable values', () => {
      expect(parseRetryAfter(undefined)).toBeUndefined();
      expect(parseRetryAfter('soon')).toBeUndefined();
    });
  });
});
