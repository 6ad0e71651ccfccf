import { describe, it, expect } from 'vitest';
import { Ok, Err, tryResult } from '../types.js';

describe('Result', () => {
  describe('Ok() / Err()', () => {
    it('should build tagged results', () => {
      expect(Ok(1)).toEqual({ ok: true, value: 1 });
      expect(Ok(undefined)).toEqual({ ok: true, value: undefined });
      expect(Err('bad')).toEqual({ ok: false, error: 'bad' });
    });
  });

  describe('tryResult()', () => {
    it('should wrap thrown errors', () => {
      const result = tryResult(() => {
        throw new Error('boom');
      });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('boom');
    });

    it('should convert non-Error throws', () => {
      const result = tryResult(() => {
        throw 'plain';
      });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('plain');
    });

    it('should return the value on success', () => {
      expect(tryResult(() => 42)).toEqual({ ok: true, value: 42 });
    });
  });
});
