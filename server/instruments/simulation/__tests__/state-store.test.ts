import { describe, it, expect } from 'vitest';
import { createStateStore } from '../state-store.js';
import { SimulationError } from '../../errors.js';
import type { StateMap } from '../../../../shared/types.js';

describe('StateStore', () => {
  describe('get()', () => {
    it('should read top-level keys', () => {
      const store = createStateStore({ voltage: '0.0', output: 'OFF' });
      expect(store.get('voltage')).toBe('0.0');
      expect(store.get('missing')).toBeUndefined();
    });

    it('should read nested keys with dots', () => {
      const store = createStateStore({ limits: { voltage: 30 } });
      expect(store.get('limits.voltage')).toBe(30);
      expect(store.get('limits.current')).toBeUndefined();
    });

    it('should index into lists', () => {
      const store = createStateStore({ channels: [{ scale: 1 }, { scale: 2 }] });
      expect(store.get('channels.1.scale')).toBe(2);
    });

    it('should prefer a literal dotted top-level key', () => {
      const store = createStateStore({ 'a.b': 1, a: { b: 2 } });
      expect(store.get('a.b')).toBe(1);
    });
  });

  describe('set()', () => {
    it('should create intermediate maps', () => {
      const store = createStateStore();
      expect(store.set('x.y.z', 5)).toEqual({ ok: true, value: undefined });
      expect(store.get('x.y.z')).toBe(5);
      expect(store.root()).toEqual({ x: { y: { z: 5 } } });
    });

    it('should update nested values in place', () => {
      const store = createStateStore({ limits: { voltage: 30, current: 5 } });
      store.set('limits.voltage', 10);
      expect(store.root()).toEqual({ limits: { voltage: 10, current: 5 } });
    });

    it('should refuse to descend into a non-map', () => {
      const store = createStateStore({ a: 1 });
      const result = store.set('a.b', 2);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SimulationError);
        expect(result.error.message).toBe('Cannot set "a.b": "a" is not a map');
      }
    });

    it('should reject prototype keys', () => {
      const store = createStateStore();
      const result = store.set('__proto__.polluted', 1);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Invalid state key: "__proto__.polluted"');
      expect(store.root()).toEqual({});
    });

    it('should reject empty segments', () => {
      const store = createStateStore();
      expect(store.set('a..b', 1).ok).toBe(false);
    });
  });

  describe('has()', () => {
    it('should report presence, including null values', () => {
      const store = createStateStore({ empty: null });
      expect(store.has('empty')).toBe(true);
      expect(store.has('missing')).toBe(false);
    });
  });

  describe('reset()', () => {
    it('should restore the initial state without sharing it', () => {
      const initial: StateMap = { voltage: 1, nested: { value: 'a' } };
      const store = createStateStore(initial);

      store.set('voltage', 2);
      store.set('nested.value', 'b');
      expect(initial).toEqual({ voltage: 1, nested: { value: 'a' } });

      store.reset();
      expect(store.get('voltage')).toBe(1);
      expect(store.get('nested.value')).toBe('a');
    });
  });
});
