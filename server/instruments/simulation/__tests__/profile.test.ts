import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import {
  loadProfile,
  loadProfileWithOverride,
  mergeProfiles,
  resolveOverridePath,
  resolveProfileKey,
} from '../profile.js';
import { ProfileError } from '../../errors.js';

describe('Profiles', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sim-profile-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    try {
      await fs.rm(tempDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  async function writeJson(relative: string, data: unknown): Promise<string> {
    const filePath = path.join(tempDir, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(data), 'utf-8');
    return filePath;
  }

  describe('loadProfile', () => {
    it('should load a valid profile', async () => {
      const filePath = await writeJson('psu.json', {
        model: 'PSU-1',
        simulation: {
          initial_state: { voltage: '0.0' },
          scpi: { ':VOLT?': { get: 'voltage' }, '*IDN?': 'ACME,PSU-1,0,1.0' },
          errors: [{ pattern: ':VOLT (.+)', condition: 'g1 > 30', code: -222, message: 'Data out of range' }],
        },
      });

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.model).toBe('PSU-1');
      expect(result.value.simulation.initial_state).toEqual({ voltage: '0.0' });
      expect(result.value.simulation.scpi[':VOLT?']).toEqual({ get: 'voltage' });
      expect(result.value.simulation.errors).toHaveLength(1);
    });

    it('should default the error condition to false', async () => {
      const filePath = await writeJson('psu.json', {
        simulation: { errors: [{ pattern: 'X', code: -1, message: 'never' }] },
      });

      const result = await loadProfile(filePath);
      expect(result.ok && result.value.simulation.errors[0].condition).toBe('false');
    });

    it('should accept the legacy scpi field on error rules', async () => {
      const filePath = await writeJson('psu.json', {
        simulation: { errors: [{ scpi: ':VOLT (.+)', condition: 'true', code: -222, message: 'x' }] },
      });

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.simulation.errors[0]).toEqual({
          pattern: ':VOLT (.+)',
          condition: 'true',
          code: -222,
          message: 'x',
        });
      }
    });

    it('should warn and use an empty simulation section when it is missing', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const filePath = await writeJson('bare.json', { model: 'BARE' });

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.simulation).toEqual({ initial_state: {}, scpi: {}, errors: [] });
      }
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('should fail for a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      const result = await loadProfile(filePath);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ProfileError);
        expect(result.error.path).toBe(filePath);
        expect(result.error.message).toBe(`Profile file does not exist (${filePath})`);
      }
    });

    it('should fail for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'broken.json');
      await fs.writeFile(filePath, '{ "model": ', 'utf-8');

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe(`Invalid JSON in profile (${filePath})`);
    });

    it('should fail when the document is not an object', async () => {
      const filePath = await writeJson('list.json', [1, 2, 3]);

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe(`Profile must be a JSON object (${filePath})`);
    });

    it('should fail on unknown action fields', async () => {
      const filePath = await writeJson('bad.json', { simulation: { scpi: { 'A?': { bogus: 1 } } } });

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message.startsWith('Invalid profile: ')).toBe(true);
        expect(result.error.message).toContain('simulation.scpi.A?');
      }
    });

    it('should fail on a negative delay', async () => {
      const filePath = await writeJson('bad.json', { simulation: { scpi: { 'A?': { delay: -1 } } } });

      const result = await loadProfile(filePath);
      expect(result.ok).toBe(false);
    });
  });

  describe('mergeProfiles', () => {
    it('should merge maps, concatenate lists override-first and replace scalars', () => {
      const base = { a: { x: 1, y: 2 }, list: [1, 2], s: 'base' };
      const override = { a: { y: 3 }, list: [0], s: 'over', extra: true };

      expect(mergeProfiles(base, override)).toEqual({
        a: { x: 1, y: 3 },
        list: [0, 1, 2],
        s: 'over',
        extra: true,
      });
    });

    it('should let the override win on shape conflicts', () => {
      expect(mergeProfiles({ a: { x: 1 } }, { a: 5 })).toEqual({ a: 5 });
      expect(mergeProfiles({ a: [1] }, { a: { x: 1 } })).toEqual({ a: { x: 1 } });
    });

    it('should not modify its inputs', () => {
      const base = { a: { x: 1 } };
      mergeProfiles(base, { a: { x: 2 } });
      expect(base).toEqual({ a: { x: 1 } });
    });
  });

  describe('override paths', () => {
    const options = { packagedRoot: '/pkg/profiles', overrideRoot: '/home/user/overrides' };

    it('should mirror packaged profiles under the override root', () => {
      expect(resolveOverridePath('/pkg/profiles/acme/psu.json', options)).toBe(
        path.join('/home/user/overrides', 'acme', 'psu.json')
      );
    });

    it('should ignore profiles outside the packaged root', () => {
      expect(resolveOverridePath('/elsewhere/psu.json', options)).toBeNull();
      expect(resolveOverridePath('/pkg/profiles', options)).toBeNull();
    });

    it('should resolve profile keys', () => {
      expect(resolveProfileKey('acme/psu', '/pkg/profiles')).toBe(path.join('/pkg/profiles', 'acme', 'psu.json'));
      expect(resolveProfileKey('acme/psu.json', '/pkg/profiles')).toBe(path.join('/pkg/profiles', 'acme', 'psu.json'));
    });
  });

  describe('loadProfileWithOverride', () => {
    it('should merge a user override into a packaged profile', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const packagedRoot = path.join(tempDir, 'profiles');
      const overrideRoot = path.join(tempDir, 'overrides');

      const profilePath = await writeJson('profiles/acme/psu.json', {
        model: 'PSU-1',
        simulation: {
          initial_state: { voltage: '0.0', limits: { voltage: 30, current: 5 } },
          scpi: { ':VOLT?': { get: 'voltage' } },
          errors: [{ pattern: 'A', code: -1, message: 'base' }],
        },
      });
      await writeJson('overrides/acme/psu.json', {
        simulation: {
          initial_state: { limits: { voltage: 12 } },
          scpi: { ':CURR?': '1.0' },
          errors: [{ pattern: 'B', code: -2, message: 'user' }],
        },
      });

      const result = await loadProfileWithOverride(profilePath, { packagedRoot, overrideRoot });
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const { simulation } = result.value;
      expect(result.value.model).toBe('PSU-1');
      expect(simulation.initial_state).toEqual({ voltage: '0.0', limits: { voltage: 12, current: 5 } });
      expect(Object.keys(simulation.scpi)).toEqual([':VOLT?', ':CURR?']);
      expect(simulation.errors.map(e => e.message)).toEqual(['user', 'base']);
    });

    it('should use the packaged profile when there is no override', async () => {
      const packagedRoot = path.join(tempDir, 'profiles');
      const profilePath = await writeJson('profiles/acme/dmm.json', {
        simulation: { scpi: { ':READ?': '5.0' } },
      });

      const result = await loadProfileWithOverride(profilePath, {
        packagedRoot,
        overrideRoot: path.join(tempDir, 'overrides'),
      });
      expect(result.ok && Object.keys(result.value.simulation.scpi)).toEqual([':READ?']);
    });

    it('should fail when the override is broken', async () => {
      const packagedRoot = path.join(tempDir, 'profiles');
      const overrideRoot = path.join(tempDir, 'overrides');
      const profilePath = await writeJson('profiles/acme/psu.json', { simulation: {} });
      const overridePath = path.join(overrideRoot, 'acme', 'psu.json');
      await fs.mkdir(path.dirname(overridePath), { recursive: true });
      await fs.writeFile(overridePath, 'not json', 'utf-8');

      const result = await loadProfileWithOverride(profilePath, { packagedRoot, overrideRoot });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.path).toBe(overridePath);
    });
  });
});
