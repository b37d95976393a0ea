import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCredentialStorage } from '../../storage/memory/credential-storage.js';
import { ScopeSet } from '../../services/scope-service.js';
import type { Credential } from '../../types/token.js';

const ISSUED = new Date('2024-01-01T00:00:00.000Z');

function credential(overrides: Partial<Credential> = {}): Credential {
  return {
    clientId: 'test-client',
    scope: ScopeSet.parse('foo'),
    issuedAt: ISSUED,
    expiresAt: new Date(ISSUED.getTime() + 3600 * 1000),
    used: false,
    ...overrides,
  };
}

describe('MemoryCredentialStorage', () => {
  let storage: MemoryCredentialStorage;

  beforeEach(() => {
    storage = new MemoryCredentialStorage();
  });

  it('should keep kinds apart', async () => {
    await storage.put('access_token', 'sig', credential());

    expect(await storage.get('access_token', 'sig')).not.toBeNull();
    expect(await storage.get('refresh_token', 'sig')).toBeNull();
  });

  it('should refuse a duplicate signature', async () => {
    await storage.put('access_token', 'sig', credential());

    await expect(storage.put('access_token', 'sig', credential())).rejects.toThrow(
      'Duplicate access_token signature'
    );
  });

  it('should hand out copies', async () => {
    await storage.put('authorization_code', 'code', credential());

    const copy = await storage.get('authorization_code', 'code');
    if (copy) {
      copy.used = true;
    }

    expect((await storage.get('authorization_code', 'code'))?.used).toBe(false);
  });

  describe('markUsed', () => {
    beforeEach(async () => {
      await storage.put('authorization_code', 'code', credential());
      await storage.put('access_token', 'at', credential({ parentCode: 'code' }));
      await storage.put('refresh_token', 'rt', credential({ parentCode: 'code' }));
      await storage.put('access_token', 'other', credential());
    });

    it('should mark a fresh code once', async () => {
      expect(await storage.markUsed('code')).toBe(true);
      expect((await storage.get('authorization_code', 'code'))?.used).toBe(true);
      expect(storage.count('access_token')).toBe(2);
    });

    it('should revoke descendants when a used code is marked again', async () => {
      await storage.markUsed('code');

      expect(await storage.markUsed('code')).toBe(false);
      expect(await storage.get('access_token', 'at')).toBeNull();
      expect(await storage.get('refresh_token', 'rt')).toBeNull();
      expect(await storage.get('access_token', 'other')).not.toBeNull();
    });

    it('should report an unknown code', async () => {
      expect(await storage.markUsed('missing')).toBe(false);
    });
  });

  describe('deleteExpired', () => {
    it('should delete credentials at or past their expiry', async () => {
      await storage.put('access_token', 'expired', credential({ expiresAt: ISSUED }));
      await storage.put('access_token', 'live', credential());

      expect(await storage.deleteExpired(ISSUED)).toBe(1);
      expect(await storage.get('access_token', 'live')).not.toBeNull();
    });

    it('should keep a used code while tokens derived from it live', async () => {
      await storage.put('authorization_code', 'code', credential({ expiresAt: ISSUED, used: true }));
      await storage.put('refresh_token', 'rt', credential({ parentCode: 'code' }));

      expect(await storage.deleteExpired(ISSUED)).toBe(0);

      await storage.delete('refresh_token', 'rt');
      expect(await storage.deleteExpired(ISSUED)).toBe(1);
      expect(storage.count('authorization_code')).toBe(0);
    });
  });

  describe('runExclusive', () => {
    it('should run sections one after another', async () => {
      const events: string[] = [];
      const section = (name: string) => async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${name}:end`);
        return name;
      };

      const results = await Promise.all([storage.runExclusive(section('a')), storage.runExclusive(section('b'))]);

      expect(results).toEqual(['a', 'b']);
      expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('should keep going after a failed section', async () => {
      const failed = storage.runExclusive(async () => {
        throw new Error('boom');
      });

      await expect(failed).rejects.toThrow('boom');
      expect(await storage.runExclusive(async () => 'next')).toBe('next');
    });
  });
});
