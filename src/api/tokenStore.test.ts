import { describe, expect, it, vi } from 'vitest';

import { createCredential, deferred } from '../test/mocks.js';
import { TokenStore } from './tokenStore.js';
import type { Credential } from './types.js';
import { AuthenticationError } from './types.js';

describe('TokenStore', () => {
  describe('isValid', () => {
    it('should be invalid without a credential', () => {
      expect(new TokenStore().isValid()).toBe(false);
    });

    it('should be valid well before expiry', () => {
      const store = new TokenStore(createCredential(10 * 60 * 1000));

      expect(store.isValid()).toBe(true);
    });

    it('should be invalid inside the safety margin', () => {
      const expiresAt = new Date('2026-01-01T12:00:00Z');
      const store = new TokenStore({ accessToken: 'a', refreshToken: 'r', expiresAt }, 60000);

      expect(store.isValid(expiresAt.getTime() - 60001)).toBe(true);
      expect(store.isValid(expiresAt.getTime() - 60000)).toBe(false);
      expect(store.isValid(expiresAt.getTime() + 1000)).toBe(false);
    });
  });

  describe('replace', () => {
    it('should swap the whole credential', () => {
      const store = new TokenStore(createCredential(-1000, 'old'));
      const next = createCredential(3600 * 1000, 'new');

      store.replace(next);

      expect(store.current).toBe(next);
      expect(store.isValid()).toBe(true);
    });
  });

  describe('renew', () => {
    it('should exchange the held refresh token and store the result', async () => {
      const store = new TokenStore(createCredential(-1000, 'old'));
      const next = createCredential(3600 * 1000, 'new');
      const exchange = vi.fn(async (_refreshToken: string) => next);

      const result = await store.renew(exchange);

      expect(exchange).toHaveBeenCalledWith('refresh-old');
      expect(result).toBe(next);
      expect(store.current).toBe(next);
      expect(store.isRenewing).toBe(false);
    });

    it('should share one in-flight exchange between callers', async () => {
      const store = new TokenStore(createCredential(-1000, 'old'));
      const next = createCredential(3600 * 1000, 'new');
      const pending = deferred<Credential>();
      const exchange = vi.fn((_refreshToken: string) => pending.promise);

      const first = store.renew(exchange);
      const second = store.renew(exchange);
      expect(store.isRenewing).toBe(true);

      pending.resolve(next);

      await expect(first).resolves.toBe(next);
      await expect(second).resolves.toBe(next);
      expect(exchange).toHaveBeenCalledTimes(1);
    });

    it('should skip the exchange when the stale token was already replaced', async () => {
      const current = createCredential(3600 * 1000, 'new');
      const store = new TokenStore(current);
      const exchange = vi.fn(async (_refreshToken: string) => createCredential(3600 * 1000, 'other'));

      const result = await store.renew(exchange, 'access-old');

      expect(result).toBe(current);
      expect(exchange).not.toHaveBeenCalled();
    });

    it('should exchange when the stale token is still held', async () => {
      const store = new TokenStore(createCredential(3600 * 1000, 'old'));
      const next = createCredential(3600 * 1000, 'new');
      const exchange = vi.fn(async (_refreshToken: string) => next);

      await expect(store.renew(exchange, 'access-old')).resolves.toBe(next);
      expect(exchange).toHaveBeenCalledTimes(1);
    });

    it('should keep the old credential when the exchange fails', async () => {
      const old = createCredential(-1000, 'old');
      const store = new TokenStore(old);
      const exchange = vi.fn(async (_refreshToken: string): Promise<Credential> => {
        throw new AuthenticationError('Token refresh failed: 400 - invalid_grant', 400);
      });

      await expect(store.renew(exchange)).rejects.toThrow('invalid_grant');
      expect(store.current).toBe(old);
      expect(store.isRenewing).toBe(false);
    });

    it('should fail without a refresh token', async () => {
      const store = new TokenStore();
      const exchange = vi.fn(async (_refreshToken: string) => createCredential(3600 * 1000));

      await expect(store.renew(exchange)).rejects.toBeInstanceOf(AuthenticationError);
      expect(exchange).not.toHaveBeenCalled();
    });
  });
});
