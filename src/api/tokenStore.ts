import { TOKEN_REFRESH_BUFFER_MS } from '../settings.js';
import type { Credential } from './types.js';
import { AuthenticationError } from './types.js';

export type CredentialExchange = (refreshToken: string) => Promise<Credential>;

/**
 * Owns the session credential.
 *
 * Renewals are single-flight: while one exchange is in progress every other
 * caller receives the same promise, so a refresh token is never presented twice
 * by this process. The credential is only ever swapped as a whole.
 */
export class TokenStore {
  private credential?: Credential;
  private pendingRenewal?: Promise<Credential>;

  constructor(
    credential?: Credential,
    private readonly safetyMarginMs: number = TOKEN_REFRESH_BUFFER_MS,
  ) {
    this.credential = credential;
  }

  get current(): Credential | undefined {
    return this.credential;
  }

  get isRenewing(): boolean {
    return this.pendingRenewal !== undefined;
  }

  /**
   * True while the access token can be used without renewing
   */
  isValid(now: number = Date.now()): boolean {
    if (!this.credential) {
      return false;
    }
    return now < this.credential.expiresAt.getTime() - this.safetyMarginMs;
  }

  replace(credential: Credential): void {
    this.credential = credential;
  }

  /**
   * Renew the credential through `exchange`, joining a renewal already in flight.
   *
   * When `staleAccessToken` is given and the held token no longer matches it,
   * another caller has already renewed and the held credential is returned as is.
   */
  renew(exchange: CredentialExchange, staleAccessToken?: string): Promise<Credential> {
    if (this.pendingRenewal) {
      return this.pendingRenewal;
    }

    const current = this.credential;
    if (current && staleAccessToken !== undefined && current.accessToken !== staleAccessToken) {
      return Promise.resolve(current);
    }

    if (!current?.refreshToken) {
      return Promise.reject(new AuthenticationError('No refresh token available. User must authenticate first.'));
    }

    const renewal = exchange(current.refreshToken)
      .then((credential) => {
        this.replace(credential);
        return credential;
      })
      .finally(() => {
        this.pendingRenewal = undefined;
      });

    this.pendingRenewal = renewal;
    return renewal;
  }
}
