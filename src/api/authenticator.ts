import { z } from 'zod';

import { CLIENT_ID, DEFAULT_AUTH_URL, REDIRECT_URI, SCOPE } from '../settings.js';
import type { HttpTransport } from './transport.js';
import type { AuthenticatorConfig, ClientLogger, Credential } from './types.js';
import { AuthenticationError, ConnectionError, DimplexError, ProtocolError } from './types.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().positive(),
});

/**
 * OAuth exchanges against the Dimplex Control B2C tenant
 */
export class Authenticator {
  private readonly authUrl: string;
  private readonly clientId: string;
  private readonly scope: string;
  private readonly redirectUri: string;

  constructor(
    config: AuthenticatorConfig,
    private readonly transport: HttpTransport,
    private readonly log: ClientLogger,
  ) {
    this.authUrl = config.authUrl ?? DEFAULT_AUTH_URL;
    this.clientId = config.clientId ?? CLIENT_ID;
    this.scope = config.scope ?? SCOPE;
    this.redirectUri = config.redirectUri ?? REDIRECT_URI;
  }

  /**
   * URL the user opens in a browser to sign in. The final redirect goes to the
   * mobile app's custom scheme and carries the authorization code.
   */
  getLoginUrl(): string {
    const params = new URLSearchParams({
      client_id: this.clientId,
      response_type: 'code',
      redirect_uri: this.redirectUri,
      scope: this.scope,
      response_mode: 'query',
    });
    return `${this.authUrl}/authorize?${params.toString()}`;
  }

  /**
   * Exchange a one-time authorization code for the first credential
   */
  async exchangeCode(code: string, signal?: AbortSignal): Promise<Credential> {
    this.log.debug(`[Auth] Exchanging code ${code.substring(0, 10)}... at ${this.authUrl}/token`);

    return this.requestToken(
      {
        client_id: this.clientId,
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.redirectUri,
        scope: this.scope,
      },
      'Code exchange',
      signal,
    );
  }

  /**
   * Exchange a refresh token for a new credential
   */
  async refresh(refreshToken: string, signal?: AbortSignal): Promise<Credential> {
    this.log.debug('[Auth] Refreshing access token...');

    return this.requestToken(
      {
        client_id: this.clientId,
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        scope: this.scope,
        client_info: '1',
      },
      'Token refresh',
      signal,
    );
  }

  private async requestToken(form: Record<string, string>, operation: string, signal?: AbortSignal): Promise<Credential> {
    const response = await this.transport.send({
      method: 'POST',
      url: `${this.authUrl}/token`,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams(form).toString(),
      signal,
    });
    const capturedAt = Date.now();

    this.log.debug(`[Auth] ${operation} response status: ${response.status}`);

    if (response.status >= 500) {
      throw new ConnectionError(`${operation} failed with status ${response.status}`, response.status);
    }
    if (response.status < 200 || response.status >= 300) {
      this.log.error(`[Auth] ${operation} rejected: ${response.status} - ${response.body}`);
      throw new AuthenticationError(`${operation} failed: ${response.status} - ${response.body}`, response.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch {
      throw new ProtocolError(`${operation} returned non-JSON payload`, response.status);
    }

    const result = TokenResponseSchema.safeParse(json);
    if (!result.success) {
      const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
      throw new ProtocolError(`${operation} response missing or invalid fields: ${fields}`, response.status);
    }

    const expiresAt = new Date(capturedAt + result.data.expires_in * 1000);
    this.log.debug(`[Auth] Token expires at: ${expiresAt.toISOString()}`);

    return {
      accessToken: result.data.access_token,
      refreshToken: result.data.refresh_token,
      expiresAt,
    };
  }
}

/**
 * Pull the authorization code out of a pasted redirect URL, or accept a bare code.
 * Input without a code is a usage error, not a rejection by the identity provider.
 */
export function extractAuthorizationCode(input: string): string {
  const trimmed = input.trim();

  if (trimmed.includes('code=')) {
    const query = trimmed.includes('?') ? trimmed.substring(trimmed.indexOf('?') + 1) : trimmed;
    const code = new URLSearchParams(query).get('code');
    if (code) {
      return code;
    }
    throw new DimplexError('Could not find an authorization code in the redirect URL');
  }

  if (!trimmed) {
    throw new DimplexError('No authorization code provided');
  }
  return trimmed;
}
