import { APP_HEADERS } from '../settings.js';
import type { Authenticator } from './authenticator.js';
import type { TokenPersistence } from './tokenFile.js';
import type { TokenStore } from './tokenStore.js';
import type { HttpMethod, HttpResponse, HttpTransport } from './transport.js';
import { raceAbort } from './transport.js';
import type { ClientLogger, Credential } from './types.js';
import { ApiError, AuthenticationError, ConnectionError, ProtocolError } from './types.js';

export interface ApiRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface SessionOptions {
  baseUrl: string;
  store: TokenStore;
  authenticator: Authenticator;
  transport: HttpTransport;
  log: ClientLogger;
  persistence?: TokenPersistence;
}

function isCredentialRejection(status: number): boolean {
  return status === 401 || status === 403;
}

/**
 * Sends every API request with a valid bearer token.
 *
 * Per call: renew the credential when it is (about to be) expired, send the
 * request, and on a first 401/403 force one renewal and replay the request once.
 */
export class AuthenticatedSession {
  private readonly baseUrl: string;
  private readonly store: TokenStore;
  private readonly authenticator: Authenticator;
  private readonly transport: HttpTransport;
  private readonly log: ClientLogger;
  private readonly persistence?: TokenPersistence;

  constructor(options: SessionOptions) {
    this.baseUrl = options.baseUrl;
    this.store = options.store;
    this.authenticator = options.authenticator;
    this.transport = options.transport;
    this.log = options.log;
    this.persistence = options.persistence;
  }

  async request(request: ApiRequest): Promise<unknown> {
    // Nothing is sent, and no renewal started, for a call cancelled up front
    if (request.signal?.aborted) {
      throw request.signal.reason;
    }

    const accessToken = await this.ensureAccessToken(request.signal);

    const response = await this.dispatch(request, accessToken);
    if (!isCredentialRejection(response.status)) {
      return this.classify(response);
    }

    this.log.debug(`Received ${response.status}, refreshing credential and retrying...`);
    const renewed = await this.renew(request.signal, accessToken);

    const retried = await this.dispatch(request, renewed.accessToken);
    if (isCredentialRejection(retried.status)) {
      throw new AuthenticationError('Authentication failed - credential rejected after refresh', retried.status);
    }
    return this.classify(retried);
  }

  /**
   * Access token to use right now, renewing first when needed
   */
  async ensureAccessToken(signal?: AbortSignal): Promise<string> {
    const current = this.store.current;
    if (current && this.store.isValid()) {
      return current.accessToken;
    }

    this.log.debug(current ? 'Access token expired or about to expire' : 'No access token held');
    const renewed = await this.renew(signal);
    return renewed.accessToken;
  }

  /**
   * Save a credential obtained outside a renewal, e.g. from a code exchange
   */
  async persist(credential: Credential): Promise<void> {
    if (!this.persistence) {
      return;
    }
    try {
      await this.persistence.save(credential);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error(`Failed to save credential: ${message}`);
    }
  }

  private async renew(signal?: AbortSignal, staleAccessToken?: string): Promise<Credential> {
    const joining = this.store.isRenewing;
    const renewal = this.store.renew(async (refreshToken) => {
      const credential = await this.authenticator.refresh(refreshToken);
      await this.persist(credential);
      return credential;
    }, staleAccessToken);

    if (joining) {
      this.log.debug('Waiting for credential renewal already in progress');
    }

    // A cancelled caller stops waiting; the shared renewal still completes or fails as a whole
    return raceAbort(renewal, signal);
  }

  private async dispatch(request: ApiRequest, accessToken: string): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw request.signal.reason;
    }

    const url = this.buildUrl(request);
    this.log.debug(`${request.method} ${url}`);

    const headers: Record<string, string> = {
      ...APP_HEADERS,
      Authorization: `Bearer ${accessToken}`,
    };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    return this.transport.send({
      method: request.method,
      url,
      headers,
      body,
      signal: request.signal,
    });
  }

  private buildUrl(request: ApiRequest): string {
    const url = `${this.baseUrl}${request.path}`;
    if (!request.query || Object.keys(request.query).length === 0) {
      return url;
    }
    return `${url}?${new URLSearchParams(request.query).toString()}`;
  }

  private classify(response: HttpResponse): unknown {
    const { status, body } = response;

    if (status >= 200 && status < 300) {
      // Control endpoints answer with an empty body
      if (body.trim() === '') {
        return undefined;
      }
      try {
        return JSON.parse(body);
      } catch {
        throw new ProtocolError(`API returned non-JSON payload with status ${status}`, status);
      }
    }

    if (status >= 500) {
      this.log.error(`API request failed: ${status} - ${body}`);
      throw new ConnectionError(`API request failed with status ${status}`, status);
    }

    this.log.error(`API request failed: ${status} - ${body}`);
    throw new ApiError(status, body);
  }
}
