import type { HttpTransport } from './transport.js';
import type { TokenPersistence } from './tokenFile.js';

/**
 * OAuth credential held by the session
 */
export interface Credential {
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly expiresAt: Date;
}

/**
 * Logger accepted by the client. Homebridge's `Logging` and `console` both satisfy it.
 */
export interface ClientLogger {
  debug(message: string, ...parameters: unknown[]): void;
  info(message: string, ...parameters: unknown[]): void;
  warn(message: string, ...parameters: unknown[]): void;
  error(message: string, ...parameters: unknown[]): void;
}

/**
 * Identity provider settings
 */
export interface AuthenticatorConfig {
  authUrl?: string;      // Default: the Dimplex Control B2C policy
  clientId?: string;
  scope?: string;
  redirectUri?: string;
}

/**
 * API client configuration
 */
export interface DimplexClientConfig extends AuthenticatorConfig {
  credential?: Credential;
  tokenStorage?: TokenPersistence;
  transport?: HttpTransport;
  baseUrl?: string;              // Default: https://mobileapi.gdhv-iot.com/api
  requestTimeoutMs?: number;     // Only used by the default fetch transport
  tokenRefreshBufferMs?: number; // Renew this long before expiry
}

/**
 * Base class for every error raised by the client
 */
export class DimplexError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public isAuthError: boolean = false,
  ) {
    super(message);
    this.name = 'DimplexError';
  }
}

/**
 * The identity provider rejected a code or refresh token, or the API kept rejecting
 * a freshly renewed access token. A new interactive login is needed.
 */
export class AuthenticationError extends DimplexError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode, true);
    this.name = 'AuthenticationError';
  }
}

/**
 * A trusted endpoint answered with a structure that breaks its contract
 */
export class ProtocolError extends DimplexError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'ProtocolError';
  }
}

/**
 * The API refused an authenticated request
 */
export class ApiError extends DimplexError {
  constructor(
    public override statusCode: number,
    public body: string,
  ) {
    super(`API request failed with status ${statusCode}${body ? `: ${body}` : ''}`, statusCode);
    this.name = 'ApiError';
  }
}

/**
 * Network failure, timeout or 5xx. Safe to retry at the caller's discretion.
 */
export class ConnectionError extends DimplexError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = 'ConnectionError';
  }
}

/**
 * A response body did not match the expected record shape
 */
export class ValidationError extends DimplexError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
  }
}
