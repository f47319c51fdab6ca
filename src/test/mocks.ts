import type { Logging } from 'homebridge';
import { vi } from 'vitest';

import type { HttpRequest, HttpResponse, HttpTransport } from '../api/transport.js';
import type { Credential } from '../api/types.js';

export const TEST_BASE_URL = 'https://api.test.local/api';
export const TEST_AUTH_URL = 'https://login.test.local/oauth2/v2.0';
export const TEST_TOKEN_URL = `${TEST_AUTH_URL}/token`;

/**
 * Create a mock Homebridge Logging interface
 */
export function createMockLogger(): Logging {
  return {
    prefix: 'TestPlugin',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    log: vi.fn(),
    success: vi.fn(),
  } as unknown as Logging;
}

/**
 * Credential expiring `expiresInMs` from now (negative for already expired)
 */
export function createCredential(expiresInMs: number, suffix = 'old'): Credential {
  return {
    accessToken: `access-${suffix}`,
    refreshToken: `refresh-${suffix}`,
    expiresAt: new Date(Date.now() + expiresInMs),
  };
}

/**
 * Create mock fetch response
 */
export function createMockResponse(options: {
  status?: number;
  headers?: Record<string, string>;
  body?: unknown;
}): Response {
  const status = options.status ?? 200;
  const text =
    options.body === undefined ? '' : typeof options.body === 'string' ? options.body : JSON.stringify(options.body);

  return {
    status,
    ok: status >= 200 && status < 300,
    headers: new Headers(options.headers),
    text: () => Promise.resolve(text),
    json: () => Promise.resolve(JSON.parse(text)),
  } as unknown as Response;
}

/**
 * Identity provider token response
 */
export function createMockTokenResponse(suffix = 'new', expiresIn = 3600): object {
  return {
    access_token: `access-${suffix}`,
    refresh_token: `refresh-${suffix}`,
    expires_in: expiresIn,
    token_type: 'Bearer',
  };
}

export function createMockHubsResponse(): object[] {
  return [
    { HubId: 'hub-1', HubName: 'Living Room Hub', FriendlyName: 'Downstairs' },
    { HubId: 'hub-2', HubName: null, FriendlyName: 'Upstairs' },
  ];
}

export function createMockZonesResponse(): object[] {
  return [
    {
      ZoneId: 'zone-1',
      ZoneName: 'Lounge',
      HubId: 'hub-1',
      ZoneType: 'Room',
      Appliances: [
        {
          ApplianceId: 'app-1',
          ApplianceType: 'Radiator',
          ApplianceModel: 'QRAD',
          ZoneId: 'zone-1',
          FriendlyName: 'Lounge Radiator',
          ZoneName: 'Lounge',
          InstallationDate: '2023-11-02T10:15:00Z',
          HasConnectivity: true,
        },
      ],
    },
    {
      ZoneId: 'zone-2',
      ZoneName: 'Hall',
      HubId: 'hub-1',
      ZoneType: 'Room',
    },
  ];
}

export function createMockOverviewResponse(): object[] {
  return [
    {
      HubId: 'hub-1',
      ApplianceId: 'app-1',
      ZoneId: 'zone-1',
      ApplianceModes: 16,
      RoomTemperature: 19.5,
      ActiveSetPointTemperature: 21,
      BoostDuration: 30,
      BoostTemperature: 25.0,
      OpenWindowEnabled: true,
      EcoStartEnabled: false,
      ComfortStatus: true,
      ErrorCode: null,
    },
  ];
}

export function createMockTimerModeResponse(): object {
  return {
    HubId: 'hub-1',
    ApplianceId: 'app-1',
    TimerMode: 1,
    TimerPeriods: [
      { DayOfWeek: 1, StartTime: '06:30:00', EndTime: '08:00:00', Temperature: 21.0 },
      { DayOfWeek: 1, StartTime: '17:00:00', EndTime: '22:30:00', Temperature: 20.5 },
    ],
  };
}

/**
 * In-process transport answering from a queue of scripted responses
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly responses: Array<HttpResponse | Promise<HttpResponse>> = [];

  enqueue(status: number, body: unknown = ''): this {
    this.responses.push({
      status,
      headers: {},
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
    return this;
  }

  enqueuePending(response: Promise<HttpResponse>): this {
    this.responses.push(response);
    return this;
  }

  send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const response = this.responses.shift();
    if (!response) {
      return Promise.reject(new Error(`Unexpected request: ${request.method} ${request.url}`));
    }
    return Promise.resolve(response);
  }

  requestsTo(url: string): HttpRequest[] {
    return this.requests.filter((request) => request.url.startsWith(url));
  }
}

/**
 * Promise that can be settled from the outside
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
