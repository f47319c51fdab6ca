import { DEFAULT_BASE_URL, ENDPOINTS, TOKEN_REFRESH_BUFFER_MS } from '../settings.js';
import { Authenticator } from './authenticator.js';
import type {
  ApplianceModeSettings,
  ApplianceStatus,
  Hub,
  TimerModeSettings,
  TimerPeriod,
  UserContext,
  Zone,
} from './models.js';
import {
  ApplianceStatusSchema,
  HubSchema,
  TimerModeSettingsSchema,
  UserContextSchema,
  ZoneSchema,
  parseRecord,
  parseRecordList,
  serializeApplianceModeSettings,
  serializeTimerModeSettings,
} from './models.js';
import { AuthenticatedSession } from './session.js';
import type { TokenPersistence } from './tokenFile.js';
import { TokenStore } from './tokenStore.js';
import { FetchTransport } from './transport.js';
import type { ClientLogger, Credential, DimplexClientConfig } from './types.js';

/**
 * Client for the Dimplex Control cloud API
 */
export class DimplexClient {
  private readonly log: ClientLogger;
  private readonly store: TokenStore;
  private readonly authenticator: Authenticator;
  private readonly session: AuthenticatedSession;
  private readonly tokenStorage?: TokenPersistence;

  constructor(config: DimplexClientConfig, log: ClientLogger) {
    const transport = config.transport ?? new FetchTransport(config.requestTimeoutMs);

    this.log = log;
    this.tokenStorage = config.tokenStorage;
    this.store = new TokenStore(config.credential, config.tokenRefreshBufferMs ?? TOKEN_REFRESH_BUFFER_MS);
    this.authenticator = new Authenticator(config, transport, log);
    this.session = new AuthenticatedSession({
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      store: this.store,
      authenticator: this.authenticator,
      transport,
      log,
      persistence: config.tokenStorage,
    });
  }

  /**
   * True while the held access token is usable without a refresh
   */
  get isAuthenticated(): boolean {
    return this.store.isValid();
  }

  getCredential(): Credential | undefined {
    return this.store.current;
  }

  getLoginUrl(): string {
    return this.authenticator.getLoginUrl();
  }

  /**
   * Complete first-time setup with the code from the login redirect
   */
  async exchangeCode(code: string, signal?: AbortSignal): Promise<Credential> {
    const credential = await this.authenticator.exchangeCode(code, signal);
    this.store.replace(credential);
    await this.session.persist(credential);
    this.log.info('Successfully authenticated with Dimplex Control');
    return credential;
  }

  /**
   * Load a saved credential from token storage
   * @returns whether a credential was found
   */
  async restoreCredential(): Promise<boolean> {
    if (!this.tokenStorage) {
      return false;
    }

    const credential = await this.tokenStorage.load();
    if (!credential) {
      this.log.debug('No stored credential found');
      return false;
    }

    this.store.replace(credential);
    this.log.info('Restored credential from token storage');
    return true;
  }

  /**
   * Get all hubs for the user
   */
  async getHubs(signal?: AbortSignal): Promise<Hub[]> {
    const data = await this.session.request({ method: 'GET', path: ENDPOINTS.userHubs, signal });
    return parseRecordList(HubSchema, data, 'hubs');
  }

  /**
   * Get the zones of a hub, each with its appliances
   */
  async getHubZones(hubId: string, signal?: AbortSignal): Promise<Zone[]> {
    const data = await this.session.request({
      method: 'GET',
      path: ENDPOINTS.hubZones,
      query: { HubId: hubId },
      signal,
    });
    return parseRecordList(ZoneSchema, data, 'zones');
  }

  async getZone(hubId: string, zoneId: string, signal?: AbortSignal): Promise<Zone> {
    const data = await this.session.request({
      method: 'POST',
      path: ENDPOINTS.zone,
      body: { HubId: hubId, ZoneId: zoneId },
      signal,
    });
    return parseRecord(ZoneSchema, data, 'zone');
  }

  /**
   * Real-time status for a set of appliances on one hub
   */
  async getApplianceOverview(hubId: string, applianceIds: string[], signal?: AbortSignal): Promise<ApplianceStatus[]> {
    const data = await this.session.request({
      method: 'POST',
      path: ENDPOINTS.applianceOverview,
      body: { HubId: hubId, ApplianceIds: applianceIds },
      signal,
    });
    return parseRecordList(ApplianceStatusSchema, data, 'appliance overview');
  }

  async getUserContext(signal?: AbortSignal): Promise<UserContext> {
    const data = await this.session.request({ method: 'GET', path: ENDPOINTS.userContext, signal });
    return parseRecord(UserContextSchema, data, 'user context');
  }

  /**
   * Timer mode and weekly schedule of an appliance
   */
  async getApplianceFeatures(hubId: string, applianceId: string, signal?: AbortSignal): Promise<TimerModeSettings> {
    const data = await this.session.request({
      method: 'POST',
      path: ENDPOINTS.timerModeDetails,
      // TimerMode is required by the endpoint but does not filter the result
      body: { HubId: hubId, ApplianceId: applianceId, TimerMode: 0 },
      signal,
    });
    return parseRecord(TimerModeSettingsSchema, data, 'timer mode details');
  }

  /**
   * Set the timer mode, keeping the current schedule
   */
  async setTimerMode(hubId: string, applianceId: string, mode: number, signal?: AbortSignal): Promise<void> {
    this.log.info(`Setting timer mode of ${applianceId} to ${mode}`);

    const current = await this.getApplianceFeatures(hubId, applianceId, signal);
    await this.postTimerModeSettings({ ...current, timerMode: mode }, signal);
  }

  /**
   * Replace the whole weekly schedule of an appliance, keeping its timer mode.
   * Periods are sent in the given order; overlaps are not checked.
   */
  async setTimerPeriods(
    hubId: string,
    applianceId: string,
    periods: readonly TimerPeriod[],
    signal?: AbortSignal,
  ): Promise<void> {
    this.log.info(`Programming ${periods.length} timer periods for ${applianceId}`);

    const current = await this.getApplianceFeatures(hubId, applianceId, signal);
    await this.postTimerModeSettings({ ...current, timerPeriods: periods }, signal);
  }

  /**
   * Set appliance mode (Boost, Away, ...) on several appliances at once
   */
  async setApplianceMode(
    hubId: string,
    applianceIds: string[],
    settings: ApplianceModeSettings,
    signal?: AbortSignal,
  ): Promise<void> {
    this.log.info(`Setting appliance mode ${settings.mode} (status ${settings.status}) on ${applianceIds.length} appliance(s)`);

    await this.session.request({
      method: 'POST',
      path: ENDPOINTS.setApplianceMode,
      body: { Settings: serializeApplianceModeSettings(settings), HubId: hubId, ApplianceIds: applianceIds },
      signal,
    });
  }

  async setEcoStart(hubId: string, applianceIds: string[], enable: boolean, signal?: AbortSignal): Promise<void> {
    this.log.info(`${enable ? 'Enabling' : 'Disabling'} EcoStart on ${applianceIds.length} appliance(s)`);

    await this.session.request({
      method: 'POST',
      path: ENDPOINTS.setEcoStart,
      body: { Enable: enable, HubId: hubId, ApplianceIds: applianceIds },
      signal,
    });
  }

  async setOpenWindowDetection(
    hubId: string,
    applianceIds: string[],
    enable: boolean,
    signal?: AbortSignal,
  ): Promise<void> {
    this.log.info(`${enable ? 'Enabling' : 'Disabling'} open window detection on ${applianceIds.length} appliance(s)`);

    await this.session.request({
      method: 'POST',
      path: ENDPOINTS.setOpenWindowDetection,
      body: { Enable: enable, HubId: hubId, ApplianceIds: applianceIds },
      signal,
    });
  }

  private async postTimerModeSettings(settings: TimerModeSettings, signal?: AbortSignal): Promise<void> {
    await this.session.request({
      method: 'POST',
      path: ENDPOINTS.setTimerMode,
      body: { TimerModeSettings: serializeTimerModeSettings(settings) },
      signal,
    });
  }
}
