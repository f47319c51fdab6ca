export { DimplexClient } from './api/client.js';
export { Authenticator, extractAuthorizationCode } from './api/authenticator.js';
export { AuthenticatedSession } from './api/session.js';
export type { ApiRequest, SessionOptions } from './api/session.js';
export { TokenStore } from './api/tokenStore.js';
export type { CredentialExchange } from './api/tokenStore.js';
export { TokenFile, credentialToFileData } from './api/tokenFile.js';
export type { TokenFileData, TokenPersistence } from './api/tokenFile.js';
export { FetchTransport } from './api/transport.js';
export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './api/transport.js';
export {
  createApplianceModeSettings,
  hubDisplayName,
  parseRecord,
  parseRecordList,
  serializeApplianceModeSettings,
  serializeTimerModeSettings,
  serializeTimerPeriod,
} from './api/models.js';
export type {
  Appliance,
  ApplianceModeSettings,
  ApplianceModeSettingsInput,
  ApplianceStatus,
  Hub,
  TimerModeSettings,
  TimerPeriod,
  UserContext,
  Zone,
} from './api/models.js';
export {
  ApiError,
  AuthenticationError,
  ConnectionError,
  DimplexError,
  ProtocolError,
  ValidationError,
} from './api/types.js';
export type { AuthenticatorConfig, ClientLogger, Credential, DimplexClientConfig } from './api/types.js';
export { ApplianceMode, DEFAULT_AUTH_URL, DEFAULT_BASE_URL } from './settings.js';
