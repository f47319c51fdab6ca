/**
 * Base URL of the Dimplex Control mobile API
 */
export const DEFAULT_BASE_URL = 'https://mobileapi.gdhv-iot.com/api';

/**
 * Azure AD B2C policy endpoint used by the mobile app for OAuth
 */
export const DEFAULT_AUTH_URL =
  'https://gdhvb2c.b2clogin.com/tfp/gdhvb2c.onmicrosoft.com/B2C_1A_DimplexControlSignupSignin/oauth2/v2.0';

/**
 * OAuth client registration of the mobile app
 */
export const CLIENT_ID = '6c983ca3-506e-4933-8993-0e18e6a24bbd';
export const SCOPE = 'https://gdhvb2c.onmicrosoft.com/Mobile/read offline_access openid profile';
export const REDIRECT_URI = `msal${CLIENT_ID}://auth/`;

export const REQUEST_TIMEOUT_MS = 30000;
export const TOKEN_REFRESH_BUFFER_MS = 60000; // Refresh token 60 seconds before expiry

/**
 * Headers the API expects from the mobile app on every request
 */
export const APP_HEADERS = {
  app_name: 'DimplexControl',
  app_version: '2.21.0',
  app_device_os: 'iOS',
  device_version: '26.2.1',
  device_manufacturer: 'Apple',
  device_model: 'iPhone18,1',
  api_version: '1.0',
  'User-Agent': 'Dimplex Control/79810 CFNetwork/3860.300.31 Darwin/25.2.0',
  Accept: '*/*',
} as const;

/**
 * Vendor API endpoints, relative to the base URL
 */
export const ENDPOINTS = {
  userHubs: '/Hubs/GetUserHubs',
  hubZones: '/Zones/GetZonesAndAppliancesForHubId',
  zone: '/Zones/GetZone',
  applianceOverview: '/RemoteControl/GetApplianceOverview',
  userContext: '/Identity/GetUserContext',
  timerModeDetails: '/RemoteControl/GetTimerModeDetailsForAppliance',
  setTimerMode: '/RemoteControl/SetTimerMode',
  setApplianceMode: '/RemoteControl/SetApplianceMode',
  setEcoStart: '/RemoteControl/SetEcoStart',
  setOpenWindowDetection: '/RemoteControl/SetOpenWindowDetection',
} as const;

/**
 * Appliance mode values accepted by SetApplianceMode that have been observed in app traffic.
 * Other values pass through as plain numbers.
 */
export const ApplianceMode = {
  Boost: 16,
} as const;

/**
 * Default command values sent by the app when a field does not apply to the mode
 */
export const APPLIANCE_MODE_DEFAULTS = {
  temperature: 23.0,
  time: 0,
  date: '0001-01-01T00:00:00',
  statusTwo: 0,
  numberOfDays: 0,
  frequency: 0,
} as const;
