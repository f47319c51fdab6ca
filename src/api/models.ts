/**
 * Dimplex Control API records
 *
 * The API speaks PascalCase JSON; records are exposed in camelCase and every
 * response is checked against its schema before it leaves the client.
 */

import { z } from 'zod';

import { APPLIANCE_MODE_DEFAULTS } from '../settings.js';
import { ValidationError } from './types.js';

export interface Hub {
  readonly hubId: string;
  readonly name?: string;
  readonly friendlyName?: string;
}

export interface Appliance {
  readonly applianceId: string;
  readonly applianceType: string;
  readonly applianceModel?: string;
  readonly zoneId: string;
  readonly friendlyName: string;
  readonly zoneName: string;
  readonly icon?: string;
  readonly iconColor?: string;
  readonly installationDate?: Date;
  readonly hasConnectivity?: boolean;
}

export interface Zone {
  readonly zoneId: string;
  readonly zoneName: string;
  readonly hubId: string;   // Owning hub, resolved with a further call
  readonly zoneType: string;
  readonly appliances: readonly Appliance[];
}

/**
 * Real-time snapshot from GetApplianceOverview, valid only when fetched
 */
export interface ApplianceStatus {
  readonly hubId: string;
  readonly applianceId: string;
  readonly zoneId: string;
  readonly statusTwo?: number;
  readonly applianceModes?: number;
  readonly roomTemperature?: number;
  readonly activeSetPointTemperature?: number;
  readonly normalTemperature?: number;
  readonly awayDateTime?: string;
  readonly awayTemperature?: number;
  readonly boostDuration?: number;      // Minutes
  readonly boostTemperature?: number;
  readonly openWindowEnabled?: boolean;
  readonly ecoStartEnabled?: boolean;
  readonly setbackEnabled?: boolean;
  readonly setbackEnabledInStatusFrame?: boolean;
  readonly setbackTemperature?: number;
  readonly comfortStatus?: boolean;
  readonly availableHotWater?: number;
  readonly lockStatus?: number;
  readonly errorCode?: string;
  readonly warningCode?: string;
}

/**
 * One interval of a weekly heating program
 */
export interface TimerPeriod {
  readonly dayOfWeek: number;
  readonly startTime: string;   // HH:MM:SS, end of day as 24:00:00
  readonly endTime: string;
  readonly temperature: number;
}

export interface TimerModeSettings {
  readonly hubId: string;
  readonly applianceId: string;
  readonly timerMode: number;
  readonly timerPeriods: readonly TimerPeriod[];
}

export interface UserContext {
  readonly id: string;
  readonly emailAddress?: string;
  readonly name?: string;
}

/**
 * Command payload for SetApplianceMode (Boost, Away, ...)
 */
export interface ApplianceModeSettings {
  readonly mode: number;
  readonly status: number;      // 1 = on, 0 = off
  readonly temperature: number;
  readonly time: number;        // Duration in minutes
  readonly date: string;
  readonly statusTwo: number;
  readonly numberOfDays: number;
  readonly frequency: number;
}

export type ApplianceModeSettingsInput = Pick<ApplianceModeSettings, 'mode' | 'status'> &
  Partial<Omit<ApplianceModeSettings, 'mode' | 'status'>>;

// The API sends null for unset fields; records leave them out
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const isoDate = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${value}"` });
    return z.NEVER;
  }
  return date;
});

export const HubSchema: z.ZodType<Hub, z.ZodTypeDef, unknown> = z
  .object({
    HubId: z.string(),
    HubName: optional(z.string()),
    FriendlyName: optional(z.string()),
  })
  .transform((hub) => ({
    hubId: hub.HubId,
    name: hub.HubName,
    friendlyName: hub.FriendlyName,
  }));

export const ApplianceSchema: z.ZodType<Appliance, z.ZodTypeDef, unknown> = z
  .object({
    ApplianceId: z.string(),
    ApplianceType: z.string(),
    ApplianceModel: optional(z.string()),
    ZoneId: z.string(),
    FriendlyName: z.string(),
    ZoneName: z.string(),
    Icon: optional(z.string()),
    IconColor: optional(z.string()),
    InstallationDate: optional(isoDate),
    HasConnectivity: optional(z.boolean()),
  })
  .transform((appliance) => ({
    applianceId: appliance.ApplianceId,
    applianceType: appliance.ApplianceType,
    applianceModel: appliance.ApplianceModel,
    zoneId: appliance.ZoneId,
    friendlyName: appliance.FriendlyName,
    zoneName: appliance.ZoneName,
    icon: appliance.Icon,
    iconColor: appliance.IconColor,
    installationDate: appliance.InstallationDate,
    hasConnectivity: appliance.HasConnectivity,
  }));

export const ZoneSchema: z.ZodType<Zone, z.ZodTypeDef, unknown> = z
  .object({
    ZoneId: z.string(),
    ZoneName: z.string(),
    HubId: z.string(),
    ZoneType: z.string(),
    Appliances: optional(z.array(ApplianceSchema)),
  })
  .transform((zone) => ({
    zoneId: zone.ZoneId,
    zoneName: zone.ZoneName,
    hubId: zone.HubId,
    zoneType: zone.ZoneType,
    appliances: zone.Appliances ?? [],
  }));

export const ApplianceStatusSchema: z.ZodType<ApplianceStatus, z.ZodTypeDef, unknown> = z
  .object({
    HubId: z.string(),
    ApplianceId: z.string(),
    ZoneId: z.string(),
    StatusTwo: optional(z.number().int()),
    ApplianceModes: optional(z.number().int()),
    RoomTemperature: optional(z.number()),
    ActiveSetPointTemperature: optional(z.number()),
    NormalTemperature: optional(z.number()),
    AwayDateTime: optional(z.string()),
    AwayTemperature: optional(z.number()),
    BoostDuration: optional(z.number().int()),
    BoostTemperature: optional(z.number()),
    OpenWindowEnabled: optional(z.boolean()),
    EcoStartEnabled: optional(z.boolean()),
    SetbackEnabled: optional(z.boolean()),
    SetbackEnabledInStatusFrame: optional(z.boolean()),
    SetbackTemperature: optional(z.number()),
    ComfortStatus: optional(z.boolean()),
    AvailableHotWater: optional(z.number()),
    LockStatus: optional(z.number().int()),
    ErrorCode: optional(z.string()),
    WarningCode: optional(z.string()),
  })
  .transform((status) =>
    Object.freeze({
      hubId: status.HubId,
      applianceId: status.ApplianceId,
      zoneId: status.ZoneId,
      statusTwo: status.StatusTwo,
      applianceModes: status.ApplianceModes,
      roomTemperature: status.RoomTemperature,
      activeSetPointTemperature: status.ActiveSetPointTemperature,
      normalTemperature: status.NormalTemperature,
      awayDateTime: status.AwayDateTime,
      awayTemperature: status.AwayTemperature,
      boostDuration: status.BoostDuration,
      boostTemperature: status.BoostTemperature,
      openWindowEnabled: status.OpenWindowEnabled,
      ecoStartEnabled: status.EcoStartEnabled,
      setbackEnabled: status.SetbackEnabled,
      setbackEnabledInStatusFrame: status.SetbackEnabledInStatusFrame,
      setbackTemperature: status.SetbackTemperature,
      comfortStatus: status.ComfortStatus,
      availableHotWater: status.AvailableHotWater,
      lockStatus: status.LockStatus,
      errorCode: status.ErrorCode,
      warningCode: status.WarningCode,
    }),
  );

export const TimerPeriodSchema: z.ZodType<TimerPeriod, z.ZodTypeDef, unknown> = z
  .object({
    // Day numbering and time format are whatever the app sent; read back as written
    DayOfWeek: z.number().int(),
    StartTime: z.string(),
    EndTime: z.string(),
    Temperature: z.number(),
  })
  .transform((period) => ({
    dayOfWeek: period.DayOfWeek,
    startTime: period.StartTime,
    endTime: period.EndTime,
    temperature: period.Temperature,
  }));

export const TimerModeSettingsSchema: z.ZodType<TimerModeSettings, z.ZodTypeDef, unknown> = z
  .object({
    HubId: z.string(),
    ApplianceId: z.string(),
    TimerMode: z.number().int(),
    TimerPeriods: optional(z.array(TimerPeriodSchema)),
  })
  .transform((settings) => ({
    hubId: settings.HubId,
    applianceId: settings.ApplianceId,
    timerMode: settings.TimerMode,
    timerPeriods: settings.TimerPeriods ?? [],
  }));

export const UserContextSchema: z.ZodType<UserContext, z.ZodTypeDef, unknown> = z
  .object({
    Id: z.string(),
    EmailAddress: optional(z.string()),
    Name: optional(z.string()),
  })
  .transform((user) => ({
    id: user.Id,
    emailAddress: user.EmailAddress,
    name: user.Name,
  }));

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`);
}

/**
 * Validate a response body against a schema, raising ValidationError on mismatch
 */
export function parseRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what} response`, formatIssues(result.error));
  }
  return result.data;
}

export function parseRecordList<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  what: string,
): T[] {
  return parseRecord(z.array(schema), data, what);
}

/**
 * Name to show for a hub, falling back to its friendly name
 */
export function hubDisplayName(hub: Hub): string {
  return hub.name || hub.friendlyName || 'Unknown Hub';
}

/**
 * Build an immutable mode command, filling in the values the app sends by default
 */
export function createApplianceModeSettings(input: ApplianceModeSettingsInput): ApplianceModeSettings {
  return Object.freeze({
    mode: input.mode,
    status: input.status,
    temperature: input.temperature ?? APPLIANCE_MODE_DEFAULTS.temperature,
    time: input.time ?? APPLIANCE_MODE_DEFAULTS.time,
    date: input.date ?? APPLIANCE_MODE_DEFAULTS.date,
    statusTwo: input.statusTwo ?? APPLIANCE_MODE_DEFAULTS.statusTwo,
    numberOfDays: input.numberOfDays ?? APPLIANCE_MODE_DEFAULTS.numberOfDays,
    frequency: input.frequency ?? APPLIANCE_MODE_DEFAULTS.frequency,
  });
}

export function serializeApplianceModeSettings(settings: ApplianceModeSettings): Record<string, unknown> {
  return {
    ApplianceModes: settings.mode,
    Status: settings.status,
    Temperature: settings.temperature,
    Time: settings.time,
    Date: settings.date,
    StatusTwo: settings.statusTwo,
    NumberOfDays: settings.numberOfDays,
    Frequency: settings.frequency,
  };
}

export function serializeTimerPeriod(period: TimerPeriod): Record<string, unknown> {
  return {
    DayOfWeek: period.dayOfWeek,
    StartTime: period.startTime,
    EndTime: period.endTime,
    Temperature: period.temperature,
  };
}

export function serializeTimerModeSettings(settings: TimerModeSettings): Record<string, unknown> {
  return {
    HubId: settings.hubId,
    ApplianceId: settings.applianceId,
    TimerMode: settings.timerMode,
    TimerPeriods: settings.timerPeriods.map(serializeTimerPeriod),
  };
}
