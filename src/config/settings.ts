import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { parse } from 'yaml';
import { ConfigError, describeError } from '../errors';

export const DEFAULT_POLLING_INTERVAL_SECONDS = 60;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 30;
export const DEFAULT_DISPLAY_TIME_ZONE = 'America/Los_Angeles';
export const DEFAULT_LABEL_TIME_ZONE = 'Pacific Standard Time';
export const DEFAULT_BOOKING_HOST = 'outlook.office365.com';

function isKnownTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const settingsFileSchema = z.object({
  timezone: z
    .string()
    .min(1)
    .refine(isKnownTimeZone, { message: 'timezone must be an IANA time zone name' })
    .optional()
    .default(DEFAULT_DISPLAY_TIME_ZONE),
  polling_interval: z.number().int().positive().optional(),
  request_timeout_seconds: z.number().positive().optional().default(DEFAULT_REQUEST_TIMEOUT_SECONDS),
  outlook: z.object({
    email: z.string().min(1, 'outlook.email is required'),
    get_token: z.string().min(1, 'outlook.get_token is required'),
    service_id: z.string().min(1, 'outlook.service_id is required'),
    staff_ids: z.array(z.string().min(1)).min(1, 'outlook.staff_ids needs at least one id'),
    host: z.string().min(1).optional().default(DEFAULT_BOOKING_HOST),
    time_zone_label: z.string().min(1).optional().default(DEFAULT_LABEL_TIME_ZONE),
  }),
  twilio: z
    .object({
      account_sid: z.string().min(1, 'twilio.account_sid is required'),
      auth_token: z.string().min(1, 'twilio.auth_token is required'),
      phone_number: z.string().min(1, 'twilio.phone_number is required'),
    })
    .optional(),
  recipients: z
    .array(
      z.string({
        invalid_type_error: 'recipients must be strings; quote phone numbers such as "+15550000001"',
      }),
    )
    .optional()
    .default([]),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

export interface PollConfig {
  readonly serviceId: string;
  readonly staffIds: readonly string[];
  readonly bookingIdentity: string;
  readonly bookingToken: string;
  readonly bookingHost: string;
  readonly displayTimeZone: string;
  readonly labelTimeZone: string;
  readonly recipients: readonly string[];
  readonly pollingIntervalSeconds: number;
  readonly requestTimeoutMs: number;
  readonly testMode: boolean;
}

export interface TwilioSettings {
  readonly accountSid: string;
  readonly authToken: string;
  readonly fromNumber: string;
}

export interface LoadedSettings {
  configPath: string;
  file: SettingsFile;
}

export interface RunParameters {
  pollingIntervalSeconds?: number;
  testMode?: boolean;
}

/**
 * Walk from `startDir` to the filesystem root and return the first directory
 * holding `filename`.
 */
export function findConfigFile(filename: string, startDir: string = process.cwd()): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(currentDir, filename);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

export function parseSettings(raw: unknown): SettingsFile {
  const parsedResult = settingsFileSchema.safeParse(raw);

  if (!parsedResult.success) {
    const messages = parsedResult.error.errors
      .map((issue) => `${issue.path.length ? issue.path.join('.') : 'root'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${messages}`);
  }

  return parsedResult.data;
}

export function loadSettingsFile(filename: string, startDir?: string): LoadedSettings {
  const configPath = path.isAbsolute(filename) ? filename : findConfigFile(filename, startDir);
  if (!configPath || !existsSync(configPath)) {
    throw new ConfigError(`'${filename}' not found in any parent directories.`);
  }

  let document: unknown;
  try {
    document = parse(readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Failed to read ${configPath}: ${describeError(error)}`, { cause: error });
  }

  return { configPath, file: parseSettings(document) };
}

export function toPollConfig(file: SettingsFile, params: RunParameters = {}): PollConfig {
  const pollingIntervalSeconds =
    params.pollingIntervalSeconds ?? file.polling_interval ?? DEFAULT_POLLING_INTERVAL_SECONDS;

  return Object.freeze({
    serviceId: file.outlook.service_id,
    staffIds: Object.freeze([...file.outlook.staff_ids]),
    bookingIdentity: file.outlook.email,
    bookingToken: file.outlook.get_token,
    bookingHost: file.outlook.host,
    displayTimeZone: file.timezone,
    labelTimeZone: file.outlook.time_zone_label,
    recipients: Object.freeze([...file.recipients]),
    pollingIntervalSeconds,
    requestTimeoutMs: Math.round(file.request_timeout_seconds * 1000),
    testMode: params.testMode ?? false,
  });
}

export function toTwilioSettings(file: SettingsFile): TwilioSettings {
  if (!file.twilio) {
    throw new ConfigError('twilio section is required when NOTIFIER_PROVIDER is twilio');
  }
  return Object.freeze({
    accountSid: file.twilio.account_sid,
    authToken: file.twilio.auth_token,
    fromNumber: file.twilio.phone_number,
  });
}
