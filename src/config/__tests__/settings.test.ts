import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parse } from 'yaml';
import { ConfigError } from '../../errors';
import { findConfigFile, loadSettingsFile, parseSettings, toPollConfig, toTwilioSettings } from '../settings';

const VALID_YAML = `
timezone: America/New_York
outlook:
  email: Clinic@example.com
  get_token: tok123
  service_id: svc-1
  staff_ids:
    - staff-a
    - staff-b
twilio:
  account_sid: ACtest
  auth_token: test-secret
  phone_number: "+15550000000"
recipients:
  - "+15550000001"
  - "+15550000002"
`;

let root: string;

beforeEach(() => {
  root = mkdtempSync(path.join(tmpdir(), 'watcher-settings-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe('findConfigFile', () => {
  it('finds the file in a parent directory', () => {
    const nested = path.join(root, 'a', 'b', 'c');
    mkdirSync(nested, { recursive: true });
    writeFileSync(path.join(root, 'a', 'config.yaml'), VALID_YAML, 'utf8');

    expect(findConfigFile('config.yaml', nested)).toBe(path.join(root, 'a', 'config.yaml'));
  });

  it('returns undefined when nothing is found up to the root', () => {
    expect(findConfigFile('no-such-watcher-config.yaml', root)).toBeUndefined();
  });
});

describe('loadSettingsFile', () => {
  it('loads and validates the YAML file', () => {
    writeFileSync(path.join(root, 'config.yaml'), VALID_YAML, 'utf8');

    const loaded = loadSettingsFile('config.yaml', root);

    expect(loaded.configPath).toBe(path.join(root, 'config.yaml'));
    expect(loaded.file.outlook.staff_ids).toEqual(['staff-a', 'staff-b']);
    expect(loaded.file.outlook.host).toBe('outlook.office365.com');
  });

  it('accepts an absolute path', () => {
    const file = path.join(root, 'watch.yaml');
    writeFileSync(file, VALID_YAML, 'utf8');

    expect(loadSettingsFile(file).configPath).toBe(file);
  });

  it('raises a ConfigError when the file is missing', () => {
    expect(() => loadSettingsFile(path.join(root, 'missing.yaml'))).toThrow(ConfigError);
  });

  it('raises a ConfigError on malformed YAML', () => {
    writeFileSync(path.join(root, 'config.yaml'), 'outlook: [unclosed', 'utf8');

    expect(() => loadSettingsFile('config.yaml', root)).toThrow(/Failed to read/);
  });
});

describe('parseSettings', () => {
  it('reports every missing outlook key', () => {
    expect(() => parseSettings({ outlook: { email: 'Clinic@example.com' } })).toThrow(
      /outlook\.get_token: Required; outlook\.service_id: Required; outlook\.staff_ids: Required/,
    );
  });

  it('rejects an unknown display time zone', () => {
    expect(() =>
      parseSettings({
        timezone: 'Mars/Olympus_Mons',
        outlook: { email: 'a@example.com', get_token: 't', service_id: 's', staff_ids: ['x'] },
      }),
    ).toThrow('timezone: timezone must be an IANA time zone name');
  });

  it('rejects unquoted phone numbers instead of dropping the plus sign', () => {
    const document = parse(`
outlook:
  email: a@example.com
  get_token: t
  service_id: s
  staff_ids: [x]
recipients:
  - +15550000001
`);

    expect(() => parseSettings(document)).toThrow(ConfigError);
    expect(() => parseSettings(document)).toThrow(
      'recipients.0: recipients must be strings; quote phone numbers such as "+15550000001"',
    );
  });

  it('rejects empty recipient entries', () => {
    expect(() =>
      parseSettings({
        outlook: { email: 'a@example.com', get_token: 't', service_id: 's', staff_ids: ['x'] },
        recipients: [null],
      }),
    ).toThrow(/recipients\.0/);
  });

  it('applies defaults for optional keys', () => {
    const file = parseSettings({
      outlook: { email: 'a@example.com', get_token: 't', service_id: 's', staff_ids: ['x'] },
    });

    expect(file.timezone).toBe('America/Los_Angeles');
    expect(file.request_timeout_seconds).toBe(30);
    expect(file.outlook.time_zone_label).toBe('Pacific Standard Time');
    expect(file.recipients).toEqual([]);
  });
});

describe('toPollConfig', () => {
  const file = parseSettings({
    timezone: 'America/New_York',
    polling_interval: 45,
    outlook: { email: 'Clinic@example.com', get_token: 'tok123', service_id: 'svc-1', staff_ids: ['staff-a'] },
    recipients: ['+15550000001'],
  });

  it('maps the file into a frozen run configuration', () => {
    const config = toPollConfig(file);

    expect(config).toEqual({
      serviceId: 'svc-1',
      staffIds: ['staff-a'],
      bookingIdentity: 'Clinic@example.com',
      bookingToken: 'tok123',
      bookingHost: 'outlook.office365.com',
      displayTimeZone: 'America/New_York',
      labelTimeZone: 'Pacific Standard Time',
      recipients: ['+15550000001'],
      pollingIntervalSeconds: 45,
      requestTimeoutMs: 30000,
      testMode: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.staffIds)).toBe(true);
  });

  it('lets run parameters override the file', () => {
    const config = toPollConfig(file, { pollingIntervalSeconds: 10, testMode: true });

    expect(config.pollingIntervalSeconds).toBe(10);
    expect(config.testMode).toBe(true);
  });

  it('falls back to a sixty second interval', () => {
    const withoutInterval = parseSettings({
      outlook: { email: 'a@example.com', get_token: 't', service_id: 's', staff_ids: ['x'] },
    });

    expect(toPollConfig(withoutInterval).pollingIntervalSeconds).toBe(60);
  });
});

describe('toTwilioSettings', () => {
  it('requires the twilio section', () => {
    const file = parseSettings({
      outlook: { email: 'a@example.com', get_token: 't', service_id: 's', staff_ids: ['x'] },
    });

    expect(() => toTwilioSettings(file)).toThrow(ConfigError);
  });
});
