import path from 'node:path';
import { tmpdir } from 'node:os';
import { describe, expect, it, vi } from 'vitest';
import { main, parseCliArgs } from '../main';

describe('parseCliArgs', () => {
  it('defaults to polling mode', () => {
    expect(parseCliArgs([])).toEqual({
      pollingIntervalSeconds: undefined,
      testMode: false,
      once: false,
      configFile: undefined,
      help: false,
    });
  });

  it('reads the interval, test flag and config file', () => {
    expect(
      parseCliArgs(['--polling-interval', '120', '--send-notification', '--once', '--config', 'watch.yaml']),
    ).toEqual({
      pollingIntervalSeconds: 120,
      testMode: true,
      once: true,
      configFile: 'watch.yaml',
      help: false,
    });
  });

  it.each(['0', '-5', '1.5', 'soon'])('rejects a polling interval of %s', (value) => {
    expect(() => parseCliArgs([`--polling-interval=${value}`])).toThrow(/--polling-interval/);
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow();
  });
});

describe('main', () => {
  it('exits with an error when the configuration file is missing', async () => {
    const logSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = path.join(tmpdir(), 'booking-slot-watcher-missing', 'config.yaml');

    await expect(main(['--once', '--config', missing])).resolves.toBe(1);
    expect(logSpy).toHaveBeenCalled();
  });

  it('exits with usage on a bad interval', async () => {
    const logSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(main(['--polling-interval', 'never'])).resolves.toBe(1);
    expect(String(logSpy.mock.calls[0][0])).toContain('Usage: booking-slot-watcher');
  });

  it('prints usage for --help', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['--help'])).resolves.toBe(0);
    expect(String(logSpy.mock.calls[0][0])).toContain('--send-notification');
  });
});
