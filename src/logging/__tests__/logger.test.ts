import { describe, expect, it, vi } from 'vitest';
import { createLogger, maskSensitiveValue, redactForLog } from '../logger';

describe('maskSensitiveValue', () => {
  it('masks phone numbers down to their last two digits', () => {
    expect(maskSensitiveValue('sent to +15550000001')).toBe('sent to [phone-**01]');
  });

  it('masks e-mail local parts and booking tokens', () => {
    expect(maskSensitiveValue('https://bookings.test/book/Clinic@example.com/s/tok123abc')).toBe(
      'https://bookings.test/book/C***@example.com/s/[redacted-token]',
    );
  });

  it('leaves timestamps alone', () => {
    expect(maskSensitiveValue('2024-10-22T18:00:00')).toBe('2024-10-22T18:00:00');
  });
});

describe('redactForLog', () => {
  it('redacts string values under sensitive keys', () => {
    expect(redactForLog({ recipient: '+15550000001', authToken: 'test-secret', count: 2 })).toEqual({
      recipient: '[redacted-recipient]',
      authToken: '[redacted-authToken]',
      count: 2,
    });
  });

  it('walks nested arrays and errors', () => {
    expect(redactForLog([{ error: new Error('failed for +15550000001') }])).toEqual([
      { error: { name: 'Error', message: 'failed for [phone-**01]' } },
    ]);
  });
});

describe('createLogger', () => {
  it('writes scoped events with a JSON payload', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'info' }).child('watcher');

    logger.info('cycle.no_slots', { count: 0 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO watcher\.cycle\.no_slots$/);
    expect(log.mock.calls[0][1]).toBe('{"count":0}');
  });

  it('drops entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ level: 'warn' });

    logger.info('ignored');
    logger.debug('ignored');
    logger.error('kept');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });
});
