export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(event: string, payload?: unknown): void;
  info(event: string, payload?: unknown): void;
  warn(event: string, payload?: unknown): void;
  error(event: string, payload?: unknown): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEY_TERMS = ['email', 'phone', 'token', 'secret', 'key', 'sid', 'recipient'];

export function maskSensitiveValue(value: string): string {
  let redacted = value;
  redacted = redacted.replace(
    /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g,
    (_match, user: string, domain: string) => `${user.slice(0, 1)}***@${domain}`,
  );
  redacted = redacted.replace(/\+?\d[\d\s-]{6,}(\d{2})\b/g, (_match, tail: string) => `[phone-**${tail}]`);
  redacted = redacted.replace(/\/s\/[A-Za-z0-9_-]{6,}/g, '/s/[redacted-token]');
  return redacted;
}

export function redactForLog(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return payload;
  }
  if (typeof payload === 'string') {
    return maskSensitiveValue(payload);
  }
  if (payload instanceof Error) {
    return { name: payload.name, message: maskSensitiveValue(payload.message) };
  }
  if (Array.isArray(payload)) {
    return payload.map(redactForLog);
  }
  if (typeof payload === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      const keyLower = key.toLowerCase();
      const isSensitiveKey = SENSITIVE_KEY_TERMS.some((term) => keyLower.includes(term));
      if (typeof value === 'string' && isSensitiveKey) {
        result[key] = `[redacted-${key}]`;
      } else {
        result[key] = redactForLog(value);
      }
    }
    return result;
  }
  return payload;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
}

export function createLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const scope = options.scope;

  function write(level: LogLevel, event: string, payload: unknown): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const name = scope ? `${scope}.${event}` : event;
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${name}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (payload === undefined) {
      sink(line);
    } else {
      sink(line, JSON.stringify(redactForLog(payload)));
    }
  }

  return {
    debug: (event, payload) => write('debug', event, payload),
    info: (event, payload) => write('info', event, payload),
    warn: (event, payload) => write('warn', event, payload),
    error: (event, payload) => write('error', event, payload),
    child: (childScope) =>
      createLogger({ level: options.level, scope: scope ? `${scope}.${childScope}` : childScope }),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
