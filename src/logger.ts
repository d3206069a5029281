export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isKnownLevel(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL;
  return configured && isKnownLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export function log(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
  if (LEVEL_ORDER[level] < threshold()) {
    return;
  }
  const entry = {
    ts: new Date().toISOString(),
    level,
    message,
    ...meta,
  };
  if (level === 'error') {
    console.error(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}

export function logDebug(message: string, meta: Record<string, unknown> = {}): void {
  log('debug', message, meta);
}

export function logInfo(message: string, meta: Record<string, unknown> = {}): void {
  log('info', message, meta);
}

export function logWarn(message: string, meta: Record<string, unknown> = {}): void {
  log('warn', message, meta);
}

export function logError(message: string, meta: Record<string, unknown> = {}): void {
  log('error', message, meta);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
