import log from 'loglevel';

const LOG_LEVEL_NAMES: readonly log.LogLevelNames[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevelName(value: string): value is log.LogLevelNames {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

export function resolveLogLevel(value: string | undefined): log.LogLevelDesc {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return 'warn';
  }
  if (normalized === 'silent' || isLogLevelName(normalized)) {
    return normalized;
  }
  return 'warn';
}

export const logLevel = resolveLogLevel(
  typeof process !== 'undefined' ? process.env?.LOG_LEVEL : undefined
);
log.setLevel(logLevel);

export { log };
