export type LogLevel = 'info' | 'warn' | 'error';

export type LogPayload = Record<string, string | number | boolean | null>;

export interface PetLogger {
  info(message: string, payload?: LogPayload): void;
  warn(message: string, payload?: LogPayload): void;
  error(message: string, payload?: LogPayload): void;
}

export interface LogRecord {
  level: LogLevel;
  scope: string;
  message: string;
  payload: LogPayload;
}

export const createConsoleLogger = (scope: string): PetLogger => {
  const tag = `[${scope}]`;
  return {
    info: (message, payload = {}) => console.info(tag, message, payload),
    warn: (message, payload = {}) => console.warn(tag, message, payload),
    error: (message, payload = {}) => console.error(tag, message, payload),
  };
};

/**
 * Keeps log records in memory. Used by tests and by hosts that render their own log panel.
 */
export const createRecordingLogger = (
  scope: string
): PetLogger & { readonly records: LogRecord[] } => {
  const records: LogRecord[] = [];
  const push = (level: LogLevel) => (message: string, payload: LogPayload = {}) => {
    records.push({ level, scope, message, payload });
  };

  return {
    records,
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
  };
};
