// === 📊 CENTRALIZED LOGGING SYSTEM ===

// Log levels for filtering
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Logger configuration
const LOG_CONFIG = {
  level: (process.env.NODE_ENV === 'production' ? 'warn' : 'debug') as LogLevel,
  enableConsole: process.env.NODE_ENV !== 'test',
} as const;

// Log level priorities
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONTEXT_EMOJI: Record<string, string> = {
  VOTERS: '🗳️',
  HISTORY: '📜',
  STORE: '🗄️',
  CONFIG: '⚙️',
};

function shouldLog(level: LogLevel): boolean {
  return LOG_CONFIG.enableConsole && LOG_LEVELS[level] >= LOG_LEVELS[LOG_CONFIG.level];
}

/**
 * Format log line: timestamp, context tag, message
 */
export function formatMessage(level: LogLevel, context: string, message: string): string {
  const timestamp = new Date().toISOString().replace('T', ' ').replace('Z', '');
  const emoji = CONTEXT_EMOJI[context] ?? '📝';
  return `${timestamp} ${level.toUpperCase().padEnd(5)} ${emoji} ${context.toUpperCase()} ${message}`;
}

/**
 * Format data objects for better readability
 */
export function formatData(data: unknown): string {
  if (data === null || data === undefined) return '';
  if (typeof data === 'string') {
    return data.trim() === '' ? '' : data;
  }
  if (typeof data === 'number' || typeof data === 'boolean') return String(data);
  if (data instanceof Error) {
    return data.cause !== undefined ? `${data.name}: ${data.message} (cause: ${formatData(data.cause)})` : `${data.name}: ${data.message}`;
  }

  try {
    const json = JSON.stringify(data, null, 2);
    // Don't show empty objects/arrays as data
    if (json === '{}' || json === '[]' || json === 'null') return '';
    return json;
  } catch {
    return String(data);
  }
}

/**
 * Centralized logger with context and level filtering
 */
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    this.write('error', message, error);
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (!shouldLog(level)) return;
    const line = formatMessage(level, this.context, message);
    const formattedData = formatData(data);
    // Only include data if it's not empty
    const args = formattedData ? [line, formattedData] : [line];
    if (level === 'error') {
      console.error(...args);
    } else if (level === 'warn') {
      console.warn(...args);
    } else {
      console.log(...args);
    }
  }
}

// === 🎯 SPECIALIZED LOGGERS ===

export const VoterLogger = new Logger('VOTERS');

export const HistoryLogger = new Logger('HISTORY');

export const StoreLogger = new Logger('STORE');

export const ConfigLogger = new Logger('CONFIG');
