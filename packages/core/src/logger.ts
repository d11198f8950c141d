import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export type LogTransport = (entry: LogEntry) => void;

const LOG_LEVELS: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

let transports: LogTransport[] = [];
let minLevel: LogThreshold = 'info';

/** Add a transport that receives all log entries; returns a remover */
export function addLogTransport(transport: LogTransport): () => void {
  transports.push(transport);
  return () => {
    transports = transports.filter(t => t !== transport);
  };
}

/** Entries below this level are dropped */
export function setLogLevel(level: LogThreshold): void {
  minLevel = level;
}

export function getLogLevel(): LogThreshold {
  return minLevel;
}

export function isLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.some(t => t === value);
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

/** Render an entry as a single console line */
export function formatEntry(entry: LogEntry): string {
  const head = `${chalk.dim(entry.timestamp)} ${LEVEL_LABELS[entry.level]} ${chalk.bold(`[${entry.scope}]`)} ${entry.message}`;
  return entry.data !== undefined ? `${head} ${chalk.dim(JSON.stringify(entry.data))}` : head;
}

/** Default transport: info and below to stdout, warnings and errors to stderr */
export function consoleTransport(entry: LogEntry): void {
  const line = `${formatEntry(entry)}\n`;
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[minLevel]) return;
  for (const transport of transports) {
    transport(entry);
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Create a scoped logger. Each module creates one:
 *   const log = createLogger('TaskService');
 *   log.info('Task created', { caseNumber });
 */
export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown): void => {
    emit({ timestamp: new Date().toISOString(), level, scope, message, data });
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

addLogTransport(consoleTransport);
