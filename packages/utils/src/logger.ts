/**
 * Lightweight logger for hostbridge.
 *
 * - Plain `ts [LEVEL] [component] msg key=value` lines, or JSON lines for jq
 * - Level, format and log file read from the environment on every call
 * - Warnings and errors go to stderr so stdio transports stay clean
 */

import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  msg: string;
  [key: string]: unknown;
}

// Read env at runtime: the CLI sets HOSTBRIDGE_LOG_FILE after imports complete
function getLogFile(): string | undefined {
  return process.env.HOSTBRIDGE_LOG_FILE;
}

function getLogLevel(): LogLevel {
  const raw = (process.env.HOSTBRIDGE_LOG_LEVEL ?? 'INFO').toUpperCase();
  return isLogLevel(raw) ? raw : 'INFO';
}

function isLogLevel(value: string): value is LogLevel {
  return value === 'DEBUG' || value === 'INFO' || value === 'WARN' || value === 'ERROR';
}

function isLogJson(): boolean {
  return process.env.HOSTBRIDGE_LOG_JSON === '1';
}

/** Everything goes to stderr (the MCP bridge owns stdout). */
function isStderrOnly(): boolean {
  return process.env.HOSTBRIDGE_LOG_STDERR === '1';
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const createdLogDirs = new Set<string>();

function ensureLogDir(logFile: string): void {
  const logDir = path.dirname(logFile);
  if (!createdLogDirs.has(logDir) && !fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
    createdLogDirs.add(logDir);
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getLogLevel()];
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

export function formatMessage(entry: LogEntry, json = isLogJson()): string {
  if (json) {
    return JSON.stringify(entry);
  }
  const { ts, level, component, msg, ...extra } = entry;
  const extraStr = Object.keys(extra).length > 0
    ? ' ' + Object.entries(extra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ')
    : '';
  return `${ts} [${level}] [${component}] ${msg}${extraStr}`;
}

function log(level: LogLevel, component: string, msg: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...extra,
  };

  const formatted = formatMessage(entry);

  const logFile = getLogFile();
  if (logFile) {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, formatted + '\n');
    return;
  }

  if (level === 'ERROR' || level === 'WARN' || isStderrOnly()) {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

/**
 * Create a logger for a specific component.
 * @param component - Component name (e.g., 'server', 'pump', 'client')
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => log('DEBUG', component, msg, extra),
    info: (msg, extra) => log('INFO', component, msg, extra),
    warn: (msg, extra) => log('WARN', component, msg, extra),
    error: (msg, extra) => log('ERROR', component, msg, extra),
  };
}

export const serverLog = createLogger('server');
export const connectionLog = createLogger('connection');
export const pumpLog = createLogger('pump');
export const dispatchLog = createLogger('dispatch');
export const clientLog = createLogger('client');

export default createLogger;
