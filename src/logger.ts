/**
 * Logger — console output plus an optional log file in the data directory.
 *
 * The log file is truncated each time Logger.init() runs, so it only
 * contains the current run's lines. Lines below the configured level are dropped.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

const LOG_FILE_NAME = 'reporter.log';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  DEBUG: (line) => console.log(line),
  INFO: (line) => console.log(line),
  WARN: (line) => console.warn(line),
  ERROR: (line) => console.error(line)
};

let logStream: fs.WriteStream | null = null;
let logFilePath: string | null = null;
let consoleEnabled = true;
let minLevel: LogLevel = 'INFO';

/** Get error message from unknown error */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeData(data: unknown): string {
  if (data === null || data === undefined) return '';
  if (typeof data === 'string') return ` ${data}`;
  if (data instanceof Error) return ` ${data.name}: ${data.message}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

/** Local wall-clock time as HH:mm:ss.SSS */
function clock(now = new Date()): string {
  return `${now.toTimeString().slice(0, 8)}.${String(now.getMilliseconds()).padStart(3, '0')}`;
}

/** Scrub client secrets, bearer tokens and authorization headers from log output */
export function redact(text: string): string {
  return text
    .replace(/(["']?(?:client_?secret|clientSecret|password|access_token|refresh_token)["']?\s*[:=]\s*)["'][^"']*["']/gi, '$1"***"')
    .replace(/(ClientSecret|Password)=[^;"]*/gi, '$1=***')
    .replace(/(Bearer\s+)[A-Za-z0-9\-._~+/]+=*/g, '$1***')
    .replace(/(authorization)["']?\s*[:=]\s*[^\s,;}'"]+/gi, '$1=***');
}

function log(level: LogLevel, message: string, data: unknown): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  const line = `${clock()} [${level}] ${redact(message + describeData(data))}`;

  if (consoleEnabled) CONSOLE_WRITERS[level](line);
  logStream?.write(`${line}\n`);
}

const Logger = {
  /**
   * Start file logging in dataDir. Truncates the previous run's log.
   */
  init(dataDir: string): void {
    Logger.close();
    logFilePath = path.join(dataDir, LOG_FILE_NAME);
    try {
      fs.mkdirSync(dataDir, { recursive: true });
      logStream = fs.createWriteStream(logFilePath, { flags: 'w' });
      logStream.on('error', (err) => {
        console.error('Log stream error:', err);
        logStream = null;
      });
    } catch (err) {
      console.error('Failed to create log file:', err);
    }
    log('INFO', `=== Run started (${new Date().toISOString()}) ===`, null);
  },

  /** Silence console output (tests, or when only the file log is wanted) */
  disableConsole(): void {
    consoleEnabled = false;
  },

  setLevel(level: LogLevel): void {
    minLevel = level;
  },

  debug(message: string, data: unknown = null): void {
    log('DEBUG', message, data);
  },

  info(message: string, data: unknown = null): void {
    log('INFO', message, data);
  },

  warn(message: string, data: unknown = null): void {
    log('WARN', message, data);
  },

  error(message: string, error: unknown = null): void {
    log('ERROR', message, error);
  },

  /** Write the closing line and end the file stream (call before the process exits) */
  close(): void {
    if (!logStream) return;
    logStream.end(`${clock()} [INFO] === Run ended ===\n`);
    logStream = null;
  }
};

export default Logger;
