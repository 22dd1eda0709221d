import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { errnoCode } from '../../errors/src/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogSourceOptions {
  file?: string;
  source?: string;
}

export interface StreamOptions extends LogSourceOptions {
  maxLines?: number;
}

export interface StreamResult {
  file: string;
  lines: string[];
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LogEntry {
  ts: number;
  level: LogLevel;
  module: string;
  event: string;
  data: Record<string, unknown>;
}

const HOME_LOG_ROOT = path.join(os.homedir(), '.engage', 'logs');
export const DEBUG_LOG_FILE = path.join(HOME_LOG_ROOT, 'debug.jsonl');
const DEFAULT_SOURCES: Record<string, string> = {
  pipeline: path.join(HOME_LOG_ROOT, 'pipeline.log'),
  debug: DEBUG_LOG_FILE,
};

let debugReady = false;

export function isDebugEnabled(): boolean {
  return process.env.DEBUG === '1' || process.env.debug === '1';
}

function ensureDebugLogDir(): boolean {
  if (debugReady) return true;
  try {
    fs.mkdirSync(path.dirname(DEBUG_LOG_FILE), { recursive: true });
    debugReady = true;
  } catch {
    // the debug log is best effort; console output is unaffected
  }
  return debugReady;
}

export function logDebug(module: string, event: string, data: Record<string, unknown> = {}, level: LogLevel = 'debug'): void {
  if (!isDebugEnabled()) return;
  if (!ensureDebugLogDir()) return;
  const entry: LogEntry = {
    ts: Date.now(),
    level,
    module,
    event,
    data,
  };
  try {
    fs.appendFileSync(DEBUG_LOG_FILE, `${JSON.stringify(entry)}\n`);
  } catch {
    // same as above
  }
}

function formatData(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) return '';
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return '';
  }
}

/**
 * Console logger with a `[module]` prefix. Every entry is mirrored to the
 * JSONL debug log when DEBUG=1; `debug` lines only reach the console then.
 */
export function createLogger(module: string): Logger {
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    logDebug(module, message, data ?? {}, level);
    const line = `[${module}] ${message}${formatData(data)}`;
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else if (level === 'info') console.log(line);
    else if (isDebugEnabled()) console.log(line);
  };
  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

/**
 * Logger that keeps entries in memory. Used by tests and by callers that want
 * to report what happened during a run.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  constructor(private readonly module = 'memory') {}

  debug(message: string, data: Record<string, unknown> = {}): void {
    this.push('debug', message, data);
  }

  info(message: string, data: Record<string, unknown> = {}): void {
    this.push('info', message, data);
  }

  warn(message: string, data: Record<string, unknown> = {}): void {
    this.push('warn', message, data);
  }

  error(message: string, data: Record<string, unknown> = {}): void {
    this.push('error', message, data);
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  private push(level: LogLevel, event: string, data: Record<string, unknown>): void {
    this.entries.push({ ts: Date.now(), level, module: this.module, event, data });
  }
}

export function resolveLogFile(options: LogSourceOptions): string {
  if (options.file) {
    return path.resolve(options.file);
  }
  if (options.source && DEFAULT_SOURCES[options.source]) {
    return DEFAULT_SOURCES[options.source];
  }
  return DEFAULT_SOURCES.debug;
}

export async function streamLog(options: StreamOptions = {}): Promise<StreamResult> {
  const file = resolveLogFile(options);
  const maxLines = options.maxLines ?? 200;
  const lines = await readTailLines(file, maxLines);
  return { file, lines };
}

export async function flushLog(options: LogSourceOptions = {}, truncate = false): Promise<StreamResult> {
  const file = resolveLogFile(options);
  const lines = await readTailLines(file, Number.MAX_SAFE_INTEGER);
  if (truncate && lines.length > 0) {
    await fs.promises.truncate(file, 0);
  }
  return { file, lines };
}

async function readTailLines(file: string, maxLines: number): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(file, 'utf-8');
    const lines = content.split(/\r?\n/).filter((line) => line.length > 0);
    if (lines.length <= maxLines) {
      return lines;
    }
    return lines.slice(-maxLines);
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return [];
    }
    throw err;
  }
}
