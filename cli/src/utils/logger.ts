import fs from 'fs';
import path from 'path';
import { getConfigDir, loadConfigSync } from './config';

export const LOG_EVENTS = [
  'collect_failed',
  'record_written',
  'record_duplicate',
  'record_replaced',
  'write_failed',
] as const;

export type LogEvent = (typeof LOG_EVENTS)[number];

export interface LogEntry {
  event: LogEvent | 'raw';
  ts?: string;
  store?: string;
  mac_address?: string;
  reason?: string;

  [key: string]: unknown;
}

/**
 * Operation log lives next to the config so it survives the inventory file
 * being moved or deleted.
 */
export function getLogFile(): string {
  return path.join(getConfigDir(), 'logs', 'operations.log');
}

export async function logOperation(entry: LogEntry): Promise<void> {
  try {
    if (!loadConfigSync().logging.enabled) {
      return;
    }
    const logFile = getLogFile();
    await fs.promises.mkdir(path.dirname(logFile), { recursive: true });

    const record = {
      ts: entry.ts ?? new Date().toISOString(),
      ...entry,
    };
    await fs.promises.appendFile(logFile, `${JSON.stringify(record)}\n`, 'utf-8');
  } catch {
    /* logging never fails a command */
  }
}

function isLogEvent(value: unknown): value is LogEvent | 'raw' {
  return value === 'raw' || LOG_EVENTS.some((event) => event === value);
}

function isLogEntry(value: unknown): value is LogEntry {
  return typeof value === 'object' && value !== null && 'event' in value && isLogEvent(value.event);
}

export async function readLogEntries(): Promise<LogEntry[]> {
  const logFile = getLogFile();
  if (!fs.existsSync(logFile)) {
    return [];
  }

  const lines = (await fs.promises.readFile(logFile, 'utf-8')).split(/\r?\n/);
  const entries: LogEntry[] = [];
  for (const line of lines) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      entries.push(isLogEntry(parsed) ? parsed : { event: 'raw', message: line });
    } catch {
      entries.push({ ts: new Date().toISOString(), event: 'raw', message: line });
    }
  }
  return entries;
}
