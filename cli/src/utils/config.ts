/**
 * Configuration for devcat
 * Stored in ~/.devcat/config.yml (or $DEVCAT_HOME/config.yml)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { load as loadYaml, dump as dumpYaml } from 'js-yaml';

export const CONFIG_DIR_NAME = '.devcat';
export const CONFIG_FILE_NAME = 'config.yml';

export interface StoreConfig {
  default_path?: string;
}

export interface ThroughputConfig {
  download_url: string;
  upload_url: string;
  upload_bytes: number;
  timeout_ms: number;
}

export interface LoggingConfig {
  enabled: boolean;
}

export interface DevcatConfig {
  store: StoreConfig;
  throughput: ThroughputConfig;
  logging: LoggingConfig;
}

export interface DevcatConfigUpdate {
  store?: Partial<StoreConfig>;
  throughput?: Partial<ThroughputConfig>;
  logging?: Partial<LoggingConfig>;
}

export const DEFAULT_CONFIG: DevcatConfig = {
  store: {},
  throughput: {
    download_url: 'https://speed.cloudflare.com/__down?bytes=25000000',
    upload_url: 'https://speed.cloudflare.com/__up',
    upload_bytes: 10_000_000,
    timeout_ms: 60_000,
  },
  logging: {
    enabled: true,
  },
};

export function getConfigDir(): string {
  return process.env.DEVCAT_HOME ?? path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: unknown, key: string): Record<string, unknown> {
  if (!isRecord(source)) return {};
  const value = source[key];
  return isRecord(value) ? value : {};
}

function pickString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function pickPositiveNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function pickBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Merge a parsed (untrusted) config over a base config. Values of the wrong
 * type are ignored and the base value kept.
 */
export function mergeConfig(base: DevcatConfig, overrides: unknown): DevcatConfig {
  const store = section(overrides, 'store');
  const throughput = section(overrides, 'throughput');
  const logging = section(overrides, 'logging');

  const defaultPath = pickString(store.default_path) ?? base.store.default_path;

  return {
    store: defaultPath === undefined ? {} : { default_path: defaultPath },
    throughput: {
      download_url: pickString(throughput.download_url) ?? base.throughput.download_url,
      upload_url: pickString(throughput.upload_url) ?? base.throughput.upload_url,
      upload_bytes: pickPositiveNumber(throughput.upload_bytes) ?? base.throughput.upload_bytes,
      timeout_ms: pickPositiveNumber(throughput.timeout_ms) ?? base.throughput.timeout_ms,
    },
    logging: {
      enabled: pickBoolean(logging.enabled) ?? base.logging.enabled,
    },
  };
}

/**
 * Load config (sync, used by the logger on every write)
 */
export function loadConfigSync(): DevcatConfig {
  try {
    const configPath = getConfigPath();
    if (!fs.existsSync(configPath)) {
      return mergeConfig(DEFAULT_CONFIG, {});
    }
    const content = fs.readFileSync(configPath, 'utf-8');
    return mergeConfig(DEFAULT_CONFIG, loadYaml(content));
  } catch {
    // Unreadable or malformed YAML falls back to defaults
    return mergeConfig(DEFAULT_CONFIG, {});
  }
}

export async function loadConfig(): Promise<DevcatConfig> {
  return loadConfigSync();
}

export async function saveConfig(config: DevcatConfig): Promise<void> {
  const dir = getConfigDir();
  await fs.promises.mkdir(dir, { recursive: true, mode: 0o700 });
  const content = dumpYaml(config, { lineWidth: 120 });
  await fs.promises.writeFile(getConfigPath(), content, { mode: 0o600 });
}

export async function updateConfig(updates: DevcatConfigUpdate): Promise<DevcatConfig> {
  const current = await loadConfig();
  const updated = mergeConfig(current, updates);
  await saveConfig(updated);
  return updated;
}
