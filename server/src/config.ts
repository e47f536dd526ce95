import path from 'node:path';

import { DEFAULT_TRANSFER_TIME_ZONE, isValidTimeZone } from '../../shared/datetime/zoned.js';

export interface TransferTrackerConfig {
  port: number;
  logLevel: string;
  dataDir: string;
  locationsFile: string;
  catalogueFile: string;
  transfersFile: string;
  timeZone: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 8787;

const readString = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const readPort = (env: Env): number => {
  const raw = readString(env, 'PORT');
  if (!raw) {
    return DEFAULT_PORT;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${raw}".`);
  }
  return port;
};

export function readConfig(env: Env = process.env, cwd = process.cwd()): TransferTrackerConfig {
  const dataDir = path.resolve(cwd, readString(env, 'TRANSFER_DATA_DIR') ?? 'data');
  const resolveFile = (key: string, fallback: string) => path.resolve(dataDir, readString(env, key) ?? fallback);

  const timeZone = readString(env, 'TRANSFER_TIMEZONE') ?? DEFAULT_TRANSFER_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError(`TRANSFER_TIMEZONE is not a valid IANA time zone: "${timeZone}".`);
  }

  return {
    port: readPort(env),
    logLevel: readString(env, 'LOG_LEVEL') ?? 'info',
    dataDir,
    locationsFile: resolveFile('LOCATIONS_FILE', 'book1.csv'),
    catalogueFile: resolveFile('CATALOGUE_FILE', 'CATALOGUE.csv'),
    transfersFile: resolveFile('TRANSFERS_FILE', 'stock_transfers.csv'),
    timeZone,
  };
}
