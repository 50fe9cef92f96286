import { promises as fs } from 'fs';
import path from 'path';
import { DEFAULT_PERSONS_DB_PATH } from './database';

export type ConfigReadOptions = {
  basePath?: string;
};

export type StoreKind = 'sqlite' | 'memory';

export type ServerConfig = {
  port: number;
  host: string;
  store: StoreKind;
  dbPath: string;
};

export const CONFIG_KEYS = ['PORT', 'HOST', 'PERSONS_STORE', 'PERSONS_DB_PATH'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const resolveEnvPath = (basePath?: string) =>
  path.join(basePath ?? process.cwd(), '.env');

export const parseEnv = (raw: string) => {
  const values: Record<string, string> = {};
  raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .forEach((line) => {
      const index = line.indexOf('=');
      if (index === -1) return;
      const key = line.slice(0, index).trim();
      const value = line.slice(index + 1).trim();
      if (key) {
        values[key] = value;
      }
    });
  return values;
};

const readEnvFile = async (filePath: string): Promise<Record<string, string>> => {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return parseEnv(raw);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
};

const parsePort = (value: string | undefined) => {
  if (!value) return 3000;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
};

const parseStoreKind = (value: string | undefined): StoreKind => {
  if (!value) return 'sqlite';
  if (value === 'sqlite' || value === 'memory') return value;
  throw new ConfigError(`PERSONS_STORE must be "sqlite" or "memory", got "${value}"`);
};

export const resolveServerConfig = (values: Record<string, string | undefined>): ServerConfig => ({
  port: parsePort(values.PORT),
  host: values.HOST || '0.0.0.0',
  store: parseStoreKind(values.PERSONS_STORE),
  dbPath: values.PERSONS_DB_PATH || DEFAULT_PERSONS_DB_PATH
});

/**
 * Server settings from the .env file, with real environment variables taking precedence.
 */
export const loadServerConfig = async (
  options: ConfigReadOptions = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<ServerConfig> => {
  const fileValues = await readEnvFile(resolveEnvPath(options.basePath));
  const merged: Record<string, string | undefined> = {};
  CONFIG_KEYS.forEach((key) => {
    merged[key] = env[key] ?? fileValues[key];
  });
  return resolveServerConfig(merged);
};
