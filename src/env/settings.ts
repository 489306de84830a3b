import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LayoutSettingsSchema,
  MigratorSettingsSchema,
  SettingsFileSchema,
  type LayoutSettings,
  type MigratorSettings,
  type SettingsInput
} from './types.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

export const DEFAULT_CONFIG_FILE = 'migrator.config.json';

export interface LoadSettingsOptions {
  /** Directory holding migrator.config.json and .env (default: process.cwd()) */
  cwd?: string;
  /** Explicit config file; must exist when given */
  configFile?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load settings.
 * Priority: CLI overrides > environment (.env included) > config file > defaults
 */
export async function loadSettings(
  overrides: SettingsInput = {},
  options: LoadSettingsOptions = {}
): Promise<MigratorSettings> {
  const merged = await mergeLayers(overrides, options);

  const result = MigratorSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid migrator settings: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Same sources as loadSettings, without the connection settings
 */
export async function loadLayoutSettings(
  overrides: SettingsInput = {},
  options: LoadSettingsOptions = {}
): Promise<LayoutSettings> {
  const merged = await mergeLayers(overrides, options);

  const result = LayoutSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid migrator settings: ${formatIssues(result.error)}`);
  }
  return result.data;
}

async function mergeLayers(overrides: SettingsInput, options: LoadSettingsOptions): Promise<SettingsInput> {
  const cwd = options.cwd ?? process.cwd();
  const env = { ...(await readDotenv(cwd)), ...(options.env ?? process.env) };

  const fileSettings = await readSettingsFile(cwd, options.configFile);
  const envSettings = settingsFromEnv(env);

  const layers = [overrides, envSettings, fileSettings];
  const pick = <K extends keyof SettingsInput>(key: K): SettingsInput[K] =>
    layers.map(layer => layer[key]).find(value => value !== undefined);

  return {
    mongodbUri: pick('mongodbUri'),
    databaseName: pick('databaseName'),
    collection: pick('collection'),
    migrationsDir: pick('migrationsDir'),
    extensions: pick('extensions'),
    logFile: pick('logFile'),
    debug: pick('debug')
  };
}

/**
 * Map environment variables to settings
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): SettingsInput {
  const debug = env.MIGRATOR_DEBUG;
  return {
    mongodbUri: env.MONGODB_URI,
    databaseName: env.MONGO_DATABASE_NAME,
    collection: env.MIGRATIONS_COLLECTION,
    logFile: env.MIGRATOR_LOG_FILE,
    debug: debug === undefined ? undefined : debug === 'true' || debug === '1'
  };
}

async function readDotenv(cwd: string): Promise<Record<string, string>> {
  try {
    const content = await fs.readFile(path.join(cwd, '.env'), 'utf-8');
    return dotenv.parse(content);
  } catch {
    // no .env file
    return {};
  }
}

async function readSettingsFile(cwd: string, configFile?: string): Promise<SettingsInput> {
  const filePath = path.resolve(cwd, configFile ?? DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (configFile) {
      throw new ConfigurationError(`Config file not found at ${filePath}: ${getErrorMessage(error)}`);
    }
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${getErrorMessage(error)}`);
  }

  const result = SettingsFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
