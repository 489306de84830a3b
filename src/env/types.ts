/**
 * Configuration types for the migrator
 */

import { z } from 'zod';
import { DEFAULT_EXTENSIONS } from '../migrations/discovery.js';
import { DEFAULT_LEDGER_COLLECTION } from '../migrations/ledger.js';
import { MIGRATIONS_DIR_NAME } from '../utils/paths.js';

const extensionSchema = z.string().regex(/^\.[A-Za-z0-9.]+$/, 'extensions must start with a dot (e.g. ".js")');

/**
 * Resolved settings, after defaults and validation
 */
export const MigratorSettingsSchema = z.object({
  mongodbUri: z
    .string({ required_error: 'MongoDB URI is required (MONGODB_URI or --uri)' })
    .min(1, 'MongoDB URI must not be empty'),
  databaseName: z
    .string({ required_error: 'database name is required (MONGO_DATABASE_NAME or --db)' })
    .min(1, 'database name must not be empty'),
  collection: z.string().min(1).default(DEFAULT_LEDGER_COLLECTION),
  migrationsDir: z.string().min(1).default(MIGRATIONS_DIR_NAME),
  extensions: z.array(extensionSchema).min(1).default([...DEFAULT_EXTENSIONS]),
  logFile: z.string().min(1).optional(),
  debug: z.boolean().default(false)
});

export type MigratorSettings = z.infer<typeof MigratorSettingsSchema>;

/**
 * Settings that do not need a database (e.g. to scaffold a migration)
 */
export const LayoutSettingsSchema = MigratorSettingsSchema.omit({ mongodbUri: true, databaseName: true });

export type LayoutSettings = z.infer<typeof LayoutSettingsSchema>;

/**
 * Shape of migrator.config.json; every field optional, unknown keys rejected
 */
export const SettingsFileSchema = z
  .object({
    mongodbUri: z.string(),
    databaseName: z.string(),
    collection: z.string(),
    migrationsDir: z.string(),
    extensions: z.array(z.string()),
    logFile: z.string(),
    debug: z.boolean()
  })
  .partial()
  .strict();

export type SettingsInput = z.infer<typeof SettingsFileSchema>;
