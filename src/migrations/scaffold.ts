import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_EXTENSIONS, isMigrationFile, parseMigrationOrder } from './discovery.js';
import { MigratorError } from '../utils/errors.js';

const ORDER_WIDTH = 4;

/**
 * Turn a free-form description into the file name suffix
 *
 * @example
 * slugifyDescription('Add text index on posts') // 'add_text_index_on_posts'
 */
export function slugifyDescription(description: string): string {
  return description
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function formatMigrationFileName(order: number, description: string, extension: string = '.mjs'): string {
  return `${String(order).padStart(ORDER_WIDTH, '0')}_${slugifyDescription(description)}${extension}`;
}

/**
 * Highest order among the migration files of a directory, 0 when empty or absent
 */
export async function findHighestOrder(
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<number> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    return 0;
  }
  return entries
    .filter(entry => isMigrationFile(entry, extensions))
    .reduce((max, entry) => Math.max(max, parseMigrationOrder(entry) ?? 0), 0);
}

export function renderMigrationTemplate(description: string): string {
  return `/**
 * ${description.trim()}
 */
export default {
  description: ${JSON.stringify(description.trim())},

  /** @param {import('mongodb').Db} db */
  async up(db) {
  },

  /** @param {import('mongodb').Db} db */
  async down(db) {
  }
};
`;
}

/**
 * Write the next migration file of a directory
 * @returns the path of the new file
 */
export async function createMigrationFile(
  dir: string,
  description: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<string> {
  if (slugifyDescription(description) === '') {
    throw new MigratorError(`Migration description must contain letters or digits: "${description}"`);
  }

  await fs.mkdir(dir, { recursive: true });
  const order = (await findHighestOrder(dir, extensions)) + 1;
  const filePath = path.join(dir, formatMigrationFileName(order, description));

  // 'wx' fails instead of overwriting an existing file
  await fs.writeFile(filePath, renderMigrationTemplate(description), { encoding: 'utf-8', flag: 'wx' });
  return filePath;
}
