import fs from 'fs';
import path from 'path';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import * as schema from '../../models';

/**
 * In-process Postgres standing in for `config/database` in API tests:
 *
 *   jest.mock('../config/database', () => jest.requireActual('./helpers/testDatabase'));
 */
export const client = new PGlite();
export const db = drizzle(client, { schema });

const SCHEMA_SQL = fs.readFileSync(path.join(__dirname, '../../../drizzle/0000_initial_schema.sql'), 'utf-8');

const TABLES = [
  'object_images',
  'offers',
  'objects',
  'agents',
  'contacts',
  'companies',
  'admin_log_entries',
  'users',
];

let migration: Promise<void> | null = null;

export const migrate = () => {
  if (!migration) {
    migration = client.exec(SCHEMA_SQL).then(() => undefined);
  }
  return migration;
};

export const resetDatabase = async () => {
  await migrate();
  await client.exec(`TRUNCATE ${TABLES.join(', ')} RESTART IDENTITY CASCADE`);
};

export const closeDatabase = () => client.close();
