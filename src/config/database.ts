import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { config } from './env';
import * as schema from '../models';

export const pool = new Pool({
  host: config.database.host,
  port: config.database.port,
  user: config.database.user,
  password: config.database.password,
  database: config.database.name,
});

pool.on('error', (error) => {
  console.error('❌ Idle database client error:', error.message);
});

export const db = drizzle(pool, { schema });

export type Database = typeof db;
