import { Pool } from 'pg';
import fs from 'fs';
import path from 'path';
import { config } from '../config/env';

const MIGRATIONS_DIR = path.join(__dirname, '../../drizzle');

export const listMigrations = (dir: string = MIGRATIONS_DIR) =>
  fs.readdirSync(dir).filter(file => file.endsWith('.sql')).sort();

const runMigrations = async () => {
  const pool = new Pool({
    host: config.database.host,
    port: config.database.port,
    user: config.database.user,
    password: config.database.password,
    database: config.database.name,
  });

  try {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);

    const { rows } = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
    const applied = new Set(rows.map(row => row.name));

    for (const file of listMigrations()) {
      if (applied.has(file)) {
        console.log(`⏭️  Skipping ${file} (already applied)`);
        continue;
      }

      console.log(`📦 Running ${file}...`);
      const migrationSQL = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf-8');

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(migrationSQL);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }

      console.log(`✅ ${file} completed`);
    }

    console.log('\n🎉 All migrations completed successfully!');
  } finally {
    await pool.end();
  }
};

if (require.main === module) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error('❌ Migration failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
