import { pool } from '../src/config/database';
import fs from 'fs';
import path from 'path';

async function runMigrations() {
  try {
    console.log('🔄 Running database migrations...');

    await pool.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        run_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);

    const migrationsDir = path.join(__dirname, '../src/migrations');
    const files = fs.readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort();

    // Get already-run migrations
    const result = await pool.query<{ name: string }>('SELECT name FROM _migrations');
    const completed = new Set(result.rows.map((r) => r.name));

    let ranCount = 0;
    for (const file of files) {
      if (completed.has(file)) {
        console.log(`  ⏭ ${file} (already run)`);
        continue;
      }

      console.log(`  → Running ${file}...`);
      const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
      console.log(`  ✓ ${file} completed`);
      ranCount++;
    }

    if (ranCount === 0) {
      console.log('✅ Database is up to date, no new migrations');
    } else {
      console.log(`✅ Ran ${ranCount} migration(s) successfully`);
    }
    process.exit(0);
  } catch (error) {
    console.error('❌ Migration failed:', error);
    process.exit(1);
  }
}

void runMigrations();
