#!/usr/bin/env tsx
/**
 * Empties the knowledge tables.
 * Usage: npm run db:clear
 */

import { Pool, type PoolClient } from 'pg';
import { config } from 'dotenv';
import { resolve } from 'node:path';

config({ path: resolve(process.cwd(), '.env.local') });
config({ path: resolve(process.cwd(), '.env') });

const DATABASE_URL = process.env.DATABASE_URL;

if (!DATABASE_URL) {
  console.error('DATABASE_URL is not set');
  process.exit(1);
}

const pool = new Pool({
  connectionString: DATABASE_URL,
});

async function countRows(
  client: PoolClient,
  table: string,
): Promise<number> {
  const result = await client.query<{ count: string }>(
    `SELECT COUNT(*) AS count FROM ${table}`,
  );
  return Number.parseInt(result.rows[0]?.count ?? '0', 10);
}

async function clearTables() {
  const client = await pool.connect();
  try {
    const entries = await countRows(client, 'knowledge_entries');
    const documents = await countRows(client, 'knowledge_documents');

    console.log('Current row counts:');
    console.log(`   - knowledge_entries: ${entries}`);
    console.log(`   - knowledge_documents: ${documents}`);

    if (entries === 0 && documents === 0) {
      console.log('Tables are already empty');
      return;
    }

    await client.query('BEGIN');
    try {
      await client.query('DELETE FROM knowledge_entries');
      await client.query('DELETE FROM knowledge_documents');
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }

    console.log('\nRow counts after clearing:');
    console.log(
      `   - knowledge_entries: ${await countRows(client, 'knowledge_entries')}`,
    );
    console.log(
      `   - knowledge_documents: ${await countRows(client, 'knowledge_documents')}`,
    );
  } finally {
    client.release();
    await pool.end();
  }
}

clearTables()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    console.error('Failed to clear knowledge tables:', error);
    process.exit(1);
  });
