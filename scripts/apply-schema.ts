#!/usr/bin/env tsx
/**
 * Creates the pgvector extension and the knowledge tables.
 * Usage: npm run db:schema
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Pool } from 'pg';
import { config } from 'dotenv';

config({ path: resolve(process.cwd(), '.env.local') });
config({ path: resolve(process.cwd(), '.env') });

const SCHEMA_FILE = resolve(__dirname, '../backend/sql/001_init.sql');

async function applySchema() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  const sql = await readFile(SCHEMA_FILE, 'utf-8');
  const pool = new Pool({ connectionString });
  try {
    await pool.query(sql);
    console.log(`Applied ${SCHEMA_FILE}`);
  } finally {
    await pool.end();
  }
}

applySchema().catch((error) => {
  console.error('Failed to apply schema:', error);
  process.exit(1);
});
