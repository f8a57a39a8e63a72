/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import * as dotenv from 'dotenv';

// Load environment variables FIRST, before any other code
dotenv.config();

import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from '@shared/schema';

const connectionString = process.env.DATABASE_URL;

if (!connectionString) {
  console.error('[DB] ❌ DATABASE_URL is not set');
  if (process.env.NODE_ENV === 'production') {
    throw new Error('DATABASE_URL must be set in production');
  }
}

// Bounded waits so a stalled database surfaces as a persistence failure
const pool = new Pool({
  connectionString: connectionString || 'postgresql://localhost:5432/tutor_insights',
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  statement_timeout: 10000,
});

console.log('[DB] ✓ PostgreSQL pool created');

export const db = drizzle(pool, { schema });
export { pool };

pool.on('error', (err) => {
  console.error('[DB] ❌ Unexpected database error:', err);
});
