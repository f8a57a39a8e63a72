/**
 * JIE Mastery AI Tutor Platform
 * Copyright (c) 2025 JIE Mastery AI, Inc.
 * All Rights Reserved.
 * 
 * This source code is confidential and proprietary.
 * Unauthorized copying, modification, or distribution is strictly prohibited.
 */

import { execSync } from 'child_process';
import { pool } from './db';

const REQUIRED_TABLES = ['students', 'conversation_turns', 'flagged_items', 'analytics_summaries'];

export async function initializeDatabase(): Promise<boolean> {
  if (!process.env.DATABASE_URL) {
    console.error('[DB-Init] ❌ DATABASE_URL is not set');
    return false;
  }

  try {
    console.log('[DB-Init] Checking database schema...');

    const result = await pool.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name = ANY($1)`,
      [REQUIRED_TABLES]
    );
    const present = new Set(result.rows.map((row) => row.table_name));
    const missing = REQUIRED_TABLES.filter((table) => !present.has(table));

    if (missing.length === 0) {
      console.log('[DB-Init] ✅ Database schema already exists');
      return true;
    }

    console.log(`[DB-Init] Tables missing (${missing.join(', ')}). Running schema sync...`);
    execSync('npm run db:push -- --force', {
      stdio: 'inherit',
      env: { ...process.env }
    });
    console.log('[DB-Init] ✅ Database schema synced successfully');
    return true;
  } catch (error) {
    console.error('[DB-Init] ❌ Database initialization error:', error);
    return false;
  }
}
