#!/usr/bin/env tsx
/**
 * Create the findings cache, job queue, generation lease and usage tables
 */

import { config } from 'dotenv';
import { sql } from 'drizzle-orm';
import { loadAppConfig } from '../config/app-config.js';
import { createDatabase } from '../db.js';
import { errorMessage } from '../errors.js';

config();

async function createFindingsTables() {
  console.log('📦 Creating findings tables...\n');

  const appConfig = loadAppConfig();
  if (appConfig.storage.driver !== 'postgres') {
    console.log('ℹ️ STORAGE_DRIVER=memory, nothing to create');
    return;
  }
  const database = createDatabase(appConfig.storage.databaseUrl, 1);
  const { db } = database;

  try {
    console.log('Creating precomputed_findings table...');
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS precomputed_findings (
        id SERIAL PRIMARY KEY,
        combination_hash VARCHAR(64) NOT NULL,
        canonical_key TEXT NOT NULL,
        tool_id INTEGER NOT NULL,
        tool_key TEXT NOT NULL,
        source_keys JSONB NOT NULL,
        source_count INTEGER NOT NULL,
        language VARCHAR(5) NOT NULL,
        analysis_type TEXT NOT NULL,
        executive_summary TEXT NOT NULL,
        principal_findings TEXT NOT NULL,
        strategic_synthesis TEXT NOT NULL,
        conclusions TEXT NOT NULL,
        correlation_analysis TEXT,
        component_analysis TEXT,
        temporal_analysis TEXT,
        seasonal_analysis TEXT,
        spectral_analysis TEXT,
        generator_id TEXT NOT NULL,
        generation_latency_ms INTEGER NOT NULL DEFAULT 0,
        confidence_score REAL NOT NULL DEFAULT 0,
        data_points_count INTEGER NOT NULL DEFAULT 0,
        validation_status TEXT NOT NULL,
        validation_issues JSONB NOT NULL DEFAULT '[]'::jsonb,
        schema_version INTEGER NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        invalidated_at TIMESTAMP,
        invalidation_reason TEXT,
        access_count INTEGER NOT NULL DEFAULT 0,
        last_accessed_at TIMESTAMP,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);
    console.log('✅ precomputed_findings table created');

    console.log('Creating computation_jobs table...');
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS computation_jobs (
        id SERIAL PRIMARY KEY,
        combination_hash VARCHAR(64) NOT NULL,
        canonical_key TEXT NOT NULL,
        tool_key TEXT NOT NULL,
        source_keys JSONB NOT NULL,
        source_count INTEGER NOT NULL,
        language VARCHAR(5) NOT NULL,
        schema_version INTEGER NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        attempts INTEGER NOT NULL DEFAULT 0,
        max_attempts INTEGER NOT NULL,
        priority INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        next_attempt_at TIMESTAMP,
        leased_at TIMESTAMP,
        completed_at TIMESTAMP,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      )
    `);
    console.log('✅ computation_jobs table created');

    console.log('Creating generation_leases table...');
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS generation_leases (
        combination_hash VARCHAR(64) PRIMARY KEY,
        owner TEXT NOT NULL,
        acquired_at TIMESTAMP NOT NULL,
        expires_at TIMESTAMP NOT NULL
      )
    `);
    console.log('✅ generation_leases table created');

    console.log('Creating usage_events table...');
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS usage_events (
        id SERIAL PRIMARY KEY,
        combination_hash VARCHAR(64) NOT NULL,
        occurred_at TIMESTAMP NOT NULL,
        hit BOOLEAN NOT NULL,
        latency_ms INTEGER NOT NULL,
        outcome TEXT NOT NULL
      )
    `);
    console.log('✅ usage_events table created');

    console.log('\nCreating indexes...');
    await db.execute(sql`
      CREATE UNIQUE INDEX IF NOT EXISTS precomputed_findings_hash_idx ON precomputed_findings(combination_hash);
      CREATE INDEX IF NOT EXISTS precomputed_findings_lookup_idx ON precomputed_findings(tool_key, analysis_type, language);
      CREATE INDEX IF NOT EXISTS precomputed_findings_status_idx ON precomputed_findings(validation_status, is_active);
      CREATE UNIQUE INDEX IF NOT EXISTS computation_jobs_hash_version_idx ON computation_jobs(combination_hash, schema_version);
      CREATE UNIQUE INDEX IF NOT EXISTS computation_jobs_live_idx ON computation_jobs(combination_hash)
        WHERE status IN ('pending', 'running');
      CREATE INDEX IF NOT EXISTS computation_jobs_queue_idx ON computation_jobs(status, priority);
      CREATE INDEX IF NOT EXISTS usage_events_hash_idx ON usage_events(combination_hash);
    `);
    console.log('✅ Indexes created');

    console.log('\n🎉 All findings tables created successfully!');
  } finally {
    await database.close();
  }
}

createFindingsTables().catch((error: unknown) => {
  console.error('❌ Error creating tables:', errorMessage(error));
  process.exit(1);
});
