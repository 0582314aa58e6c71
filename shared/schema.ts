import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  serial,
  integer,
  varchar,
  jsonb,
  boolean,
  real,
  timestamp,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";

export const analysisTypes = ["single", "multi"] as const;
export type AnalysisType = (typeof analysisTypes)[number];

export const validationStatuses = ["valid", "partial", "invalid"] as const;
export type ValidationStatus = (typeof validationStatuses)[number];

export const jobStatuses = ["pending", "running", "completed", "failed"] as const;
export type JobStatus = (typeof jobStatuses)[number];

export interface ValidationIssue {
  code: string;
  field?: string;
  severity: "partial" | "invalid";
  message: string;
}

// One row per combination hash. Multi-only and per-source detail columns stay
// NULL for single-source analyses.
export const precomputedFindings = pgTable(
  "precomputed_findings",
  {
    id: serial("id").primaryKey(),
    combinationHash: varchar("combination_hash", { length: 64 }).notNull(),
    canonicalKey: text("canonical_key").notNull(),
    toolId: integer("tool_id").notNull(),
    toolKey: text("tool_key").notNull(),
    sourceKeys: jsonb("source_keys").$type<string[]>().notNull(),
    sourceCount: integer("source_count").notNull(),
    language: varchar("language", { length: 5 }).notNull(),
    analysisType: text("analysis_type").$type<AnalysisType>().notNull(),

    // Shared narrative
    executiveSummary: text("executive_summary").notNull(),
    principalFindings: text("principal_findings").notNull(),
    strategicSynthesis: text("strategic_synthesis").notNull(),
    conclusions: text("conclusions").notNull(),

    // Multi-source only
    correlationAnalysis: text("correlation_analysis"),
    componentAnalysis: text("component_analysis"),
    temporalAnalysis: text("temporal_analysis"),
    seasonalAnalysis: text("seasonal_analysis"),
    spectralAnalysis: text("spectral_analysis"),

    // Generation metadata
    generatorId: text("generator_id").notNull(),
    generationLatencyMs: integer("generation_latency_ms").notNull().default(0),
    confidenceScore: real("confidence_score").notNull().default(0),
    dataPointsCount: integer("data_points_count").notNull().default(0),
    validationStatus: text("validation_status").$type<ValidationStatus>().notNull(),
    validationIssues: jsonb("validation_issues").$type<ValidationIssue[]>().notNull().default([]),
    schemaVersion: integer("schema_version").notNull(),

    // Lifecycle
    isActive: boolean("is_active").notNull().default(true),
    invalidatedAt: timestamp("invalidated_at"),
    invalidationReason: text("invalidation_reason"),
    accessCount: integer("access_count").notNull().default(0),
    lastAccessedAt: timestamp("last_accessed_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    hashIdx: uniqueIndex("precomputed_findings_hash_idx").on(table.combinationHash),
    lookupIdx: index("precomputed_findings_lookup_idx").on(table.toolKey, table.analysisType, table.language),
    statusIdx: index("precomputed_findings_status_idx").on(table.validationStatus, table.isActive),
  }),
);

export const computationJobs = pgTable(
  "computation_jobs",
  {
    id: serial("id").primaryKey(),
    combinationHash: varchar("combination_hash", { length: 64 }).notNull(),
    canonicalKey: text("canonical_key").notNull(),
    toolKey: text("tool_key").notNull(),
    sourceKeys: jsonb("source_keys").$type<string[]>().notNull(),
    sourceCount: integer("source_count").notNull(),
    language: varchar("language", { length: 5 }).notNull(),
    schemaVersion: integer("schema_version").notNull(),
    status: text("status").$type<JobStatus>().notNull().default("pending"),
    attempts: integer("attempts").notNull().default(0),
    maxAttempts: integer("max_attempts").notNull(),
    priority: integer("priority").notNull().default(0),
    lastError: text("last_error"),
    nextAttemptAt: timestamp("next_attempt_at"),
    leasedAt: timestamp("leased_at"),
    completedAt: timestamp("completed_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    versionIdx: uniqueIndex("computation_jobs_hash_version_idx").on(table.combinationHash, table.schemaVersion),
    liveIdx: uniqueIndex("computation_jobs_live_idx")
      .on(table.combinationHash)
      .where(sql`${table.status} in ('pending', 'running')`),
    queueIdx: index("computation_jobs_queue_idx").on(table.status, table.priority),
  }),
);

// Cross-process guard: at most one generator call per combination hash.
export const generationLeases = pgTable("generation_leases", {
  combinationHash: varchar("combination_hash", { length: 64 }).primaryKey(),
  owner: text("owner").notNull(),
  acquiredAt: timestamp("acquired_at").notNull(),
  expiresAt: timestamp("expires_at").notNull(),
});

export const usageEvents = pgTable(
  "usage_events",
  {
    id: serial("id").primaryKey(),
    combinationHash: varchar("combination_hash", { length: 64 }).notNull(),
    occurredAt: timestamp("occurred_at").notNull(),
    hit: boolean("hit").notNull(),
    latencyMs: integer("latency_ms").notNull(),
    outcome: text("outcome").notNull(),
  },
  (table) => ({
    hashIdx: index("usage_events_hash_idx").on(table.combinationHash),
  }),
);

export const insertPrecomputedFindingsSchema = createInsertSchema(precomputedFindings).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

export type PrecomputedFindingsRow = typeof precomputedFindings.$inferSelect;
export type InsertPrecomputedFindings = typeof precomputedFindings.$inferInsert;
export type ComputationJobRow = typeof computationJobs.$inferSelect;
export type InsertComputationJob = typeof computationJobs.$inferInsert;
export type GenerationLeaseRow = typeof generationLeases.$inferSelect;
export type UsageEventRow = typeof usageEvents.$inferSelect;
export type InsertUsageEvent = typeof usageEvents.$inferInsert;
