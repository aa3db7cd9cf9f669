import { sql } from "drizzle-orm";
import { pgTable, text, timestamp, integer, boolean, pgEnum, index, uniqueIndex } from "drizzle-orm/pg-core";
import { JOB_STATUSES, PIPELINE_PHASES } from "@indexflow/types";

export const jobStatusEnum = pgEnum("rag_job_status", JOB_STATUSES);

export const pipelinePhaseEnum = pgEnum("rag_pipeline_phase", PIPELINE_PHASES);

export const ragJobs = pgTable(
  "rag_jobs",
  {
    jobId: text("job_id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    projectId: text("project_id").notNull(),
    fileId: text("file_id").notNull(),
    userId: text("user_id").notNull(),
    status: jobStatusEnum("status").notNull().default("queued"),
    phaseCurrent: pipelinePhaseEnum("phase_current").notNull().default("convert"),
    needsOcr: boolean("needs_ocr").notNull().default(false),
    progressPct: integer("progress_pct").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    failedAt: timestamp("failed_at", { withTimezone: true }),
    cancelledAt: timestamp("cancelled_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index("idx_rag_jobs_project").on(table.projectId, table.createdAt),
    // One queued/running job per file
    uniqueIndex("uq_rag_jobs_active_file")
      .on(table.fileId)
      .where(sql`${table.status} in ('queued', 'running')`),
  ],
);
