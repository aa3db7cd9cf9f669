import { pgTable, text, timestamp, integer, jsonb, bigserial, pgEnum, index } from "drizzle-orm/pg-core";
import { JOB_EVENT_TYPES } from "@indexflow/types";
import { ragJobs, pipelinePhaseEnum } from "./jobs.js";

export const jobEventTypeEnum = pgEnum("rag_job_event_type", JOB_EVENT_TYPES);

export const ragJobEvents = pgTable(
  "rag_job_events",
  {
    eventId: text("event_id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    jobId: text("job_id")
      .notNull()
      .references(() => ragJobs.jobId),
    sequence: bigserial("sequence", { mode: "number" }).notNull(),
    eventType: jobEventTypeEnum("event_type").notNull(),
    phase: pipelinePhaseEnum("phase"),
    progressPct: integer("progress_pct"),
    message: text("message"),
    payload: jsonb("payload").notNull().$type<Record<string, unknown>>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_rag_job_events_job").on(table.jobId, table.sequence)],
);
