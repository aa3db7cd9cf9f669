import { asc, count, eq } from "drizzle-orm";
import { redactRecord, redactText } from "@indexflow/logger";
import type { JobEvent, NewJobEvent } from "@indexflow/types";
import type { Database } from "../client.js";
import { ragJobEvents } from "../schema/index.js";
import type { EventLog } from "./interfaces.js";

type EventRow = typeof ragJobEvents.$inferSelect;

function toEvent(row: EventRow): JobEvent {
  return {
    eventId: row.eventId,
    jobId: row.jobId,
    sequence: row.sequence,
    eventType: row.eventType,
    phase: row.phase,
    progressPct: row.progressPct,
    message: row.message,
    payload: row.payload,
    createdAt: row.createdAt,
  };
}

export class DrizzleEventLog implements EventLog {
  constructor(private readonly db: Database) {}

  async append(event: NewJobEvent): Promise<JobEvent> {
    const [row] = await this.db
      .insert(ragJobEvents)
      .values({
        jobId: event.jobId,
        eventType: event.eventType,
        phase: event.phase ?? null,
        progressPct: event.progressPct ?? null,
        message: event.message === undefined ? null : redactText(event.message),
        payload: redactRecord(event.payload ?? {}),
      })
      .returning();
    if (!row) {
      throw new Error("Event insert returned no row");
    }
    return toEvent(row);
  }

  async timeline(jobId: string): Promise<JobEvent[]> {
    const rows = await this.db
      .select()
      .from(ragJobEvents)
      .where(eq(ragJobEvents.jobId, jobId))
      .orderBy(asc(ragJobEvents.sequence));
    return rows.map(toEvent);
  }

  async countByJob(jobId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(ragJobEvents)
      .where(eq(ragJobEvents.jobId, jobId));
    return row?.total ?? 0;
  }
}
