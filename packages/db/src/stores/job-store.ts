import { and, desc, eq } from "drizzle-orm";
import { ConflictError, InvalidTransitionError, NotFoundError } from "@indexflow/errors";
import {
  canTransition,
  progressForPhase,
  type IndexingJob,
  type JobListOptions,
  type JobStatus,
  type NewIndexingJob,
  type PipelinePhase,
} from "@indexflow/types";
import { isUniqueViolation, type Database } from "../client.js";
import { ragJobs } from "../schema/index.js";
import { DEFAULT_JOB_LIST_LIMIT, type JobStore } from "./interfaces.js";
import { activeJobConflictMessage, stampForStatus } from "./job-fields.js";

type JobRow = typeof ragJobs.$inferSelect;

function toJob(row: JobRow): IndexingJob {
  return {
    jobId: row.jobId,
    projectId: row.projectId,
    fileId: row.fileId,
    userId: row.userId,
    status: row.status,
    phaseCurrent: row.phaseCurrent,
    needsOcr: row.needsOcr,
    progressPct: row.progressPct,
    createdAt: row.createdAt,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    failedAt: row.failedAt,
    cancelledAt: row.cancelledAt,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleJobStore implements JobStore {
  constructor(private readonly db: Database) {}

  async create(input: NewIndexingJob): Promise<IndexingJob> {
    try {
      const [row] = await this.db
        .insert(ragJobs)
        .values({
          projectId: input.projectId,
          fileId: input.fileId,
          userId: input.userId,
          needsOcr: input.needsOcr,
        })
        .returning();
      if (!row) {
        throw new Error("Job insert returned no row");
      }
      return toJob(row);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(activeJobConflictMessage(input.fileId), {
          details: { fileId: input.fileId },
          cause: error,
        });
      }
      throw error;
    }
  }

  async getById(jobId: string): Promise<IndexingJob | null> {
    const [row] = await this.db.select().from(ragJobs).where(eq(ragJobs.jobId, jobId)).limit(1);
    return row ? toJob(row) : null;
  }

  async listByProject(projectId: string, options?: JobListOptions): Promise<IndexingJob[]> {
    const rows = await this.db
      .select()
      .from(ragJobs)
      .where(eq(ragJobs.projectId, projectId))
      .orderBy(desc(ragJobs.createdAt), desc(ragJobs.jobId))
      .limit(options?.limit ?? DEFAULT_JOB_LIST_LIMIT)
      .offset(options?.offset ?? 0);
    return rows.map(toJob);
  }

  async updatePhase(jobId: string, phase: PipelinePhase): Promise<IndexingJob> {
    const [row] = await this.db
      .update(ragJobs)
      .set({ phaseCurrent: phase, progressPct: progressForPhase(phase), updatedAt: new Date() })
      .where(eq(ragJobs.jobId, jobId))
      .returning();
    if (!row) {
      throw new NotFoundError(`Job ${jobId} not found`);
    }
    return toJob(row);
  }

  async updateStatus(jobId: string, status: JobStatus): Promise<IndexingJob> {
    const current = await this.getById(jobId);
    if (!current) {
      throw new NotFoundError(`Job ${jobId} not found`);
    }
    if (!canTransition(current.status, status)) {
      throw new InvalidTransitionError(current.status, status, { details: { jobId } });
    }

    const now = new Date();
    const [row] = await this.db
      .update(ragJobs)
      .set({ status, updatedAt: now, ...stampForStatus(status, now) })
      .where(and(eq(ragJobs.jobId, jobId), eq(ragJobs.status, current.status)))
      .returning();
    if (!row) {
      throw new ConflictError(`Job ${jobId} changed status concurrently`, { details: { jobId } });
    }
    return toJob(row);
  }
}
