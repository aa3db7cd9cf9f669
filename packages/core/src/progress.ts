import { NotFoundError } from "@indexflow/errors";
import type { EventLog, JobStore } from "@indexflow/db";
import {
  progressForPhase,
  type IndexingJob,
  type JobListOptions,
  type JobProgress,
} from "@indexflow/types";

export interface ProgressDeps {
  jobs: JobStore;
  events: EventLog;
}

/** A queued job has not started any phase yet. */
function reportedProgress(job: IndexingJob): number {
  return job.status === "queued" ? 0 : progressForPhase(job.phaseCurrent);
}

export async function getJobProgress(jobId: string, deps: ProgressDeps): Promise<JobProgress> {
  const job = await deps.jobs.getById(jobId);
  if (!job) {
    throw new NotFoundError(`Job ${jobId} not found`);
  }
  const events = await deps.events.timeline(jobId);

  return {
    jobId: job.jobId,
    projectId: job.projectId,
    fileId: job.fileId,
    phase: job.phaseCurrent,
    status: job.status,
    progressPct: reportedProgress(job),
    startedAt: job.startedAt,
    finishedAt: job.completedAt ?? job.failedAt ?? job.cancelledAt,
    updatedAt: job.updatedAt,
    eventCount: events.length,
    timeline: events.map((event) => ({
      sequence: event.sequence,
      eventType: event.eventType,
      phase: event.phase,
      progressPct: event.progressPct,
      message: event.message,
      createdAt: event.createdAt,
    })),
  };
}

export async function listProjectJobs(
  projectId: string,
  deps: Pick<ProgressDeps, "jobs">,
  options?: JobListOptions,
): Promise<IndexingJob[]> {
  return deps.jobs.listByProject(projectId, options);
}
