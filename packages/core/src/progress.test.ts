import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryStores, type MemoryStores } from "@indexflow/db/testing";
import { NotFoundError } from "@indexflow/errors";
import { createLogger } from "@indexflow/logger";
import { deindexFile } from "./deindex.js";
import { getJobProgress, listProjectJobs } from "./progress.js";

describe("job progress", () => {
  let stores: MemoryStores;

  beforeEach(() => {
    stores = createMemoryStores();
  });

  async function newJob(fileId: string) {
    return stores.jobs.create({ projectId: "project-1", fileId, userId: "user-1", needsOcr: false });
  }

  it("reports zero progress for a queued job", async () => {
    const job = await newJob("file-1");

    const progress = await getJobProgress(job.jobId, stores);

    expect(progress).toMatchObject({
      jobId: job.jobId,
      phase: "convert",
      status: "queued",
      progressPct: 0,
      startedAt: null,
      finishedAt: null,
      eventCount: 0,
      timeline: [],
    });
  });

  it("maps the current phase to its progress and returns the timeline in order", async () => {
    const job = await newJob("file-1");
    await stores.jobs.updateStatus(job.jobId, "running");
    await stores.events.append({ jobId: job.jobId, eventType: "job_running", phase: "convert" });
    await stores.events.append({
      jobId: job.jobId,
      eventType: "phase_completed",
      phase: "chunk",
      progressPct: 55,
      message: "Chunking completed: 3 chunks created",
    });
    await stores.jobs.updatePhase(job.jobId, "chunk");

    const progress = await getJobProgress(job.jobId, stores);

    expect(progress.progressPct).toBe(55);
    expect(progress.startedAt).toBeInstanceOf(Date);
    expect(progress.eventCount).toBe(2);
    expect(progress.timeline.map((e) => [e.sequence, e.eventType, e.phase, e.progressPct])).toEqual([
      [1, "job_running", "convert", null],
      [2, "phase_completed", "chunk", 55],
    ]);
  });

  it("reports the finishing time of a failed job", async () => {
    const job = await newJob("file-1");
    const failed = await stores.jobs.updateStatus(job.jobId, "failed");

    const progress = await getJobProgress(job.jobId, stores);

    expect(progress.finishedAt).toEqual(failed.failedAt);
  });

  it("throws NotFoundError for unknown jobs", async () => {
    await expect(getJobProgress("missing", stores)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists a project's jobs newest first", async () => {
    const first = await newJob("file-1");
    const second = await newJob("file-2");
    await stores.jobs.create({ projectId: "project-2", fileId: "file-3", userId: "user-1", needsOcr: false });

    const jobs = await listProjectJobs("project-1", stores);
    const page = await listProjectJobs("project-1", stores, { limit: 1, offset: 1 });

    expect(jobs.map((j) => j.jobId)).toEqual([second.jobId, first.jobId]);
    expect(page.map((j) => j.jobId)).toEqual([first.jobId]);
  });
});

describe("deindexFile", () => {
  it("switches off the file's active vectors", async () => {
    const stores = createMemoryStores();
    const vector = Array.from({ length: 1536 }, () => 0);
    await stores.embeddings.insertMany([
      { fileId: "file-1", chunkId: "c0", chunkIndex: 0, vector, embeddingModel: "m" },
      { fileId: "file-1", chunkId: "c1", chunkIndex: 1, vector, embeddingModel: "m" },
      { fileId: "file-2", chunkId: "c2", chunkIndex: 0, vector, embeddingModel: "m" },
    ]);

    const result = await deindexFile("file-1", "file deleted", {
      embeddings: stores.embeddings,
      logger: createLogger({ level: "silent" }),
    });

    expect(result).toEqual({ deactivated: 2 });
    expect(await stores.embeddings.countByFile("file-1")).toBe(0);
    expect(await stores.embeddings.countByFile("file-1", { onlyActive: false })).toBe(2);
    expect(await stores.embeddings.countByFile("file-2")).toBe(1);
  });
});
