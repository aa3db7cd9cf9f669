import { randomUUID } from "node:crypto";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ConflictError, InvalidTransitionError, NotFoundError } from "@indexflow/errors";
import { STORED_VECTOR_DIMENSION, type NewChunk } from "@indexflow/types";
import { createTestDatabase, createMemoryStores, type TestDatabase } from "../testing/index.js";
import { createDrizzleStores } from "./index.js";
import type { IndexStores } from "./interfaces.js";

interface Harness {
  stores: () => IndexStores;
  setup: () => Promise<void>;
  teardown: () => Promise<void>;
}

function pgliteHarness(): Harness {
  let database: TestDatabase | undefined;
  let stores: IndexStores | undefined;
  return {
    stores: () => {
      if (!stores) throw new Error("harness not set up");
      return stores;
    },
    setup: async () => {
      database = await createTestDatabase();
      stores = createDrizzleStores(database.db);
    },
    teardown: async () => {
      await database?.close();
    },
  };
}

function memoryHarness(): Harness {
  let stores: IndexStores | undefined;
  return {
    stores: () => {
      if (!stores) throw new Error("harness not set up");
      return stores;
    },
    setup: async () => {
      stores = createMemoryStores();
    },
    teardown: async () => {},
  };
}

function vectorFor(seed: number): number[] {
  return Array.from({ length: STORED_VECTOR_DIMENSION }, (_, i) => (i === seed ? 1 : 0));
}

function newChunks(count: number): NewChunk[] {
  return Array.from({ length: count }, (_, i) => ({
    chunkIndex: i,
    chunkText: `chunk ${String(i)}`,
    tokenCount: 2,
    metadata: { startToken: i * 2, endToken: i * 2 + 2 },
  }));
}

describe.each([
  ["drizzle on PGlite", pgliteHarness()],
  ["in-memory", memoryHarness()],
])("index stores (%s)", (_name, harness) => {
  beforeAll(async () => {
    await harness.setup();
  });

  afterAll(async () => {
    await harness.teardown();
  });

  describe("JobStore", () => {
    it("creates a queued job at the convert phase", async () => {
      const fileId = randomUUID();
      const job = await harness.stores().jobs.create({
        projectId: "p1",
        fileId,
        userId: "u1",
        needsOcr: true,
      });

      expect(job.status).toBe("queued");
      expect(job.phaseCurrent).toBe("convert");
      expect(job.progressPct).toBe(0);
      expect(job.needsOcr).toBe(true);
      expect(job.startedAt).toBeNull();

      const loaded = await harness.stores().jobs.getById(job.jobId);
      expect(loaded?.fileId).toBe(fileId);
    });

    it("returns null for an unknown job", async () => {
      expect(await harness.stores().jobs.getById(randomUUID())).toBeNull();
    });

    it("rejects a second active job for the same file", async () => {
      const fileId = randomUUID();
      const { jobs } = harness.stores();
      await jobs.create({ projectId: "p1", fileId, userId: "u1", needsOcr: false });

      await expect(
        jobs.create({ projectId: "p1", fileId, userId: "u1", needsOcr: false }),
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("allows a new job once the previous one is terminal", async () => {
      const fileId = randomUUID();
      const { jobs } = harness.stores();
      const first = await jobs.create({ projectId: "p1", fileId, userId: "u1", needsOcr: false });
      await jobs.updateStatus(first.jobId, "failed");

      const second = await jobs.create({ projectId: "p1", fileId, userId: "u1", needsOcr: false });
      expect(second.jobId).not.toBe(first.jobId);
    });

    it("stamps timestamps as the job moves through statuses", async () => {
      const { jobs } = harness.stores();
      const job = await jobs.create({
        projectId: "p1",
        fileId: randomUUID(),
        userId: "u1",
        needsOcr: false,
      });

      const running = await jobs.updateStatus(job.jobId, "running");
      expect(running.status).toBe("running");
      expect(running.startedAt).toBeInstanceOf(Date);

      const done = await jobs.updateStatus(job.jobId, "completed");
      expect(done.completedAt).toBeInstanceOf(Date);
      expect(done.failedAt).toBeNull();
    });

    it("refuses transitions out of a terminal status", async () => {
      const { jobs } = harness.stores();
      const job = await jobs.create({
        projectId: "p1",
        fileId: randomUUID(),
        userId: "u1",
        needsOcr: false,
      });
      await jobs.updateStatus(job.jobId, "cancelled");

      await expect(jobs.updateStatus(job.jobId, "running")).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
    });

    it("refuses to complete a job that never ran", async () => {
      const { jobs } = harness.stores();
      const job = await jobs.create({
        projectId: "p1",
        fileId: randomUUID(),
        userId: "u1",
        needsOcr: false,
      });

      await expect(jobs.updateStatus(job.jobId, "completed")).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
    });

    it("sets progress from the phase", async () => {
      const { jobs } = harness.stores();
      const job = await jobs.create({
        projectId: "p1",
        fileId: randomUUID(),
        userId: "u1",
        needsOcr: false,
      });

      const updated = await jobs.updatePhase(job.jobId, "embed");
      expect(updated.phaseCurrent).toBe("embed");
      expect(updated.progressPct).toBe(75);
    });

    it("throws NotFoundError when updating a missing job", async () => {
      await expect(harness.stores().jobs.updatePhase(randomUUID(), "chunk")).rejects.toBeInstanceOf(
        NotFoundError,
      );
      await expect(
        harness.stores().jobs.updateStatus(randomUUID(), "running"),
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("lists a project's jobs newest first with paging", async () => {
      const { jobs } = harness.stores();
      const projectId = randomUUID();
      const created: string[] = [];
      for (let i = 0; i < 3; i++) {
        const job = await jobs.create({
          projectId,
          fileId: randomUUID(),
          userId: "u1",
          needsOcr: false,
        });
        created.push(job.jobId);
        await new Promise((resolve) => setTimeout(resolve, 5));
      }

      const all = await jobs.listByProject(projectId);
      expect(all.map((j) => j.jobId)).toEqual([...created].reverse());

      const page = await jobs.listByProject(projectId, { limit: 1, offset: 1 });
      expect(page.map((j) => j.jobId)).toEqual([created[1]]);
    });
  });

  describe("EventLog", () => {
    it("returns events in append order with increasing sequence", async () => {
      const { jobs, events } = harness.stores();
      const job = await jobs.create({
        projectId: "p1",
        fileId: randomUUID(),
        userId: "u1",
        needsOcr: false,
      });

      await events.append({ jobId: job.jobId, eventType: "job_queued", message: "queued" });
      await events.append({
        jobId: job.jobId,
        eventType: "phase_started",
        phase: "convert",
        progressPct: 15,
      });
      await events.append({
        jobId: job.jobId,
        eventType: "phase_completed",
        phase: "convert",
        payload: { checksum: "abc" },
      });

      const timeline = await events.timeline(job.jobId);
      expect(timeline.map((e) => e.eventType)).toEqual([
        "job_queued",
        "phase_started",
        "phase_completed",
      ]);
      const sequences = timeline.map((e) => e.sequence);
      expect([...sequences].sort((a, b) => a - b)).toEqual(sequences);
      expect(new Set(sequences).size).toBe(3);
      expect(timeline[1]?.progressPct).toBe(15);
      expect(timeline[2]?.payload).toEqual({ checksum: "abc" });
      expect(timeline[0]?.phase).toBeNull();
      expect(await events.countByJob(job.jobId)).toBe(3);
    });

    it("redacts email addresses before persisting", async () => {
      const { jobs, events } = harness.stores();
      const job = await jobs.create({
        projectId: "p1",
        fileId: randomUUID(),
        userId: "u1",
        needsOcr: false,
      });

      const event = await events.append({
        jobId: job.jobId,
        eventType: "job_failed",
        message: "upstream rejected owner@example.com",
        payload: { contact: "owner@example.com" },
      });

      expect(event.message).toBe("upstream rejected [REDACTED]");
      expect(event.payload).toEqual({ contact: "[REDACTED]" });
    });
  });

  describe("ChunkStore", () => {
    it("replaces the whole chunk set for a file", async () => {
      const { chunks } = harness.stores();
      const fileId = randomUUID();

      const first = await chunks.replaceForFile(fileId, newChunks(4));
      expect(first.map((c) => c.chunkIndex)).toEqual([0, 1, 2, 3]);

      const second = await chunks.replaceForFile(fileId, newChunks(2));
      expect(second).toHaveLength(2);
      expect(await chunks.countByFile(fileId)).toBe(2);

      const listed = await chunks.listByFile(fileId);
      expect(listed.map((c) => c.chunkId)).toEqual(second.map((c) => c.chunkId));
      expect(listed[1]?.metadata).toEqual({ startToken: 2, endToken: 4 });
    });

    it("keeps other files untouched", async () => {
      const { chunks } = harness.stores();
      const a = randomUUID();
      const b = randomUUID();
      await chunks.replaceForFile(a, newChunks(3));
      await chunks.replaceForFile(b, newChunks(1));

      await chunks.replaceForFile(a, []);

      expect(await chunks.countByFile(a)).toBe(0);
      expect(await chunks.countByFile(b)).toBe(1);
    });

    it("looks chunks up by id in index order", async () => {
      const { chunks } = harness.stores();
      const stored = await chunks.replaceForFile(randomUUID(), newChunks(5));
      const picked = [stored[3], stored[1]].flatMap((c) => (c ? [c.chunkId] : []));

      const found = await chunks.getByIds(picked);
      expect(found.map((c) => c.chunkIndex)).toEqual([1, 3]);
      expect(await chunks.getByIds([])).toEqual([]);
    });

    it("rejects repeated indexes and keeps the previous set", async () => {
      const { chunks } = harness.stores();
      const fileId = randomUUID();
      const [kept] = await chunks.replaceForFile(fileId, newChunks(1));
      const [dup] = newChunks(1);
      if (!kept || !dup) throw new Error("chunks missing");

      await expect(chunks.replaceForFile(fileId, [dup, dup])).rejects.toBeInstanceOf(ConflictError);

      expect((await chunks.listByFile(fileId)).map((c) => c.chunkId)).toEqual([kept.chunkId]);
    });

    it("deletes by file", async () => {
      const { chunks } = harness.stores();
      const fileId = randomUUID();
      await chunks.replaceForFile(fileId, newChunks(3));

      expect(await chunks.deleteByFile(fileId)).toBe(3);
      expect(await chunks.listByFile(fileId)).toEqual([]);
    });
  });

  describe("EmbeddingStore", () => {
    it("tracks active chunk indexes per model", async () => {
      const { chunks, embeddings } = harness.stores();
      const fileId = randomUUID();
      const stored = await chunks.replaceForFile(fileId, newChunks(3));

      const inserted = await embeddings.insertMany(
        stored.slice(0, 2).map((c) => ({
          fileId,
          chunkId: c.chunkId,
          chunkIndex: c.chunkIndex,
          vector: vectorFor(c.chunkIndex),
          embeddingModel: "text-embedding-3-large",
        })),
      );

      expect(inserted).toBe(2);
      expect([...(await embeddings.activeChunkIndexes(fileId, "text-embedding-3-large"))].sort()).toEqual([0, 1]);
      expect((await embeddings.activeChunkIndexes(fileId, "embed-v4.0")).size).toBe(0);
      expect(await embeddings.countByFile(fileId)).toBe(2);
    });

    it("rejects a second active vector for the same key and inserts nothing", async () => {
      const { chunks, embeddings } = harness.stores();
      const fileId = randomUUID();
      const [c0, c1] = await chunks.replaceForFile(fileId, newChunks(2));
      if (!c0 || !c1) throw new Error("chunks missing");

      await embeddings.insertMany([
        { fileId, chunkId: c0.chunkId, chunkIndex: 0, vector: vectorFor(0), embeddingModel: "m" },
      ]);

      await expect(
        embeddings.insertMany([
          { fileId, chunkId: c1.chunkId, chunkIndex: 1, vector: vectorFor(1), embeddingModel: "m" },
          { fileId, chunkId: c0.chunkId, chunkIndex: 0, vector: vectorFor(2), embeddingModel: "m" },
        ]),
      ).rejects.toBeInstanceOf(ConflictError);

      expect(await embeddings.countByFile(fileId)).toBe(1);
    });

    it("deactivates logically and allows re-embedding", async () => {
      const { chunks, embeddings } = harness.stores();
      const fileId = randomUUID();
      const [c0] = await chunks.replaceForFile(fileId, newChunks(1));
      if (!c0) throw new Error("chunk missing");
      const row = { fileId, chunkId: c0.chunkId, chunkIndex: 0, vector: vectorFor(0), embeddingModel: "m" };

      await embeddings.insertMany([row]);
      expect(await embeddings.deactivateByFile(fileId)).toBe(1);
      expect(await embeddings.countByFile(fileId)).toBe(0);
      expect(await embeddings.countByFile(fileId, { onlyActive: false })).toBe(1);

      await embeddings.insertMany([row]);
      expect(await embeddings.countByFile(fileId)).toBe(1);
      expect(await embeddings.countByFile(fileId, { onlyActive: false })).toBe(2);
    });

    it("keeps vectors when their chunks are replaced", async () => {
      const { chunks, embeddings } = harness.stores();
      const fileId = randomUUID();
      const [c0] = await chunks.replaceForFile(fileId, newChunks(1));
      if (!c0) throw new Error("chunk missing");
      await embeddings.insertMany([
        { fileId, chunkId: c0.chunkId, chunkIndex: 0, vector: vectorFor(0), embeddingModel: "m" },
      ]);

      await chunks.replaceForFile(fileId, newChunks(1));

      expect(await embeddings.countByFile(fileId)).toBe(1);
      expect(await embeddings.activeLinks(fileId, "m")).toEqual(new Map([[0, null]]));
    });

    it("re-links vectors to replacement chunks and switches off orphans", async () => {
      const { chunks, embeddings } = harness.stores();
      const fileId = randomUUID();
      const original = await chunks.replaceForFile(fileId, newChunks(3));
      await embeddings.insertMany(
        original.map((c) => ({
          fileId,
          chunkId: c.chunkId,
          chunkIndex: c.chunkIndex,
          vector: vectorFor(c.chunkIndex),
          embeddingModel: "m",
        })),
      );
      const replaced = await chunks.replaceForFile(fileId, newChunks(2));
      const byIndex = new Map(replaced.map((c): [number, string] => [c.chunkIndex, c.chunkId]));

      const result = await embeddings.relinkChunks(fileId, "m", byIndex);

      expect(result).toEqual({ relinked: 2, deactivated: 1 });
      expect(await embeddings.activeLinks(fileId, "m")).toEqual(byIndex);
      expect(await embeddings.countByFile(fileId)).toBe(2);
      expect(await embeddings.relinkChunks(fileId, "m", byIndex)).toEqual({ relinked: 0, deactivated: 0 });
      expect(await embeddings.relinkChunks(fileId, "other-model", byIndex)).toEqual({
        relinked: 0,
        deactivated: 0,
      });
    });
  });
});
