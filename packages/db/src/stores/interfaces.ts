import type {
  Chunk,
  IndexingJob,
  JobEvent,
  JobListOptions,
  JobStatus,
  NewChunk,
  NewEmbedding,
  NewIndexingJob,
  NewJobEvent,
  PipelinePhase,
} from "@indexflow/types";

export interface JobStore {
  /** Throws ConflictError when the file already has a queued or running job. */
  create(input: NewIndexingJob): Promise<IndexingJob>;
  getById(jobId: string): Promise<IndexingJob | null>;
  listByProject(projectId: string, options?: JobListOptions): Promise<IndexingJob[]>;
  /** Persists the phase and the progress that goes with it. */
  updatePhase(jobId: string, phase: PipelinePhase): Promise<IndexingJob>;
  /** Throws InvalidTransitionError for moves the state machine forbids. */
  updateStatus(jobId: string, status: JobStatus): Promise<IndexingJob>;
}

export interface EventLog {
  append(event: NewJobEvent): Promise<JobEvent>;
  timeline(jobId: string): Promise<JobEvent[]>;
  countByJob(jobId: string): Promise<number>;
}

export interface ChunkStore {
  /**
   * Deletes every chunk of the file, then inserts `chunks`, as one unit.
   * Throws ConflictError on a repeated chunk index and leaves the old set.
   * Vectors of deleted chunks lose their `chunkId`.
   */
  replaceForFile(fileId: string, chunks: NewChunk[]): Promise<Chunk[]>;
  listByFile(fileId: string): Promise<Chunk[]>;
  getByIds(chunkIds: string[]): Promise<Chunk[]>;
  countByFile(fileId: string): Promise<number>;
  deleteByFile(fileId: string): Promise<number>;
}

export interface EmbeddingCountOptions {
  /** Default: true */
  onlyActive?: boolean;
}

export interface ChunkLinkResult {
  relinked: number;
  deactivated: number;
}

export interface EmbeddingStore {
  /** Inserts all rows or none. Returns the number inserted. */
  insertMany(embeddings: NewEmbedding[]): Promise<number>;
  activeChunkIndexes(fileId: string, model: string): Promise<Set<number>>;
  /** Chunk index to linked chunk id of the file's active vectors for `model`. */
  activeLinks(fileId: string, model: string): Promise<Map<number, string | null>>;
  /**
   * Points each active vector for `model` at the chunk now holding its index
   * and switches off vectors whose index has no chunk any more.
   */
  relinkChunks(
    fileId: string,
    model: string,
    chunkIdsByIndex: ReadonlyMap<number, string>,
  ): Promise<ChunkLinkResult>;
  countByFile(fileId: string, options?: EmbeddingCountOptions): Promise<number>;
  /** Logical deletion; returns how many vectors were switched off. */
  deactivateByFile(fileId: string): Promise<number>;
}

export interface IndexStores {
  jobs: JobStore;
  events: EventLog;
  chunks: ChunkStore;
  embeddings: EmbeddingStore;
}

export const DEFAULT_JOB_LIST_LIMIT = 50;
