export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderName = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  database: DatabaseConfig;
  redis: RedisConfig;
  storage: StorageConfig;
  embeddings: EmbeddingsConfig;
  ocr: OcrConfig;
  chunking: ChunkingDefaults;
  providers: ProviderPolicyConfig;
  credits: CreditsConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface StorageConfig {
  root: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimension: number;
  openaiApiKey: string;
  cohereApiKey: string;
}

export interface OcrConfig {
  endpoint: string | null;
  apiKey: string | null;
  apiVersion: string;
}

export interface ChunkingDefaults {
  maxTokens: number;
  overlap: number;
}

export interface ProviderPolicyConfig {
  maxRetries: number;
  timeoutMs: number;
}

export interface CreditsConfig {
  reservationTtlMinutes: number;
}

export interface WorkerConfig {
  concurrency: number;
}
