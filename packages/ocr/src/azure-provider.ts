import { z } from "zod";
import {
  AppError,
  ExternalServiceError,
  TimeoutError,
  fromUpstreamStatus,
  parseRetryAfter,
  withRetry,
  type RetryOptions,
} from "@indexflow/errors";
import type { IStorage } from "@indexflow/storage";
import type { OcrPage, OcrResult, OcrStrategy } from "@indexflow/types";
import type { IOcrProvider } from "./ocr-provider.interface.js";
import { modelForStrategy } from "./models.js";

const SERVICE = "azure-document-intelligence";
const DEFAULT_API_VERSION = "2024-11-30";

const wordSchema = z.object({ confidence: z.number().optional() });

const pageSchema = z.object({
  pageNumber: z.number().int().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  unit: z.string().optional(),
  lines: z.array(z.unknown()).default([]),
  words: z.array(wordSchema).default([]),
});

const analyzeOperationSchema = z.object({
  status: z.enum(["notStarted", "running", "succeeded", "failed", "canceled"]),
  error: z.object({ code: z.string().optional(), message: z.string().optional() }).optional(),
  analyzeResult: z
    .object({
      content: z.string().default(""),
      pages: z.array(pageSchema).default([]),
      languages: z.array(z.object({ locale: z.string() })).default([]),
    })
    .optional(),
});

type AnalyzeOperation = z.infer<typeof analyzeOperationSchema>;
type AnalyzeResult = NonNullable<AnalyzeOperation["analyzeResult"]>;

export interface AzureOcrConfig {
  endpoint: string;
  apiKey: string;
  apiVersion?: string;
  /** Source documents are read from here and sent inline as base64. */
  storage: IStorage;
  /** Budget for the whole analysis, polling included. Default: 300000 */
  timeoutMs?: number;
  /** Budget for a single HTTP request. Default: 30000 */
  requestTimeoutMs?: number;
  /** Default: 2000 */
  pollIntervalMs?: number;
  retry?: RetryOptions;
  fetch?: typeof fetch;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Azure Document Intelligence over its REST API: submit the document,
 * then poll the Operation-Location until the analysis settles.
 */
export class AzureDocumentIntelligenceProvider implements IOcrProvider {
  readonly name = SERVICE;
  private readonly endpoint: string;
  private readonly apiVersion: string;
  private readonly timeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: AzureOcrConfig) {
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.timeoutMs = config.timeoutMs ?? 300_000;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000;
    this.pollIntervalMs = config.pollIntervalMs ?? 2_000;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async analyzeDocument(fileUri: string, strategy: OcrStrategy): Promise<OcrResult> {
    const model = modelForStrategy(strategy);
    const bytes = await this.config.storage.read(fileUri);
    const deadline = Date.now() + this.timeoutMs;

    const operationLocation = await withRetry(
      () => this.startAnalysis(model, bytes),
      this.config.retry,
    );
    const result = await this.pollUntilSettled(operationLocation, deadline);
    return toOcrResult(result, model);
  }

  private async startAnalysis(model: string, bytes: Uint8Array): Promise<string> {
    const url =
      `${this.endpoint}/documentintelligence/documentModels/${encodeURIComponent(model)}:analyze` +
      `?api-version=${encodeURIComponent(this.apiVersion)}`;
    const response = await this.request(url, {
      method: "POST",
      headers: this.headers({ "Content-Type": "application/json" }),
      body: JSON.stringify({ base64Source: Buffer.from(bytes).toString("base64") }),
    });
    const location = response.headers.get("operation-location");
    if (!location) {
      throw new ExternalServiceError(`${SERVICE}: response is missing Operation-Location`, SERVICE);
    }
    return location;
  }

  private async pollUntilSettled(
    operationLocation: string,
    deadline: number,
  ): Promise<AnalyzeResult> {
    for (;;) {
      const response = await withRetry(
        () => this.request(operationLocation, { method: "GET", headers: this.headers() }),
        this.config.retry,
      );
      const operation = await parseOperation(response);

      switch (operation.status) {
        case "succeeded":
          if (!operation.analyzeResult) {
            throw new ExternalServiceError(`${SERVICE}: succeeded without a result`, SERVICE);
          }
          return operation.analyzeResult;
        case "failed":
        case "canceled":
          throw new ExternalServiceError(
            `${SERVICE}: analysis ${operation.status}: ${operation.error?.message ?? "no details"}`,
            SERVICE,
            { details: { status: operation.status, code: operation.error?.code } },
          );
        case "notStarted":
        case "running":
          break;
      }

      if (Date.now() + this.pollIntervalMs > deadline) {
        throw new TimeoutError(
          `${SERVICE}: analysis did not finish within ${String(this.timeoutMs)}ms`,
        );
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return { "Ocp-Apim-Subscription-Key": this.config.apiKey, ...extra };
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error: unknown) {
      throw toNetworkError(error);
    }
    if (!response.ok) {
      const body = await response.text();
      throw fromUpstreamStatus(
        SERVICE,
        response.status,
        body.slice(0, 500) || response.statusText,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }
    return response;
  }
}

function toNetworkError(error: unknown): AppError {
  if (error instanceof Error && error.name === "TimeoutError") {
    return new TimeoutError(`${SERVICE}: request timed out`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`${SERVICE}: ${message}`, SERVICE, { cause: error });
}

async function parseOperation(response: Response): Promise<AnalyzeOperation> {
  const parsed = analyzeOperationSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ExternalServiceError(`${SERVICE}: unexpected analyze response`, SERVICE, {
      details: { issues: parsed.error.issues.map((issue) => issue.message) },
    });
  }
  return parsed.data;
}

function toOcrResult(result: AnalyzeResult, model: string): OcrResult {
  const pages: OcrPage[] = result.pages.map((page, i) => ({
    pageNumber: page.pageNumber ?? i + 1,
    width: page.width ?? null,
    height: page.height ?? null,
    unit: page.unit ?? "pixel",
    lines: page.lines.length,
    words: page.words.length,
  }));

  const confidences = result.pages.flatMap((page) =>
    page.words.flatMap((word) => (word.confidence === undefined ? [] : [word.confidence])),
  );
  const confidence =
    confidences.length > 0
      ? confidences.reduce((sum, value) => sum + value, 0) / confidences.length
      : null;

  return {
    text: result.content,
    pages,
    confidence,
    lang: result.languages[0]?.locale ?? null,
    modelUsed: model,
  };
}
