import { describe, it, expect, vi, beforeEach } from "vitest";
import { MemoryStorage } from "@indexflow/storage";
import { ExternalServiceError, ProviderRejectedError, TimeoutError } from "@indexflow/errors";
import { AzureDocumentIntelligenceProvider } from "./azure-provider.js";
import { modelForStrategy } from "./models.js";

const ENDPOINT = "https://ocr.example.test/";
const OPERATION = "https://ocr.example.test/documentintelligence/analyzeResults/op-1";

function accepted(): Response {
  return new Response(null, { status: 202, headers: { "Operation-Location": OPERATION } });
}

function operation(body: Record<string, unknown>): Response {
  return Response.json(body);
}

const succeeded = {
  status: "succeeded",
  analyzeResult: {
    content: "Invoice 42\nTotal due",
    pages: [
      {
        pageNumber: 1,
        width: 8.5,
        height: 11,
        unit: "inch",
        lines: [{}, {}],
        words: [{ confidence: 0.5 }, { confidence: 1 }, {}],
      },
      { words: [{ confidence: 0.75 }] },
    ],
    languages: [{ locale: "en" }],
  },
};

describe("modelForStrategy", () => {
  it("maps strategies to prebuilt models", () => {
    expect(modelForStrategy("fast")).toBe("prebuilt-read");
    expect(modelForStrategy("balanced")).toBe("prebuilt-read");
    expect(modelForStrategy("accurate")).toBe("prebuilt-layout");
  });
});

describe("AzureDocumentIntelligenceProvider", () => {
  let storage: MemoryStorage;

  beforeEach(async () => {
    storage = new MemoryStorage();
    await storage.write("uploads/scan.pdf", new Uint8Array([1, 2, 3]), "application/pdf");
  });

  function provider(fetchImpl: typeof fetch, overrides: { timeoutMs?: number } = {}) {
    return new AzureDocumentIntelligenceProvider({
      endpoint: ENDPOINT,
      apiKey: "test-key",
      apiVersion: "2024-11-30",
      storage,
      pollIntervalMs: 1,
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, onRetry: () => {} },
      fetch: fetchImpl,
      ...overrides,
    });
  }

  it("submits the document and polls until the analysis succeeds", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: "running" }))
      .mockResolvedValueOnce(operation(succeeded));

    const result = await provider(fetchImpl).analyzeDocument("uploads/scan.pdf", "accurate");

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe(
      "https://ocr.example.test/documentintelligence/documentModels/prebuilt-layout:analyze?api-version=2024-11-30",
    );
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Ocp-Apim-Subscription-Key": "test-key",
      "Content-Type": "application/json",
    });
    expect(init?.body).toBe(JSON.stringify({ base64Source: "AQID" }));
    expect(fetchImpl.mock.calls[1]?.[0]).toBe(OPERATION);

    expect(result).toEqual({
      text: "Invoice 42\nTotal due",
      pages: [
        { pageNumber: 1, width: 8.5, height: 11, unit: "inch", lines: 2, words: 3 },
        { pageNumber: 2, width: null, height: null, unit: "pixel", lines: 0, words: 1 },
      ],
      confidence: 0.75,
      lang: "en",
      modelUsed: "prebuilt-layout",
    });
  });

  it("reports null confidence and language when Azure gives none", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(
        operation({ status: "succeeded", analyzeResult: { content: "", pages: [{}] } }),
      );

    const result = await provider(fetchImpl).analyzeDocument("uploads/scan.pdf", "fast");

    expect(result.confidence).toBeNull();
    expect(result.lang).toBeNull();
    expect(result.modelUsed).toBe("prebuilt-read");
  });

  it("retries a throttled submission", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(new Response("unavailable", { status: 503 }))
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation(succeeded));

    const result = await provider(fetchImpl).analyzeDocument("uploads/scan.pdf", "balanced");

    expect(result.text).toBe("Invoice 42\nTotal due");
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });

  it("fails fast on a rejected submission", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("bad key", { status: 401 }));

    const error = await provider(fetchImpl)
      .analyzeDocument("uploads/scan.pdf", "fast")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderRejectedError);
    expect(error instanceof Error ? error.message : "").toBe("azure-document-intelligence: bad key");
    expect(fetchImpl).toHaveBeenCalledOnce();
  });

  it("surfaces a failed analysis", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(
        operation({ status: "failed", error: { code: "InvalidContent", message: "corrupt file" } }),
      );

    await expect(
      provider(fetchImpl).analyzeDocument("uploads/scan.pdf", "fast"),
    ).rejects.toThrow("azure-document-intelligence: analysis failed: corrupt file");
  });

  it("rejects a submission without Operation-Location", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response(null, { status: 202 }));

    await expect(
      provider(fetchImpl).analyzeDocument("uploads/scan.pdf", "fast"),
    ).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("gives up polling after the overall timeout", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async (input) =>
      input === OPERATION ? operation({ status: "running" }) : accepted(),
    );

    await expect(
      provider(fetchImpl, { timeoutMs: 0 }).analyzeDocument("uploads/scan.pdf", "fast"),
    ).rejects.toBeInstanceOf(TimeoutError);
  });

  it("fails when the source document is missing", async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    await expect(
      provider(fetchImpl).analyzeDocument("uploads/missing.pdf", "fast"),
    ).rejects.toThrow("Object uploads/missing.pdf not found");
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
