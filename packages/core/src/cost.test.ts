import { describe, it, expect } from "vitest";
import { ValidationError } from "@indexflow/errors";
import {
  actualCredits,
  consumeOperationId,
  estimateCredits,
  reservationOperationId,
} from "./cost.js";
import { validateIndexingRequest } from "./request-validator.js";

describe("credit cost", () => {
  it("estimates with one page and ten chunks by default", () => {
    expect(estimateCredits({ needsOcr: false })).toEqual({
      baseCost: 10,
      ocrCost: 0,
      chunkingCost: 5,
      embeddingCost: 20,
      total: 35,
    });
    expect(estimateCredits({ needsOcr: true }).total).toBe(40);
  });

  it("uses the caller's page and chunk estimates", () => {
    expect(estimateCredits({ needsOcr: true, estimatedPages: 4, estimatedChunks: 25 }).total).toBe(
      10 + 20 + 5 + 50,
    );
    expect(estimateCredits({ needsOcr: false, estimatedPages: 4 }).ocrCost).toBe(0);
  });

  it("charges OCR pages only when OCR ran", () => {
    expect(actualCredits({ ocrPages: null, embedded: 10 })).toBe(35);
    expect(actualCredits({ ocrPages: 3, embedded: 0 })).toBe(30);
  });

  it("derives ledger ids from the job id", () => {
    expect(reservationOperationId("42")).toBe("rag_job_42");
    expect(consumeOperationId("42")).toBe("rag_job_42:consume");
  });
});

describe("validateIndexingRequest", () => {
  const valid = {
    projectId: "p",
    fileId: "f",
    userId: "u",
    mimeType: "text/plain",
    needsOcr: false,
    ocrStrategy: "fast" as const,
    sourceUri: "uploads/a.txt",
  };

  it("passes valid requests through", () => {
    expect(validateIndexingRequest(valid)).toEqual(valid);
  });

  it("collects every invalid field", () => {
    const error = (() => {
      try {
        validateIndexingRequest({ ...valid, userId: "", sourceUri: "/abs/path", estimatedPages: 0 });
      } catch (e: unknown) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError ? Object.keys(error.fields) : []).toEqual([
      "userId",
      "sourceUri",
      "estimatedPages",
    ]);
  });
});
