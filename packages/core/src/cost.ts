export const CREDIT_COSTS = {
  base: 10,
  ocrPerPage: 5,
  chunking: 5,
  perEmbedding: 2,
} as const;

export const DEFAULT_ESTIMATED_PAGES = 1;
export const DEFAULT_ESTIMATED_CHUNKS = 10;

export interface CreditEstimate {
  baseCost: number;
  ocrCost: number;
  chunkingCost: number;
  embeddingCost: number;
  total: number;
}

export interface EstimateInput {
  needsOcr: boolean;
  estimatedPages?: number;
  estimatedChunks?: number;
}

export function estimateCredits(input: EstimateInput): CreditEstimate {
  const pages = input.estimatedPages ?? DEFAULT_ESTIMATED_PAGES;
  const chunks = input.estimatedChunks ?? DEFAULT_ESTIMATED_CHUNKS;
  const baseCost = CREDIT_COSTS.base;
  const ocrCost = input.needsOcr ? CREDIT_COSTS.ocrPerPage * pages : 0;
  const chunkingCost = CREDIT_COSTS.chunking;
  const embeddingCost = CREDIT_COSTS.perEmbedding * chunks;
  return {
    baseCost,
    ocrCost,
    chunkingCost,
    embeddingCost,
    total: baseCost + ocrCost + chunkingCost + embeddingCost,
  };
}

export interface UsageInput {
  /** Pages the OCR phase reported, or null when OCR did not run. */
  ocrPages: number | null;
  embedded: number;
}

/** Credits for the work actually performed. */
export function actualCredits(usage: UsageInput): number {
  return (
    CREDIT_COSTS.base +
    (usage.ocrPages === null ? 0 : CREDIT_COSTS.ocrPerPage * usage.ocrPages) +
    CREDIT_COSTS.chunking +
    CREDIT_COSTS.perEmbedding * usage.embedded
  );
}

export function reservationOperationId(jobId: string): string {
  return `rag_job_${jobId}`;
}

export function consumeOperationId(jobId: string): string {
  return `${reservationOperationId(jobId)}:consume`;
}
