import { z } from "zod";
import { ValidationError } from "@indexflow/errors";
import { isStorageUri } from "@indexflow/storage";
import { OCR_STRATEGIES, type IndexingRequest } from "@indexflow/types";

const id = z.string().trim().min(1, "is required");

const indexingRequestSchema = z.object({
  projectId: id,
  fileId: id,
  userId: id,
  mimeType: z.string().trim().min(1, "is required"),
  needsOcr: z.boolean(),
  ocrStrategy: z.enum(OCR_STRATEGIES),
  sourceUri: z.string().refine(isStorageUri, "must be a bucket/path URI"),
  estimatedPages: z.number().int().positive().optional(),
  estimatedChunks: z.number().int().nonnegative().optional(),
});

/**
 * Rejects malformed requests before anything is written.
 */
export function validateIndexingRequest(request: IndexingRequest): IndexingRequest {
  const parsed = indexingRequestSchema.safeParse(request);
  if (parsed.success) {
    return parsed.data;
  }

  const fields: Record<string, string> = {};
  for (const issue of parsed.error.issues) {
    const key = issue.path.join(".") || "request";
    fields[key] ??= issue.message;
  }
  const summary = Object.entries(fields)
    .map(([field, message]) => `${field} ${message}`)
    .join("; ");
  throw new ValidationError(`Invalid indexing request: ${summary}`, fields);
}
