import { PhaseError } from "@indexflow/errors";
import type { EventLog } from "@indexflow/db";
import type { Logger } from "@indexflow/logger";
import { progressForPhase, type PipelinePhase } from "@indexflow/types";

export type ExecutablePhase = Exclude<PipelinePhase, "ready">;

export interface PhaseContext {
  jobId: string;
  fileId: string;
  events: EventLog;
  logger: Logger;
}

export interface PhaseOutcome {
  message: string;
  payload: Record<string, unknown>;
}

/**
 * Brackets a phase with its timeline events. Any failure is recorded as
 * `phase_failed` and rethrown as a PhaseError tagged with the phase.
 */
export async function runPhase<T>(
  phase: ExecutablePhase,
  ctx: PhaseContext,
  work: () => Promise<T>,
  describe: (result: T) => PhaseOutcome,
): Promise<T> {
  const log = ctx.logger.child({ phase });
  log.info("phase started");
  await ctx.events.append({
    jobId: ctx.jobId,
    eventType: "phase_started",
    phase,
    message: `Starting ${phase} for file ${ctx.fileId}`,
  });

  let result: T;
  try {
    result = await work();
  } catch (error: unknown) {
    const failure = error instanceof PhaseError ? error : new PhaseError(phase, error);
    log.error({ err: error }, "phase failed");
    try {
      await ctx.events.append({
        jobId: ctx.jobId,
        eventType: "phase_failed",
        phase,
        message: failure.message,
        payload: { code: failure.code },
      });
    } catch (logError: unknown) {
      log.error({ err: logError }, "could not record phase failure");
    }
    throw failure;
  }

  const outcome = describe(result);
  await ctx.events.append({
    jobId: ctx.jobId,
    eventType: "phase_completed",
    phase,
    progressPct: progressForPhase(phase),
    message: outcome.message,
    payload: outcome.payload,
  });
  log.info(outcome.payload, "phase completed");
  return result;
}
