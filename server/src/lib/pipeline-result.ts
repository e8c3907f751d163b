export type FailureKind =
  | 'io'        // storage, network, timeouts
  | 'parse'     // malformed external response
  | 'process'   // render/convert/merge subprocess exited non-zero
  | 'batch'     // every item of a batch failed
  | 'rejected'  // admission controller refused the job
  | 'internal'; // unexpected throw inside a job

export interface PipelineFailure {
  kind: FailureKind;
  message: string;
  step?: string;
  status?: number;
  exit_code?: number | null;
  output?: string;
}

export type PipelineResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineFailure };

export function ok<T>(value: T): PipelineResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: FailureKind,
  message: string,
  extra?: Omit<PipelineFailure, 'kind' | 'message'>,
): PipelineResult<T> {
  return { ok: false, error: { kind, message, ...extra } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface PipelineStep<TContext> {
  name: string;
  run: (ctx: TContext) => Promise<PipelineResult<void>>;
}

/**
 * Runs steps in order and stops at the first failure. The failing step's name
 * is stamped on the failure unless the step already set one. A step that
 * throws is reported as an `io` failure of that step. `cleanup` always runs.
 */
export async function runSteps<TContext>(
  ctx: TContext,
  steps: ReadonlyArray<PipelineStep<TContext>>,
  cleanup: (ctx: TContext) => Promise<void>,
): Promise<PipelineResult<void>> {
  try {
    for (const step of steps) {
      let result: PipelineResult<void>;
      try {
        result = await step.run(ctx);
      } catch (err) {
        result = fail('io', errorMessage(err));
      }
      if (!result.ok) {
        return { ok: false, error: { ...result.error, step: result.error.step ?? step.name } };
      }
    }
    return ok(undefined);
  } finally {
    await cleanup(ctx);
  }
}
