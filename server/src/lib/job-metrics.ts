const DURATION_BUCKETS_MS = [100, 500, 1000, 5000, 15000, 30000, 60000, 120000];

interface JobCounters {
  submitted: number;
  rejected: number;
  succeeded: number;
  failed: number;
  crashed: number;
}

interface ControllerMetrics {
  counters: JobCounters;
  durationCount: number;
  durationSumMs: number;
  histogram: number[];
}

const byController = new Map<string, ControllerMetrics>();

function metricsFor(controller: string): ControllerMetrics {
  let entry = byController.get(controller);
  if (!entry) {
    entry = {
      counters: { submitted: 0, rejected: 0, succeeded: 0, failed: 0, crashed: 0 },
      durationCount: 0,
      durationSumMs: 0,
      histogram: new Array<number>(DURATION_BUCKETS_MS.length + 1).fill(0),
    };
    byController.set(controller, entry);
  }
  return entry;
}

export function recordJobSubmitted(controller: string, accepted: boolean): void {
  const entry = metricsFor(controller);
  if (accepted) entry.counters.submitted += 1;
  else entry.counters.rejected += 1;
}

export type JobOutcomeLabel = 'succeeded' | 'failed' | 'crashed';

export function recordJobFinished(controller: string, outcome: JobOutcomeLabel, durationMs: number): void {
  const entry = metricsFor(controller);
  entry.counters[outcome] += 1;
  entry.durationCount += 1;
  entry.durationSumMs += durationMs;
  const idx = DURATION_BUCKETS_MS.findIndex((limit) => durationMs <= limit);
  entry.histogram[idx >= 0 ? idx : DURATION_BUCKETS_MS.length] += 1;
}

export function getJobMetrics() {
  const result: Record<string, unknown> = {};
  for (const [controller, entry] of byController) {
    result[controller] = {
      counters: { ...entry.counters },
      duration: {
        count: entry.durationCount,
        avg_ms: entry.durationCount > 0
          ? Math.round((entry.durationSumMs / entry.durationCount) * 100) / 100
          : 0,
        buckets_ms: DURATION_BUCKETS_MS,
        histogram: [...entry.histogram],
      },
    };
  }
  return result;
}

export function resetJobMetricsForTest(): void {
  byController.clear();
}
