import { describe, it, expect, beforeEach } from 'vitest';
import {
  getJobMetrics,
  recordJobFinished,
  recordJobSubmitted,
  resetJobMetricsForTest,
} from '../lib/job-metrics.js';

describe('job metrics', () => {
  beforeEach(() => {
    resetJobMetricsForTest();
  });

  it('counts submissions and rejections per controller', () => {
    recordJobSubmitted('uploads', true);
    recordJobSubmitted('uploads', true);
    recordJobSubmitted('uploads', false);
    recordJobSubmitted('extraction', true);

    expect(getJobMetrics()).toMatchObject({
      uploads: { counters: { submitted: 2, rejected: 1 } },
      extraction: { counters: { submitted: 1, rejected: 0 } },
    });
  });

  it('buckets durations and averages them', () => {
    recordJobFinished('certificates', 'succeeded', 80);
    recordJobFinished('certificates', 'failed', 700);
    recordJobFinished('certificates', 'crashed', 500_000);

    expect(getJobMetrics()).toEqual({
      certificates: {
        counters: { submitted: 0, rejected: 0, succeeded: 1, failed: 1, crashed: 1 },
        duration: {
          count: 3,
          avg_ms: 166926.67,
          buckets_ms: [100, 500, 1000, 5000, 15000, 30000, 60000, 120000],
          histogram: [1, 0, 1, 0, 0, 0, 0, 0, 1],
        },
      },
    });
  });
});
