import { z } from 'zod';
import { createProfileLogger } from '../lib/logger.js';
import { errorMessage, fail, ok } from '../lib/pipeline-result.js';
import type { PipelineResult } from '../lib/pipeline-result.js';
import type { JobRunner } from '../runtime/admission-controller.js';
import { parseIsoDate } from '../profiles/profile.js';
import type { ExtractedFields } from '../profiles/profile.js';
import { normalizePinyin } from '../profiles/pinyin.js';

export interface ExtractionPayload {
  profileId: string;
  /** Inference service base URL; the default applies when null. */
  baseUrl: string | null;
}

export interface ExtractionDeps {
  defaultBaseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const textField = z.string().nullable().optional().transform((v) => v ?? null);

export const extractionResponseSchema = z.object({
  parse_ocr_result: z.object({
    name_cn: textField,
    name_pinyin: textField,
    birthday: textField,
    baptism_date: textField,
  }),
});

const MAX_LOGGED_BODY = 2_000;

export function extractEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/extract`;
}

export function createExtractionRunner(deps: ExtractionDeps): JobRunner<ExtractionPayload, ExtractedFields> {
  return (payload) => extractProfileFields(deps, payload);
}

/**
 * Asks the inference service to read the scanned form for one profile and
 * returns the normalized fields. One request, no retries.
 */
export async function extractProfileFields(
  deps: ExtractionDeps,
  payload: ExtractionPayload,
): Promise<PipelineResult<ExtractedFields>> {
  const fetchImpl = deps.fetch ?? fetch;
  const url = extractEndpoint(payload.baseUrl ?? deps.defaultBaseUrl);
  const log = createProfileLogger(payload.profileId, { pipeline: 'extraction' });
  log.info({ url }, 'Sending extraction request');

  let res: Response;
  try {
    res = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ filename: `${payload.profileId}.jpg` }),
      signal: AbortSignal.timeout(deps.timeoutMs),
    });
  } catch (err) {
    log.error({ err: errorMessage(err) }, 'Extraction request failed');
    return fail('io', `Inference request failed: ${errorMessage(err)}`);
  }

  let body: string;
  try {
    body = await res.text();
  } catch (err) {
    return fail('io', `Failed to read inference response: ${errorMessage(err)}`, { status: res.status });
  }

  if (res.status !== 200) {
    log.error({ status: res.status, body: body.slice(0, MAX_LOGGED_BODY) }, 'Unexpected inference status');
    return fail('io', `Inference service returned ${res.status}`, {
      status: res.status,
      output: body.slice(0, MAX_LOGGED_BODY),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return fail('parse', 'Inference response is not valid JSON', { output: body.slice(0, MAX_LOGGED_BODY) });
  }

  const parsed = extractionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail('parse', `Inference response has unexpected shape: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }

  const result = parsed.data.parse_ocr_result;
  const fields: ExtractedFields = {
    name_cn: result.name_cn,
    name_pinyin: normalizePinyin(result.name_pinyin),
    birthday: parseIsoDate(result.birthday),
    baptism_date: parseIsoDate(result.baptism_date),
  };
  log.info({ fields }, 'Extraction succeeded');
  return ok(fields);
}
