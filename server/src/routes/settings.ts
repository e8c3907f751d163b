import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { parseJsonBodyWithLimit, readUploadedFile } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';
import { CONTENT_TYPES, TEMPLATE_KEY } from '../storage/object-store.js';
import { parseIsoDate } from '../profiles/profile.js';
import {
  CERTIFICATE_CONFIG_KEYS,
  DEFAULT_LAYOUT,
  SIGN_DATE_VALUE_KEY,
} from '../pipelines/certificate-layout.js';

const MAX_JSON_BODY_BYTES = 20_000;

const inferenceUrlSchema = z.object({
  url: z.string().trim().url().max(2_000).nullable(),
});

const configKeys = new Set<string>(CERTIFICATE_CONFIG_KEYS);

export const certificateConfigSchema = z.object({
  config: z
    .record(z.string().max(500).regex(/^[^\r\n]*$/, 'Must be a single line'))
    .superRefine((config, ctx) => {
      for (const [key, value] of Object.entries(config)) {
        if (!configKeys.has(key)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Unknown certificate config key' });
        } else if (key === SIGN_DATE_VALUE_KEY && value !== '' && !parseIsoDate(value)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Expected a YYYY-MM-DD date' });
        }
      }
    }),
});

export function createSettingsRoutes(ctx: AppContext) {
  const settings = new Hono();
  const { manager, store, config } = ctx;

  settings.get('/', (c) => c.json({
    inference_url: manager.getInferenceUrl(),
    default_inference_url: config.defaultInferenceUrl,
    certificate_config: manager.getCertificateConfig(),
    layout_defaults: DEFAULT_LAYOUT,
  }));

  settings.put('/inference-url', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, inferenceUrlSchema, parsed.data);
    if (!body.success) return body.response;

    await manager.setInferenceUrl(body.data.url);
    return c.json({ inference_url: body.data.url });
  });

  // Replaces the whole layout config; missing keys fall back to the defaults
  settings.put('/certificate-config', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, certificateConfigSchema, parsed.data);
    if (!body.success) return body.response;

    await manager.setCertificateConfig(body.data.config);
    return c.json({ certificate_config: body.data.config });
  });

  settings.get('/template', async (c) => {
    const exists = await store.exists(TEMPLATE_KEY);
    if (!exists) return c.json({ exists: false, url: null });
    const url = await store.presignedUrl(TEMPLATE_KEY, {
      expiresIn: config.presignedUrlTtlSeconds,
      disposition: 'attachment',
      filename: 'template.pptx',
    });
    return c.json({ exists: true, url });
  });

  settings.put('/template', async (c) => {
    const upload = await readUploadedFile(c, 'file', config.maxTemplateBytes);
    if (!upload.ok) return upload.response;
    if (!upload.filename.toLowerCase().endsWith('.pptx')) {
      return c.json({ error: 'Template must be a .pptx file' }, 400);
    }

    await store.put(TEMPLATE_KEY, upload.bytes, CONTENT_TYPES.pptx);
    await ctx.certificates.invalidateTemplate();
    c.get('log').info({ bytes: upload.bytes.length }, 'Certificate template replaced');
    return c.json({ exists: true });
  });

  return settings;
}
