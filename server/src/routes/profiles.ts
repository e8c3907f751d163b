import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../context.js';
import { parseJsonBodyWithLimit, readUploadedFile } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';
import { CONTENT_TYPES, FOLDERS, objectKey } from '../storage/object-store.js';
import { profileEditSchema } from '../profiles/profile.js';
import type { Profile } from '../profiles/profile.js';
import type { BatchReceipt } from '../manager/profile-manager.js';

const MAX_JSON_BODY_BYTES = 100_000;
const MAX_BATCH_IDS = 1_000;

export const PROFILE_ID_RE = /^(dup_[0-9a-f]{4}_)?[0-9a-f]{8}$/;

const idListSchema = z.object({
  ids: z.array(z.string().regex(PROFILE_ID_RE)).min(1).max(MAX_BATCH_IDS),
});

const combineSchema = z.object({
  ids: z.array(z.string().regex(PROFILE_ID_RE)).max(MAX_BATCH_IDS).optional(),
});

function hasCertificate(profile: Profile): boolean {
  return profile.status === 'generated' || profile.status === 'reviewed';
}

function downloadName(profile: Profile): string {
  const base = (profile.name_pinyin ?? '').replace(/[^A-Za-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
  return `${base || profile.id}.pptx`;
}

/** 202 when anything was queued; 429 when every eligible id was refused for backlog. */
function batchResponse(c: Context, receipt: BatchReceipt) {
  if (receipt.submitted.length === 0 && receipt.rejected.length > 0) {
    return c.json({ error: 'Job queue is full. Please retry shortly.', ...receipt }, 429);
  }
  return c.json(receipt, 202);
}

export function createProfileRoutes(ctx: AppContext) {
  const profiles = new Hono();
  const { manager, store, config } = ctx;

  profiles.get('/', (c) => c.json({ profiles: manager.listProfiles() }));

  // POST /profiles: multipart upload, field "file"
  profiles.post('/', async (c) => {
    const upload = await readUploadedFile(c, 'file', config.maxUploadBytes);
    if (!upload.ok) return upload.response;

    const result = await manager.createProfileFromBytes(upload.bytes);
    if (!result.accepted) {
      if (result.reason === 'backlog_full') {
        return c.json({ error: 'Upload queue is full. Please retry shortly.' }, 429);
      }
      c.get('log').error({ message: result.message }, 'Upload intake failed');
      return c.json({ error: 'Failed to accept upload' }, 500);
    }
    return c.json({ accepted: true, filename: upload.filename }, 202);
  });

  profiles.post('/extract', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, idListSchema, parsed.data);
    if (!body.success) return body.response;
    return batchResponse(c, await manager.extractProfiles(body.data.ids));
  });

  profiles.post('/certificates', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, idListSchema, parsed.data);
    if (!body.success) return body.response;
    return batchResponse(c, await manager.generateCertificates(body.data.ids));
  });

  profiles.post('/review', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, idListSchema, parsed.data);
    if (!body.success) return body.response;
    return c.json({ moved: await manager.markReviewed(body.data.ids) });
  });

  profiles.post('/unreview', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, idListSchema, parsed.data);
    if (!body.success) return body.response;
    return c.json({ moved: await manager.unmarkReviewed(body.data.ids) });
  });

  // POST /profiles/combine: one document from many certificates; defaults to every reviewed profile
  profiles.post('/combine', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, combineSchema, parsed.data);
    if (!body.success) return body.response;

    const ids = body.data.ids
      ?? manager.listProfiles().filter((p) => p.status === 'reviewed').map((p) => p.id);
    if (ids.length === 0) {
      return c.json({ error: 'No certificates to combine' }, 400);
    }

    const result = await ctx.combine(ids);
    if (!result.ok) {
      return c.json({ error: result.error.message, kind: result.error.kind }, 502);
    }
    const { document, included, skipped } = result.value;
    return c.body(new Uint8Array(document), 200, {
      'Content-Type': CONTENT_TYPES.pptx,
      'Content-Disposition': 'attachment; filename="combined_certificates.pptx"',
      'X-Combined-Included': included.join(','),
      'X-Combined-Skipped': skipped.join(','),
    });
  });

  profiles.get('/:id', async (c) => {
    const id = c.req.param('id');
    if (!PROFILE_ID_RE.test(id)) return c.json({ error: 'Invalid profile id' }, 400);
    const profile = manager.getProfile(id);
    if (!profile) return c.json({ error: 'Profile not found' }, 404);

    const expiresIn = config.presignedUrlTtlSeconds;
    const [raw, compressed] = await Promise.all([
      store.presignedUrl(objectKey(FOLDERS.raw, id), { expiresIn }),
      store.presignedUrl(objectKey(FOLDERS.compressed, id), { expiresIn }),
    ]);
    const urls: Record<string, string> = { raw_image: raw, compressed_image: compressed };
    if (hasCertificate(profile)) {
      urls.certificate = await store.presignedUrl(objectKey(FOLDERS.certificate, id), {
        expiresIn,
        disposition: 'attachment',
        filename: downloadName(profile),
      });
      urls.preview = await store.presignedUrl(objectKey(FOLDERS.preview, id), { expiresIn });
    }
    return c.json({ profile, urls });
  });

  profiles.patch('/:id', async (c) => {
    const id = c.req.param('id');
    if (!PROFILE_ID_RE.test(id)) return c.json({ error: 'Invalid profile id' }, 400);
    const parsed = await parseJsonBodyWithLimit(c, MAX_JSON_BODY_BYTES);
    if (!parsed.ok) return parsed.response;
    const body = validateBody(c, profileEditSchema, parsed.data);
    if (!body.success) return body.response;

    const updated = await manager.updateProfile(id, body.data);
    if (!updated) return c.json({ error: 'Profile not found' }, 404);
    return c.json({ profile: updated });
  });

  profiles.delete('/:id', async (c) => {
    const id = c.req.param('id');
    if (!PROFILE_ID_RE.test(id)) return c.json({ error: 'Invalid profile id' }, 400);
    const result = await manager.deleteProfile(id);
    if (!result.ok) return c.json({ error: 'Profile not found' }, 404);
    return c.json({ deleted: id });
  });

  return profiles;
}
