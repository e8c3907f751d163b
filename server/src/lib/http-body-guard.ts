import type { Context } from 'hono';

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

export function rejectOversizedBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return tooLarge(c, maxBytes);
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json({ error: 'Request body is not readable' }, 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      chunks.push(value);
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  return { ok: true, raw: Buffer.concat(chunks).toString('utf8') };
}

/**
 * Parse JSON body with an actual byte-size guard.
 * An empty body parses as `{}`; malformed JSON is a 400.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;
  const raw = read.raw;

  if (!raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON in request body' }, 400) };
  }
}

export type UploadedFileResult =
  | { ok: true; bytes: Buffer; filename: string }
  | { ok: false; response: Response };

/** Reads one file field from a multipart/form-data body. */
export async function readUploadedFile(c: Context, field: string, maxBytes: number): Promise<UploadedFileResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (!contentType.includes('multipart/form-data')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use multipart/form-data.' }, 415),
    };
  }

  const form = await c.req.parseBody({ all: true }).catch(() => null);
  if (!form) {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  const value = form[field];
  const file = Array.isArray(value) ? value.find((v) => typeof v !== 'string') : value;
  if (file === undefined || typeof file === 'string') {
    return { ok: false, response: c.json({ error: `Missing file field "${field}"` }, 400) };
  }
  if (file.size > maxBytes) return { ok: false, response: tooLarge(c, maxBytes) };
  if (file.size === 0) {
    return { ok: false, response: c.json({ error: 'Uploaded file is empty' }, 400) };
  }

  return { ok: true, bytes: Buffer.from(await file.arrayBuffer()), filename: file.name };
}
