import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createApp } from '../app.js';
import { createAppContext } from '../context.js';
import type { AppContext } from '../context.js';
import { loadConfig } from '../lib/config.js';
import type { ProcessResult, ProcessRunner } from '../pipelines/process-runner.js';
import { MemoryObjectStore } from '../storage/memory-object-store.js';
import { STATE_KEY } from '../storage/object-store.js';
import { serializeState } from '../profiles/snapshot.js';
import { contentIdOfBuffer } from '../profiles/content-id.js';
import type { Profile, ProfileStatus } from '../profiles/profile.js';

/** Merge helper stand-in: joins its inputs into the output file. */
const mergeRunner: ProcessRunner = {
  async run(_command: string, args: string[]): Promise<ProcessResult> {
    const [, output, ...inputs] = args;
    const parts = await Promise.all(inputs.map((input) => readFile(input, 'utf8')));
    await writeFile(output, parts.join('+'));
    return { exitCode: 0, output: '' };
  },
};

function stored(id: string, status: ProfileStatus, extra: Partial<Profile> = {}): Profile {
  return { id, name_cn: null, name_pinyin: null, birthday: null, baptism_date: null, status, ...extra };
}

function jsonRequest(method: string, body: unknown): RequestInit {
  return { method, body: JSON.stringify(body), headers: { 'Content-Type': 'application/json' } };
}

function fileForm(content: string, filename: string): FormData {
  const form = new FormData();
  form.append('file', new Blob([content]), filename);
  return form;
}

describe('HTTP routes', () => {
  let workDir: string;
  let store: MemoryObjectStore;
  let ctx: AppContext;
  let state: { shuttingDown: boolean; loaded: boolean };
  let app: ReturnType<typeof createApp>;

  async function seed(profiles: Profile[]) {
    await store.put(
      STATE_KEY,
      Buffer.from(serializeState({ profiles, inference_url: null, certificate_config: {} })),
      'application/json',
    );
    await ctx.manager.load();
  }

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'routes-test-'));
    store = new MemoryObjectStore();
    const config = loadConfig({ NODE_ENV: 'test', STORAGE_DRIVER: 'memory', WORK_DIR: workDir });
    ctx = createAppContext(config, {
      store,
      runner: mergeRunner,
      compress: async () => Buffer.from('small'),
      fetch: async () => new Response('not used in these tests', { status: 500 }),
    });
    state = { shuttingDown: false, loaded: true };
    app = createApp(ctx, {
      isShuttingDown: () => state.shuttingDown,
      isStateLoaded: () => state.loaded,
    });
  });

  afterEach(async () => {
    await ctx.manager.settle();
    await rm(workDir, { recursive: true, force: true });
  });

  // ─── Operational ────────────────────────────────────────────────────

  describe('operational endpoints', () => {
    it('returns no-store and security headers on /health', async () => {
      const res = await app.request('http://test/health');
      expect(res.status).toBe(200);
      expect(res.headers.get('cache-control')).toBe('no-store');
      expect(res.headers.get('x-content-type-options')).toBe('nosniff');
      expect(res.headers.get('x-frame-options')).toBe('DENY');
      expect(res.headers.get('strict-transport-security')).toBeNull();
      expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
      const body = await res.json() as { status: string };
      expect(body.status).toBe('ok');
    });

    it('is not ready until state has loaded', async () => {
      state.loaded = false;
      const res = await app.request('http://test/ready');
      expect(res.status).toBe(503);
      const body = await res.json() as { ready: boolean; storage_ok: boolean; state_loaded: boolean };
      expect(body).toMatchObject({ ready: false, storage_ok: true, state_loaded: false });
    });

    it('is ready once loaded', async () => {
      const res = await app.request('http://test/ready');
      expect(res.status).toBe(200);
    });

    it('reports controller status on /metrics', async () => {
      const res = await app.request('http://test/metrics');
      const body = await res.json() as { controllers: Array<{ name: string; capacity: number }> };
      expect(body.controllers.map((c) => [c.name, c.capacity])).toEqual([
        ['uploads', 3],
        ['extraction', 2],
        ['certificates', 3],
      ]);
    });

    it('refuses API calls while shutting down but keeps /health', async () => {
      state.shuttingDown = true;
      expect((await app.request('http://test/api/profiles')).status).toBe(503);
      const health = await app.request('http://test/health');
      expect(await health.json()).toMatchObject({ status: 'draining', shutting_down: true });
    });

    it('answers unknown routes with 404 JSON', async () => {
      const res = await app.request('http://test/api/nothing-here');
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not found' });
    });
  });

  // ─── Profiles ───────────────────────────────────────────────────────

  describe('profiles', () => {
    it('accepts an upload and lists the new profile once it lands', async () => {
      const res = await app.request('http://test/api/profiles', {
        method: 'POST',
        body: fileForm('form image bytes', 'scan.jpg'),
      });
      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ accepted: true, filename: 'scan.jpg' });

      await ctx.manager.settle();
      const list = await app.request('http://test/api/profiles');
      const body = await list.json() as { profiles: Profile[] };
      expect(body.profiles).toEqual([stored(contentIdOfBuffer(Buffer.from('form image bytes')), 'uploaded')]);
    });

    it('returns presigned urls with the profile', async () => {
      await seed([stored('aaaaaaaa', 'uploaded')]);
      const res = await app.request('http://test/api/profiles/aaaaaaaa');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        profile: stored('aaaaaaaa', 'uploaded'),
        urls: {
          raw_image: 'memory://objects/raw_images/aaaaaaaa.jpg?expires_in=600',
          compressed_image: 'memory://objects/compressed_images/aaaaaaaa.jpg?expires_in=600',
        },
      });
    });

    it('adds certificate links once a certificate exists', async () => {
      await seed([stored('aaaaaaaa', 'generated', { name_pinyin: 'Sun, JianFen' })]);
      const res = await app.request('http://test/api/profiles/aaaaaaaa');
      const body = await res.json() as { urls: Record<string, string> };
      expect(body.urls.certificate)
        .toBe('memory://objects/certificates/aaaaaaaa.pptx?expires_in=600&download=Sun_JianFen.pptx');
      expect(body.urls.preview).toBe('memory://objects/certificate_previews/aaaaaaaa.png?expires_in=600');
    });

    it('validates profile ids', async () => {
      expect((await app.request('http://test/api/profiles/not-an-id')).status).toBe(400);
      expect((await app.request('http://test/api/profiles/ffffffff')).status).toBe(404);
    });

    it('applies edits and rejects unknown fields', async () => {
      await seed([stored('aaaaaaaa', 'extracted')]);

      const bad = await app.request('http://test/api/profiles/aaaaaaaa', jsonRequest('PATCH', { status: 'reviewed' }));
      expect(bad.status).toBe(400);

      const res = await app.request('http://test/api/profiles/aaaaaaaa', jsonRequest('PATCH', { birthday: '1990-07-01' }));
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ profile: stored('aaaaaaaa', 'extracted', { birthday: '1990-07-01' }) });
    });

    it('deletes profiles', async () => {
      await seed([stored('aaaaaaaa', 'uploaded')]);
      const res = await app.request('http://test/api/profiles/aaaaaaaa', { method: 'DELETE' });
      expect(res.status).toBe(200);
      expect(ctx.manager.listProfiles()).toEqual([]);
      expect((await app.request('http://test/api/profiles/aaaaaaaa', { method: 'DELETE' })).status).toBe(404);
    });

    it('requires at least one id for batch operations', async () => {
      const res = await app.request('http://test/api/profiles/extract', jsonRequest('POST', { ids: [] }));
      expect(res.status).toBe(400);
    });

    it('reports which ids a batch submitted and skipped', async () => {
      await seed([stored('aaaaaaaa', 'uploaded'), stored('bbbbbbbb', 'generated')]);
      const res = await app.request(
        'http://test/api/profiles/certificates',
        jsonRequest('POST', { ids: ['aaaaaaaa', 'bbbbbbbb'] }),
      );
      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ submitted: ['bbbbbbbb'], rejected: [], skipped: ['aaaaaaaa'] });
    });

    it('toggles review status', async () => {
      await seed([stored('aaaaaaaa', 'generated')]);
      const marked = await app.request('http://test/api/profiles/review', jsonRequest('POST', { ids: ['aaaaaaaa'] }));
      expect(await marked.json()).toEqual({ moved: ['aaaaaaaa'] });
      const unmarked = await app.request('http://test/api/profiles/unreview', jsonRequest('POST', { ids: ['aaaaaaaa'] }));
      expect(await unmarked.json()).toEqual({ moved: ['aaaaaaaa'] });
      expect(ctx.manager.getProfile('aaaaaaaa')?.status).toBe('generated');
    });

    it('combines every reviewed certificate by default', async () => {
      await seed([stored('aaaaaaaa', 'reviewed'), stored('bbbbbbbb', 'generated'), stored('cccccccc', 'reviewed')]);
      await store.put('certificates/aaaaaaaa.pptx', Buffer.from('A'), 'application/octet-stream');
      await store.put('certificates/cccccccc.pptx', Buffer.from('C'), 'application/octet-stream');

      const res = await app.request('http://test/api/profiles/combine', jsonRequest('POST', {}));
      expect(res.status).toBe(200);
      expect(res.headers.get('content-disposition')).toBe('attachment; filename="combined_certificates.pptx"');
      expect(res.headers.get('x-combined-included')).toBe('aaaaaaaa,cccccccc');
      expect(await res.text()).toBe('A+C');
    });

    it('refuses to combine when nothing is reviewed', async () => {
      await seed([stored('aaaaaaaa', 'generated')]);
      const res = await app.request('http://test/api/profiles/combine', jsonRequest('POST', {}));
      expect(res.status).toBe(400);
    });

    it('answers 502 when no certificate could be fetched', async () => {
      const res = await app.request('http://test/api/profiles/combine', jsonRequest('POST', { ids: ['aaaaaaaa'] }));
      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: 'No certificates could be downloaded', kind: 'batch' });
    });
  });

  // ─── Settings ───────────────────────────────────────────────────────

  describe('settings', () => {
    it('stores a valid inference url and rejects junk', async () => {
      const bad = await app.request('http://test/api/settings/inference-url', jsonRequest('PUT', { url: 'not a url' }));
      expect(bad.status).toBe(400);

      const res = await app.request('http://test/api/settings/inference-url', jsonRequest('PUT', { url: 'http://gpu.test:9000' }));
      expect(res.status).toBe(200);
      expect(ctx.manager.getInferenceUrl()).toBe('http://gpu.test:9000');
    });

    it('validates certificate config keys and the sign date', async () => {
      const unknown = await app.request(
        'http://test/api/settings/certificate-config',
        jsonRequest('PUT', { config: { footer: 'left=1' } }),
      );
      expect(unknown.status).toBe(400);

      const badDate = await app.request(
        'http://test/api/settings/certificate-config',
        jsonRequest('PUT', { config: { sign_date_value: '2024-02-30' } }),
      );
      expect(badDate.status).toBe(400);

      const multiLine = await app.request(
        'http://test/api/settings/certificate-config',
        jsonRequest('PUT', { config: { name: 'left=1\ntxt injected' } }),
      );
      expect(multiLine.status).toBe(400);

      const res = await app.request(
        'http://test/api/settings/certificate-config',
        jsonRequest('PUT', { config: { name: 'left=2 top=1', sign_date_value: '2024-12-25' } }),
      );
      expect(res.status).toBe(200);
      expect(ctx.manager.getCertificateConfig()).toEqual({ name: 'left=2 top=1', sign_date_value: '2024-12-25' });
    });

    it('returns defaults alongside the current settings', async () => {
      const res = await app.request('http://test/api/settings');
      const body = await res.json() as { inference_url: string | null; default_inference_url: string; layout_defaults: Record<string, string> };
      expect(body.inference_url).toBeNull();
      expect(body.default_inference_url).toBe('http://localhost:8000');
      expect(body.layout_defaults.headshot).toBe('left=5 top=1 w=3');
    });

    it('uploads a template and links to it', async () => {
      const missing = await app.request('http://test/api/settings/template');
      expect(await missing.json()).toEqual({ exists: false, url: null });

      const wrongType = await app.request('http://test/api/settings/template', {
        method: 'PUT',
        body: fileForm('slides', 'template.key'),
      });
      expect(wrongType.status).toBe(400);

      const res = await app.request('http://test/api/settings/template', {
        method: 'PUT',
        body: fileForm('slides', 'Certificate.pptx'),
      });
      expect(res.status).toBe(200);
      expect((await store.get('template.pptx')).toString()).toBe('slides');

      const linked = await app.request('http://test/api/settings/template');
      expect(await linked.json()).toEqual({
        exists: true,
        url: 'memory://objects/template.pptx?expires_in=600&download=template.pptx',
      });
    });
  });
});
