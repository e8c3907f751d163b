import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { combineCertificates } from '../pipelines/combine.js';
import type { CombineDeps } from '../pipelines/combine.js';
import type { ProcessResult, ProcessRunner } from '../pipelines/process-runner.js';
import { MemoryObjectStore } from '../storage/memory-object-store.js';

/** Concatenates its inputs into the output path, like a merge helper would. */
class FakeMerger implements ProcessRunner {
  args: string[] = [];
  exitCode = 0;

  async run(_command: string, args: string[]): Promise<ProcessResult> {
    this.args = args;
    if (this.exitCode !== 0) return { exitCode: this.exitCode, output: 'merge failed: bad slide layout\n' };
    const [, output, ...inputs] = args;
    const parts = await Promise.all(inputs.map((input) => readFile(input, 'utf8')));
    await writeFile(output, parts.join('|'));
    return { exitCode: 0, output: '' };
  }
}

describe('combineCertificates', () => {
  let tmpRoot: string;
  let store: MemoryObjectStore;
  let merger: FakeMerger;
  let deps: CombineDeps;

  beforeEach(async () => {
    tmpRoot = await mkdtemp(path.join(os.tmpdir(), 'combine-test-'));
    store = new MemoryObjectStore();
    await store.put('certificates/aaaaaaaa.pptx', Buffer.from('A'), 'application/octet-stream');
    await store.put('certificates/bbbbbbbb.pptx', Buffer.from('B'), 'application/octet-stream');
    merger = new FakeMerger();
    deps = {
      store,
      runner: merger,
      command: 'python3',
      mergeHelperPath: '/opt/helpers/combine_certificates.py',
      processTimeoutMs: 5_000,
      tmpRoot,
    };
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  it('merges certificates in the requested order', async () => {
    const result = await combineCertificates(deps, ['bbbbbbbb', 'aaaaaaaa']);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.document.toString()).toBe('B|A');
      expect(result.value.included).toEqual(['bbbbbbbb', 'aaaaaaaa']);
      expect(result.value.skipped).toEqual([]);
    }
    expect(merger.args[0]).toBe('/opt/helpers/combine_certificates.py');
    expect(path.basename(merger.args[1])).toBe('combined.pptx');
    expect(merger.args.slice(2).map((p) => path.basename(p))).toEqual(['input_0.pptx', 'input_1.pptx']);
  });

  it('skips certificates that cannot be downloaded', async () => {
    const result = await combineCertificates(deps, ['aaaaaaaa', 'cccccccc', 'bbbbbbbb']);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.document.toString()).toBe('A|B');
      expect(result.value.skipped).toEqual(['cccccccc']);
    }
  });

  it('fails with a batch error when nothing could be downloaded', async () => {
    const result = await combineCertificates(deps, ['cccccccc', 'dddddddd']);
    expect(result).toEqual({ ok: false, error: { kind: 'batch', message: 'No certificates could be downloaded' } });
    expect(merger.args).toEqual([]);
  });

  it('reports a failed merge as a process failure', async () => {
    merger.exitCode = 1;
    const result = await combineCertificates(deps, ['aaaaaaaa']);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'process',
        message: 'Failed to combine certificates: merge failed: bad slide layout',
        exit_code: 1,
        output: 'merge failed: bad slide layout\n',
      },
    });
  });

  it('always removes its temporary directory', async () => {
    await combineCertificates(deps, ['aaaaaaaa']);
    merger.exitCode = 1;
    await combineCertificates(deps, ['bbbbbbbb']);
    await combineCertificates(deps, ['cccccccc']);

    expect(await readdir(tmpRoot)).toEqual([]);
  });
});
