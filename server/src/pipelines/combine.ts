import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import logger from '../lib/logger.js';
import { errorMessage, fail, ok } from '../lib/pipeline-result.js';
import type { PipelineResult } from '../lib/pipeline-result.js';
import { FOLDERS, objectKey } from '../storage/object-store.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { ProcessRunner } from './process-runner.js';

export interface CombineDeps {
  store: ObjectStore;
  runner: ProcessRunner;
  command: string;
  mergeHelperPath: string;
  processTimeoutMs: number;
  tmpRoot?: string;
}

export interface CombinedCertificates {
  document: Buffer;
  included: string[];
  skipped: string[];
}

/**
 * Downloads each profile's certificate and merges them, in the given order,
 * into one document. Certificates that cannot be downloaded are skipped; the
 * batch fails only when none could be downloaded.
 */
export async function combineCertificates(
  deps: CombineDeps,
  profileIds: string[],
): Promise<PipelineResult<CombinedCertificates>> {
  const log = logger.child({ pipeline: 'combine', count: profileIds.length });
  const root = deps.tmpRoot ?? os.tmpdir();
  await mkdir(root, { recursive: true });
  const workDir = await mkdtemp(path.join(root, 'combine-certs-'));

  try {
    const inputs: string[] = [];
    const included: string[] = [];
    const skipped: string[] = [];

    for (const [index, id] of profileIds.entries()) {
      try {
        const body = await deps.store.get(objectKey(FOLDERS.certificate, id));
        const inputPath = path.join(workDir, `input_${index}.pptx`);
        await writeFile(inputPath, body);
        inputs.push(inputPath);
        included.push(id);
      } catch (err) {
        log.warn({ profileId: id, error: errorMessage(err) }, 'Skipping certificate that could not be downloaded');
        skipped.push(id);
      }
    }

    if (inputs.length === 0) {
      return fail('batch', 'No certificates could be downloaded');
    }

    const outputPath = path.join(workDir, 'combined.pptx');
    const result = await deps.runner.run(deps.command, [deps.mergeHelperPath, outputPath, ...inputs], {
      timeoutMs: deps.processTimeoutMs,
    });
    if (result.exitCode !== 0) {
      log.error({ exitCode: result.exitCode, output: result.output }, 'Failed to combine certificates');
      return fail('process', `Failed to combine certificates: ${result.output.trim()}`, {
        exit_code: result.exitCode,
        output: result.output,
      });
    }

    let document: Buffer;
    try {
      document = await readFile(outputPath);
    } catch (err) {
      return fail('io', `Merge output missing: ${errorMessage(err)}`);
    }
    log.info({ included: included.length, skipped: skipped.length }, 'Combined certificates');
    return ok({ document, included, skipped });
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
