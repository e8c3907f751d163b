/**
 * Certificate Pipeline: renders one profile's certificate and its preview.
 *
 * Steps run strictly in order and the first failure ends the chain. Scratch
 * files are named by profile id inside a shared working directory, and are
 * removed whether the chain succeeded or not. The admission controller runs
 * this with `exclusiveIds`, so two jobs never share a profile's scratch files.
 */

import { copyFile, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createProfileLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { fail, ok, runSteps } from '../lib/pipeline-result.js';
import type { PipelineResult, PipelineStep } from '../lib/pipeline-result.js';
import type { JobRunner } from '../runtime/admission-controller.js';
import { CONTENT_TYPES, FOLDERS, TEMPLATE_KEY, objectKey } from '../storage/object-store.js';
import type { ObjectStore } from '../storage/object-store.js';
import type { Profile } from '../profiles/profile.js';
import type { CertificateConfig } from '../profiles/snapshot.js';
import {
  TEMPLATE_FILE,
  buildRenderInstructions,
  headshotFileName,
  instructionFileName,
  outputFileName,
} from './certificate-layout.js';
import type { ProcessRunner } from './process-runner.js';

export interface CertificatePayload {
  profile: Profile;
  config: CertificateConfig;
}

export interface CertificateDeps {
  store: ObjectStore;
  runner: ProcessRunner;
  workDir: string;
  renderCommand: string;
  renderHelperPath: string;
  convertCommand: string;
  processTimeoutMs: number;
  now?: () => Date;
}

interface ChainContext {
  profile: Profile;
  config: CertificateConfig;
  log: Logger;
}

const MAX_FAILURE_OUTPUT = 4_000;

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export class CertificatePipeline {
  private readonly deps: CertificateDeps;

  constructor(deps: CertificateDeps) {
    this.deps = deps;
  }

  get runner(): JobRunner<CertificatePayload, void> {
    return (payload) => this.generate(payload);
  }

  /** Drops the cached template so the next job downloads a fresh one. */
  async invalidateTemplate(): Promise<void> {
    await rm(this.scratch(TEMPLATE_FILE), { force: true });
  }

  async generate(payload: CertificatePayload): Promise<PipelineResult<void>> {
    const { profile, config } = payload;
    const ctx: ChainContext = {
      profile,
      config,
      log: createProfileLogger(profile.id, { pipeline: 'certificate' }),
    };

    const steps: Array<PipelineStep<ChainContext>> = [
      { name: 'prepare_workspace', run: () => this.prepareWorkspace(profile.id) },
      { name: 'fetch_template', run: (c) => this.fetchTemplate(c) },
      { name: 'fetch_headshot', run: (c) => this.fetchHeadshot(c) },
      { name: 'render', run: (c) => this.render(c) },
      { name: 'convert_preview', run: (c) => this.convertPreview(c) },
      {
        name: 'upload_certificate',
        run: (c) => this.uploadArtifact(objectKey(FOLDERS.certificate, c.profile.id), outputFileName(c.profile.id, 'pptx'), CONTENT_TYPES.pptx),
      },
      {
        name: 'upload_preview',
        run: (c) => this.uploadArtifact(objectKey(FOLDERS.preview, c.profile.id), outputFileName(c.profile.id, 'png'), CONTENT_TYPES.png),
      },
    ];

    const result = await runSteps(ctx, steps, (c) => this.cleanup(c));
    if (result.ok) {
      ctx.log.info('Certificate generated');
    } else {
      ctx.log.error({ step: result.error.step, error: result.error.message }, 'Certificate generation failed');
    }
    return result;
  }

  // ─── Steps ──────────────────────────────────────────────────────────

  private scratch(fileName: string): string {
    return path.join(this.deps.workDir, fileName);
  }

  private async prepareWorkspace(id: string): Promise<PipelineResult<void>> {
    await mkdir(this.deps.workDir, { recursive: true });
    if (!(await fileExists(this.deps.renderHelperPath))) {
      return fail('io', `Render helper not found at ${this.deps.renderHelperPath}`);
    }
    // Copy beside, then rename, so a job already running the helper never reads a half-written file
    const dest = this.scratch(path.basename(this.deps.renderHelperPath));
    const staging = `${dest}.${id}.tmp`;
    await copyFile(this.deps.renderHelperPath, staging);
    await rename(staging, dest);
    return ok(undefined);
  }

  private async fetchTemplate(ctx: ChainContext): Promise<PipelineResult<void>> {
    const dest = this.scratch(TEMPLATE_FILE);
    if (await fileExists(dest)) return ok(undefined);

    ctx.log.info('Downloading certificate template');
    const body = await this.deps.store.get(TEMPLATE_KEY);
    const staging = `${dest}.${ctx.profile.id}.tmp`;
    await writeFile(staging, body);
    await rename(staging, dest);
    return ok(undefined);
  }

  private async fetchHeadshot(ctx: ChainContext): Promise<PipelineResult<void>> {
    const body = await this.deps.store.get(objectKey(FOLDERS.headshot, ctx.profile.id));
    await writeFile(this.scratch(headshotFileName(ctx.profile.id)), body);
    return ok(undefined);
  }

  private async render(ctx: ChainContext): Promise<PipelineResult<void>> {
    const now = this.deps.now?.() ?? new Date();
    const instructions = buildRenderInstructions(ctx.profile, ctx.config, now);
    const inputPath = this.scratch(instructionFileName(ctx.profile.id));
    await writeFile(inputPath, instructions, 'utf8');

    const helper = this.scratch(path.basename(this.deps.renderHelperPath));
    const result = await this.deps.runner.run(this.deps.renderCommand, [helper, inputPath], {
      cwd: this.deps.workDir,
      timeoutMs: this.deps.processTimeoutMs,
    });
    ctx.log.debug({ output: result.output }, 'Render process finished');
    if (result.exitCode !== 0) {
      return fail('process', `Render process exited with ${result.exitCode ?? 'no exit code'}`, {
        exit_code: result.exitCode,
        output: result.output.slice(-MAX_FAILURE_OUTPUT),
      });
    }
    return ok(undefined);
  }

  private async convertPreview(ctx: ChainContext): Promise<PipelineResult<void>> {
    const id = ctx.profile.id;
    const result = await this.deps.runner.run(
      this.deps.convertCommand,
      ['--headless', '--convert-to', 'png', outputFileName(id, 'pptx')],
      { cwd: this.deps.workDir, timeoutMs: this.deps.processTimeoutMs },
    );
    if (result.exitCode !== 0) {
      return fail('process', `Preview conversion exited with ${result.exitCode ?? 'no exit code'}`, {
        exit_code: result.exitCode,
        output: result.output.slice(-MAX_FAILURE_OUTPUT),
      });
    }

    const expected = this.scratch(outputFileName(id, 'png'));
    if (await fileExists(expected)) return ok(undefined);

    // The converter may number the page: output_<id>_1.png
    const paged = this.scratch(`output_${id}_1.png`);
    if (await fileExists(paged)) {
      ctx.log.info('Renaming page-numbered preview');
      await rename(paged, expected);
      return ok(undefined);
    }
    return fail('io', `Preview not found at ${expected} or ${paged}`);
  }

  private async uploadArtifact(key: string, fileName: string, contentType: string): Promise<PipelineResult<void>> {
    const body = await readFile(this.scratch(fileName));
    await this.deps.store.put(key, body, contentType);
    return ok(undefined);
  }

  private async cleanup(ctx: ChainContext): Promise<void> {
    const id = ctx.profile.id;
    const files = [
      headshotFileName(id),
      instructionFileName(id),
      outputFileName(id, 'pptx'),
      outputFileName(id, 'png'),
      `output_${id}_1.png`,
    ];
    const results = await Promise.allSettled(files.map((f) => rm(this.scratch(f), { force: true })));
    const failed = results.filter((r) => r.status === 'rejected').length;
    if (failed > 0) {
      ctx.log.warn({ failed }, 'Some scratch files could not be removed');
    }
  }
}
