import path from 'node:path';
import type { AppConfig } from './lib/config.js';
import { createServiceClient } from './lib/supabase.js';
import type { PipelineResult } from './lib/pipeline-result.js';
import { AdmissionController } from './runtime/admission-controller.js';
import type { ObjectStore } from './storage/object-store.js';
import { MemoryObjectStore } from './storage/memory-object-store.js';
import { SupabaseObjectStore } from './storage/supabase-object-store.js';
import type { SuffixGenerator } from './profiles/content-id.js';
import { createUploadRunner } from './pipelines/upload.js';
import { createExtractionRunner } from './pipelines/extraction.js';
import { CertificatePipeline } from './pipelines/certificate.js';
import { combineCertificates } from './pipelines/combine.js';
import type { CombinedCertificates } from './pipelines/combine.js';
import { sharpCompressor } from './pipelines/image-compressor.js';
import type { ImageCompressor } from './pipelines/image-compressor.js';
import { spawnProcessRunner } from './pipelines/process-runner.js';
import type { ProcessRunner } from './pipelines/process-runner.js';
import { ProfileManager } from './manager/profile-manager.js';

export interface AppContext {
  config: AppConfig;
  store: ObjectStore;
  manager: ProfileManager;
  certificates: CertificatePipeline;
  combine(profileIds: string[]): Promise<PipelineResult<CombinedCertificates>>;
}

/** Replaceable collaborators; tests swap in fakes for the outside world. */
export interface ContextOverrides {
  store?: ObjectStore;
  runner?: ProcessRunner;
  compress?: ImageCompressor;
  fetch?: typeof fetch;
  suffix?: SuffixGenerator;
  now?: () => Date;
}

export function createObjectStore(config: AppConfig): ObjectStore {
  if (config.storage.driver === 'supabase') {
    const client = createServiceClient(config.storage.url, config.storage.serviceKey);
    return new SupabaseObjectStore(client, config.storage.bucket);
  }
  return new MemoryObjectStore();
}

/** Wires the store, the three pipelines and their controllers around one ProfileManager. */
export function createAppContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  const store = overrides.store ?? createObjectStore(config);
  const runner = overrides.runner ?? spawnProcessRunner;

  const certificates = new CertificatePipeline({
    store,
    runner,
    workDir: path.join(config.workDir, 'certificates'),
    renderCommand: config.renderCommand,
    renderHelperPath: config.renderHelperPath,
    convertCommand: config.convertCommand,
    processTimeoutMs: config.processTimeoutMs,
    now: overrides.now,
  });

  const manager = new ProfileManager({
    store,
    stagingDir: path.join(config.workDir, 'staging'),
    suffix: overrides.suffix,
    controllers: (ids) => ({
      uploads: new AdmissionController({
        name: 'uploads',
        capacity: config.concurrency.uploads,
        maxBacklog: config.maxBacklog,
        run: createUploadRunner({ store, compress: overrides.compress ?? sharpCompressor, ids }),
      }),
      extraction: new AdmissionController({
        name: 'extraction',
        capacity: config.concurrency.extraction,
        maxBacklog: config.maxBacklog,
        run: createExtractionRunner({
          defaultBaseUrl: config.defaultInferenceUrl,
          timeoutMs: config.inferenceTimeoutMs,
          fetch: overrides.fetch,
        }),
      }),
      certificates: new AdmissionController({
        name: 'certificates',
        capacity: config.concurrency.certificates,
        maxBacklog: config.maxBacklog,
        exclusiveIds: true,
        run: certificates.runner,
      }),
    }),
  });

  return {
    config,
    store,
    manager,
    certificates,
    combine: (profileIds) =>
      combineCertificates(
        {
          store,
          runner,
          command: config.renderCommand,
          mergeHelperPath: config.mergeHelperPath,
          processTimeoutMs: config.processTimeoutMs,
          tmpRoot: config.workDir,
        },
        profileIds,
      ),
  };
}
