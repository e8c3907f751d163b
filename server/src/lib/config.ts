import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.preprocess(
    (raw) => {
      if (raw === undefined || raw === '') return fallback;
      const parsed = Number.parseInt(String(raw), 10);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
    },
    z.number().int().positive(),
  );

const optionalString = z.preprocess(
  (raw) => (typeof raw === 'string' && raw.trim() === '' ? undefined : raw),
  z.string().optional(),
);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  STORAGE_DRIVER: z.enum(['supabase', 'memory']).optional(),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  STORAGE_BUCKET: z.string().default('certificate-desk'),
  WORK_DIR: z.string().default(path.join(os.tmpdir(), 'certificate-desk')),
  RENDER_COMMAND: z.string().default('python3'),
  RENDER_HELPER_PATH: optionalString,
  MERGE_HELPER_PATH: optionalString,
  CONVERT_COMMAND: z.string().default('soffice'),
  DEFAULT_INFERENCE_URL: z.string().url().default('http://localhost:8000'),
  INFERENCE_TIMEOUT_MS: positiveInt(30_000),
  PROCESS_TIMEOUT_MS: positiveInt(120_000),
  UPLOAD_CONCURRENCY: positiveInt(3),
  EXTRACTION_CONCURRENCY: positiveInt(2),
  CERTIFICATE_CONCURRENCY: positiveInt(3),
  MAX_BACKLOG: positiveInt(1000),
  PRESIGNED_URL_TTL_SECONDS: positiveInt(600),
  MAX_UPLOAD_BYTES: positiveInt(10_000_000),
  MAX_TEMPLATE_BYTES: positiveInt(20_000_000),
  ALLOWED_ORIGINS: optionalString,
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  storage:
    | { driver: 'supabase'; url: string; serviceKey: string; bucket: string }
    | { driver: 'memory' };
  workDir: string;
  renderCommand: string;
  renderHelperPath: string;
  mergeHelperPath: string;
  convertCommand: string;
  defaultInferenceUrl: string;
  inferenceTimeoutMs: number;
  processTimeoutMs: number;
  concurrency: { uploads: number; extraction: number; certificates: number };
  maxBacklog: number;
  presignedUrlTtlSeconds: number;
  maxUploadBytes: number;
  maxTemplateBytes: number;
  allowedOrigins: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads and validates service configuration from environment variables.
 * Supabase storage is used whenever credentials are present, unless
 * STORAGE_DRIVER pins a driver explicitly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  const isProduction = e.NODE_ENV === 'production';

  const driver = e.STORAGE_DRIVER ?? (e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY ? 'supabase' : 'memory');
  let storage: AppConfig['storage'];
  if (driver === 'supabase') {
    if (!e.SUPABASE_URL || !e.SUPABASE_SERVICE_ROLE_KEY) {
      throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY environment variables are required for supabase storage');
    }
    storage = { driver, url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_ROLE_KEY, bucket: e.STORAGE_BUCKET };
  } else {
    if (isProduction) {
      throw new ConfigError('In-memory storage is not allowed in production');
    }
    storage = { driver };
  }

  // The helper scripts ship separately; only development falls back to ./helpers
  if (isProduction && (!e.RENDER_HELPER_PATH || !e.MERGE_HELPER_PATH)) {
    throw new ConfigError('RENDER_HELPER_PATH and MERGE_HELPER_PATH must point at the certificate helper scripts in production');
  }

  const allowedOrigins = e.ALLOWED_ORIGINS
    ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
    : isProduction
      ? []
      : ['http://localhost:5173', 'http://localhost:5174'];

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    storage,
    workDir: e.WORK_DIR,
    renderCommand: e.RENDER_COMMAND,
    renderHelperPath: e.RENDER_HELPER_PATH ?? path.resolve('helpers/render_certificate.py'),
    mergeHelperPath: e.MERGE_HELPER_PATH ?? path.resolve('helpers/combine_certificates.py'),
    convertCommand: e.CONVERT_COMMAND,
    defaultInferenceUrl: e.DEFAULT_INFERENCE_URL,
    inferenceTimeoutMs: e.INFERENCE_TIMEOUT_MS,
    processTimeoutMs: e.PROCESS_TIMEOUT_MS,
    concurrency: {
      uploads: e.UPLOAD_CONCURRENCY,
      extraction: e.EXTRACTION_CONCURRENCY,
      certificates: e.CERTIFICATE_CONCURRENCY,
    },
    maxBacklog: e.MAX_BACKLOG,
    presignedUrlTtlSeconds: e.PRESIGNED_URL_TTL_SECONDS,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    maxTemplateBytes: e.MAX_TEMPLATE_BYTES,
    allowedOrigins,
  };
}
