/**
 * Service configuration.
 *
 * Read once from the environment at startup, then validated. Validation
 * reports every problem at once; startup refuses to run while there are errors.
 *
 * Usage:
 *   const config = loadConfig(process.env);
 *   const result = validateConfig(config);
 *   if (!result.valid) throw new Error(result.errors.join('; '));
 */

import os from 'os';
import path from 'path';
import { LogLevel, parseLogLevel } from './logger';

export interface DraftpackConfig {
  port: number;
  workingRoot: string;
  artifactRoot: string;
  templateRoot: string;
  templateNames: string[];
  fetchConcurrency: number;
  fetchMaxAttempts: number;
  fetchTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  uploadMaxAttempts: number;
  bucketDir: string;
  keyPrefix: string;
  publicBaseUrl?: string;
  sweepOnStart: boolean;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Fields that must be positive integers. */
const INTEGER_FIELDS = [
  'port',
  'fetchConcurrency',
  'fetchMaxAttempts',
  'fetchTimeoutMs',
  'backoffBaseMs',
  'backoffMaxMs',
  'uploadMaxAttempts',
] as const;

export function createConfig(overrides?: Partial<DraftpackConfig>): DraftpackConfig {
  const base = path.join(os.tmpdir(), 'draftpack');
  return {
    port: 5000,
    workingRoot: path.join(base, 'work'),
    artifactRoot: path.join(base, 'artifacts'),
    templateRoot: path.resolve('templates'),
    templateNames: ['template', 'template_capcut'],
    fetchConcurrency: 4,
    fetchMaxAttempts: 3,
    fetchTimeoutMs: 180_000,
    backoffBaseMs: 1000,
    backoffMaxMs: 30_000,
    uploadMaxAttempts: 3,
    bucketDir: path.join(base, 'bucket'),
    keyPrefix: 'drafts',
    sweepOnStart: true,
    logLevel: LogLevel.Info,
    ...overrides,
  };
}

/** Integer from the environment. Garbage becomes NaN so validation can name it. */
function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
}

function readBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

function readList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/** Build a config from environment variables over the defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DraftpackConfig {
  const overrides: Partial<DraftpackConfig> = {};
  const set = <K extends keyof DraftpackConfig>(key: K, value: DraftpackConfig[K] | undefined): void => {
    if (value !== undefined) overrides[key] = value;
  };

  set('port', readInt(env.PORT));
  set('workingRoot', env.DRAFTPACK_WORKING_ROOT ? path.resolve(env.DRAFTPACK_WORKING_ROOT) : undefined);
  set('artifactRoot', env.DRAFTPACK_ARTIFACT_ROOT ? path.resolve(env.DRAFTPACK_ARTIFACT_ROOT) : undefined);
  set('templateRoot', env.DRAFTPACK_TEMPLATE_ROOT ? path.resolve(env.DRAFTPACK_TEMPLATE_ROOT) : undefined);
  set('templateNames', readList(env.DRAFTPACK_TEMPLATES));
  set('fetchConcurrency', readInt(env.DRAFTPACK_FETCH_CONCURRENCY));
  set('fetchMaxAttempts', readInt(env.DRAFTPACK_FETCH_MAX_ATTEMPTS));
  set('fetchTimeoutMs', readInt(env.DRAFTPACK_FETCH_TIMEOUT_MS));
  set('backoffBaseMs', readInt(env.DRAFTPACK_BACKOFF_BASE_MS));
  set('backoffMaxMs', readInt(env.DRAFTPACK_BACKOFF_MAX_MS));
  set('uploadMaxAttempts', readInt(env.DRAFTPACK_UPLOAD_MAX_ATTEMPTS));
  set('bucketDir', env.DRAFTPACK_BUCKET_DIR ? path.resolve(env.DRAFTPACK_BUCKET_DIR) : undefined);
  set('keyPrefix', env.DRAFTPACK_KEY_PREFIX);
  set('publicBaseUrl', env.DRAFTPACK_PUBLIC_BASE_URL || undefined);
  set('sweepOnStart', readBool(env.DRAFTPACK_SWEEP_ON_START));
  set('logLevel', parseLogLevel(env.DRAFTPACK_LOG_LEVEL));

  return createConfig(overrides);
}

/** Directories whose contents must survive a sweep of workingRoot. */
const PROTECTED_ROOTS = ['artifactRoot', 'bucketDir', 'templateRoot'] as const;

function isInside(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/** Validate a configuration for consistency. */
export function validateConfig(config: DraftpackConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const field of INTEGER_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${field} must be a positive integer`);
    }
  }

  if (config.port > 65535) {
    errors.push('port must be at most 65535');
  }
  if (config.backoffBaseMs > config.backoffMaxMs) {
    warnings.push('backoffBaseMs exceeds backoffMaxMs; every delay will be capped');
  }
  // The startup sweep removes everything under workingRoot.
  for (const field of PROTECTED_ROOTS) {
    if (path.resolve(config.workingRoot) === path.resolve(config[field])) {
      errors.push(`workingRoot and ${field} must be different directories`);
    } else if (isInside(config[field], config.workingRoot)) {
      errors.push(`${field} must not be inside workingRoot`);
    }
  }
  if (config.templateNames.length === 0) {
    errors.push('At least one template name is required');
  }
  if (config.publicBaseUrl !== undefined) {
    try {
      const url = new URL(config.publicBaseUrl);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        errors.push(`publicBaseUrl must use http or https, got: ${url.protocol}`);
      }
    } catch {
      errors.push(`publicBaseUrl is not a valid URL: ${config.publicBaseUrl}`);
    }
  }
  if (!config.sweepOnStart) {
    warnings.push('Orphaned workspaces will not be removed at startup');
  }

  return { valid: errors.length === 0, errors, warnings };
}
