/**
 * draftpack: assembles editor draft projects from templates and remote
 * media, archives them and ships them to object storage.
 *
 * Run directly, this starts the HTTP service. Imported, it exposes the
 * lifecycle manager and its parts for embedding.
 */

import { mkdir } from 'fs/promises';
import { loadConfig, validateConfig } from './config';
import { errorMessage } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

export async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn('Configuration warning', { warning });
  }
  if (!validation.valid) {
    throw new Error(`Invalid configuration: ${validation.errors.join('; ')}`);
  }
  setLogLevel(config.logLevel);

  const context = createAppContext(config);
  await Promise.all([
    mkdir(config.workingRoot, { recursive: true }),
    mkdir(config.artifactRoot, { recursive: true }),
    mkdir(config.bucketDir, { recursive: true }),
  ]);

  if (config.sweepOnStart) {
    await context.provisioner.sweepOrphans(context.orchestrator.activeDraftIds());
  }

  const app = createApp(context);
  app.listen(config.port, () => {
    logger.info('draftpack listening', { port: config.port, workingRoot: config.workingRoot });
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Startup failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });
}

// Public exports for programmatic use
export { createApp, createAppContext, VERSION } from './server';
export type { AppContext, AppContextOverrides } from './server';
export * from './config';
export * from './domain';
export * from './logger';
export { DraftArchiveService, fetchProgress } from './archives/draft-archive-service';
export type { SaveDraftRequest, SaveDraftResult } from './archives/draft-archive-service';
export { DataPlanePublisher } from './data-plane/publisher';
export { runBounded } from './engine/bounded-pool';
export type { Settled } from './engine/bounded-pool';
export { DraftRegistry } from './engine/draft-registry';
export type { DraftLease } from './engine/draft-registry';
export { LifecycleOrchestrator, validateLifecycleRequest } from './engine/orchestrator';
export type {
  AssetProgress,
  DraftMetadataBuilder,
  DraftMetadataContext,
  LifecycleHooks,
  LifecycleRequest,
  OrchestratorConfig,
  OrchestratorDeps,
  RunLifecycleOptions,
} from './engine/orchestrator';
export { DEFAULT_RETRY_POLICY, computeBackoff } from './engine/retry';
export type { RetryPolicy } from './engine/retry';
export * from './engine/state-machine';
export { createMemoryStore } from './storage/memory-store';
export * from './storage/object-storage';
export type { Store, ListOptions, ListResult } from './storage/store';
export { AssetFetcher } from './transfer/asset-fetcher';
export type { AssetFetcherOptions } from './transfer/asset-fetcher';
export * from './transfer/asset-transport';
export { Uploader } from './transfer/uploader';
export type { UploaderOptions } from './transfer/uploader';
export { Archiver } from './workspace/archiver';
export { DraftWorkspace } from './workspace/draft-workspace';
export type { DraftMetadata } from './workspace/draft-workspace';
export { TemplateProvisioner } from './workspace/template-provisioner';
export * from './workspace/template-store';
