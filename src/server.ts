/**
 * Express server configuration.
 *
 * Assembles the service graph from a config and mounts the API with its
 * error handling. Tests pass overrides to swap storage, transports and
 * templates for in-process stand-ins.
 */

import express from 'express';
import { DraftArchiveService } from './archives/draft-archive-service';
import { createArchiveRoutes } from './api/archives';
import { createDraftRoutes } from './api/drafts';
import { errorHandler } from './api/middleware';
import { DraftpackConfig, createConfig } from './config';
import { DataPlanePublisher } from './data-plane/publisher';
import { DraftRegistry } from './engine/draft-registry';
import { LifecycleOrchestrator } from './engine/orchestrator';
import { RetryPolicy } from './engine/retry';
import { Logger, logger as rootLogger } from './logger';
import { createMemoryStore } from './storage/memory-store';
import { FileSystemObjectStorage, ObjectStorageClient } from './storage/object-storage';
import { Store } from './storage/store';
import { AssetFetcher } from './transfer/asset-fetcher';
import { AssetTransport, DefaultAssetTransport } from './transfer/asset-transport';
import { Uploader } from './transfer/uploader';
import { Archiver } from './workspace/archiver';
import { TemplateProvisioner } from './workspace/template-provisioner';
import { FileSystemTemplateStore, TemplateStore, metadataFileFor } from './workspace/template-store';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: DraftpackConfig;
  store: Store;
  publisher: DataPlanePublisher;
  registry: DraftRegistry;
  templates: TemplateStore;
  provisioner: TemplateProvisioner;
  fetcher: AssetFetcher;
  archiver: Archiver;
  storage: ObjectStorageClient;
  uploader: Uploader;
  orchestrator: LifecycleOrchestrator;
  archives: DraftArchiveService;
}

/** Replaceable collaborators. */
export interface AppContextOverrides {
  store?: Store;
  storage?: ObjectStorageClient;
  transport?: AssetTransport;
  templates?: TemplateStore;
  logger?: Logger;
  /** Jitter source for backoff. */
  random?: () => number;
}

/** Create the application context with all services. */
export function createAppContext(
  config: DraftpackConfig = createConfig(),
  overrides: AppContextOverrides = {},
): AppContext {
  const log = overrides.logger ?? rootLogger;
  const store = overrides.store ?? createMemoryStore();
  const publisher = new DataPlanePublisher(store, log);
  const registry = new DraftRegistry();

  const templates = overrides.templates ?? new FileSystemTemplateStore(
    config.templateRoot,
    config.templateNames.map((name) => ({ name, metadataFile: metadataFileFor(name) })),
  );
  const provisioner = new TemplateProvisioner(templates, config.workingRoot, log);

  const backoff = (maxAttempts: number): RetryPolicy => ({
    maxAttempts,
    backoffBaseMs: config.backoffBaseMs,
    backoffMaxMs: config.backoffMaxMs,
  });
  const fetcher = new AssetFetcher(
    overrides.transport ?? new DefaultAssetTransport(),
    { retry: backoff(config.fetchMaxAttempts), attemptTimeoutMs: config.fetchTimeoutMs, random: overrides.random },
    log,
  );
  const archiver = new Archiver(config.artifactRoot, log);
  const storage = overrides.storage ?? new FileSystemObjectStorage(config.bucketDir, config.publicBaseUrl);
  const uploader = new Uploader(
    storage,
    {
      retry: backoff(config.uploadMaxAttempts),
      keyPrefix: config.keyPrefix,
      publicBaseUrl: config.publicBaseUrl,
      random: overrides.random,
    },
    log,
  );

  const orchestrator = new LifecycleOrchestrator(
    { store, publisher, provisioner, fetcher, archiver, uploader, registry, logger: log },
    { fetchConcurrency: config.fetchConcurrency },
  );
  const archives = new DraftArchiveService(store, orchestrator, storage, log);

  return {
    config,
    store,
    publisher,
    registry,
    templates,
    provisioner,
    fetcher,
    archiver,
    storage,
    uploader,
    orchestrator,
    archives,
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      activeDrafts: ctx.registry.size,
    });
  });

  const v1 = express.Router();
  v1.use('/', createDraftRoutes(ctx.store, ctx.orchestrator, ctx.archives, ctx.publisher));
  v1.use('/archives', createArchiveRoutes(ctx.archives));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
