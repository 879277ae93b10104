/**
 * Lifecycle Orchestrator: drives one draft from template to uploaded archive.
 *
 * The pipeline is strictly ordered (provision, fetch, finalize, archive,
 * upload) and wrapped in a finally that always tears down the workspace and
 * the local artifact. Every call returns exactly one of a receipt or a
 * failure reason, and only after cleanup has run.
 *
 * State changes are persisted to the store and published as events. Both are
 * observational: a store or publisher failure is logged and the run goes on.
 */

import { v4 as uuid } from 'uuid';
import { ASSET_KINDS, AssetSpec, AssetStatus, AssetStatusView, AssetTask, toAssetStatusView } from '../domain/asset';
import { UploadReceipt } from '../domain/archive';
import {
  LifecycleError,
  TypedError,
  aggregateAssetFetchError,
  errorMessage,
  invalidTransitionError,
  toTypedError,
  validationError,
  workspaceAlreadyExistsError,
} from '../domain/errors';
import { DataPlaneEventType } from '../domain/events';
import {
  FailureReason,
  LifecycleResult,
  LifecycleRun,
  LifecycleStage,
  LifecycleState,
  isValidDraftId,
} from '../domain/lifecycle';
import { DataPlanePublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { AssetFetcher } from '../transfer/asset-fetcher';
import { Uploader } from '../transfer/uploader';
import { Archiver } from '../workspace/archiver';
import { DraftMetadata, DraftWorkspace, checkTargetPath } from '../workspace/draft-workspace';
import { TemplateProvisioner } from '../workspace/template-provisioner';
import { runBounded } from './bounded-pool';
import { DraftRegistry } from './draft-registry';
import { abortReason, throwIfAborted } from './retry';
import { isTerminalAssetStatus, transitionLifecycleState } from './state-machine';

/** What the metadata builder sees once every asset is in place. */
export interface DraftMetadataContext {
  draftId: string;
  workspacePath: string;
  assets: AssetStatusView[];
}

/** Supplied by the draft-editing layer; returns the finished metadata document. */
export type DraftMetadataBuilder = (context: DraftMetadataContext) => DraftMetadata | Promise<DraftMetadata>;

export interface LifecycleRequest {
  draftId: string;
  templateName: string;
  buildMetadata: DraftMetadataBuilder;
  assets: AssetSpec[];
}

export interface AssetProgress {
  total: number;
  settled: number;
  verified: number;
}

export interface LifecycleHooks {
  /** Called once per asset task when it settles, verified or failed. */
  onAssetSettled?(asset: AssetStatusView, progress: AssetProgress, run: LifecycleRun): void | Promise<void>;
}

export interface RunLifecycleOptions {
  signal?: AbortSignal;
  hooks?: LifecycleHooks;
}

export interface OrchestratorDeps {
  store: Store;
  publisher: DataPlanePublisher;
  provisioner: TemplateProvisioner;
  fetcher: AssetFetcher;
  archiver: Archiver;
  uploader: Uploader;
  registry?: DraftRegistry;
  logger?: Logger;
}

export interface OrchestratorConfig {
  /** Asset fetches allowed in flight per run. */
  fetchConcurrency: number;
}

const DEFAULT_CONFIG: OrchestratorConfig = {
  fetchConcurrency: 4,
};

const LIFECYCLE_EVENTS: Record<LifecycleState, DataPlaneEventType> = {
  [LifecycleState.Created]: 'lifecycle.created',
  [LifecycleState.Provisioned]: 'lifecycle.provisioned',
  [LifecycleState.AssetsFetching]: 'lifecycle.assets_fetching',
  [LifecycleState.MetadataFinalized]: 'lifecycle.metadata_finalized',
  [LifecycleState.Archived]: 'lifecycle.archived',
  [LifecycleState.Uploaded]: 'lifecycle.uploaded',
  [LifecycleState.Failed]: 'lifecycle.failed',
  [LifecycleState.CleanedUp]: 'lifecycle.cleaned_up',
};

/** Check a request before any resource is taken. Returns the first problem found. */
export function validateLifecycleRequest(request: LifecycleRequest): TypedError | null {
  if (typeof request.draftId !== 'string' || !isValidDraftId(request.draftId)) {
    return validationError(`Invalid draft ID: ${String(request.draftId)}`, { draftId: request.draftId }, [
      {
        type: 'FIX_DRAFT_ID',
        params: { pattern: '^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$' },
        description: 'Use letters, digits, dot, underscore and hyphen only',
      },
    ]);
  }
  if (typeof request.templateName !== 'string' || request.templateName.length === 0) {
    return validationError('templateName is required', { draftId: request.draftId });
  }
  if (typeof request.buildMetadata !== 'function') {
    return validationError('buildMetadata must be a function', { draftId: request.draftId });
  }
  if (!Array.isArray(request.assets)) {
    return validationError('assets must be an array', { draftId: request.draftId });
  }

  const seen = new Set<string>();
  for (const [index, asset] of request.assets.entries()) {
    const field = `assets[${index}]`;
    if (typeof asset.locator !== 'string' || asset.locator.trim() === '') {
      return validationError(`${field}.locator is required`, { field });
    }
    if (!ASSET_KINDS.includes(asset.kind)) {
      return validationError(`${field}.kind must be one of ${ASSET_KINDS.join(', ')}`, { field, kind: asset.kind });
    }
    const problem = typeof asset.targetPath === 'string' ? checkTargetPath(asset.targetPath) : `${field}.targetPath is required`;
    if (problem) {
      return validationError(problem, { field, targetPath: asset.targetPath });
    }
    if (asset.expectedBytes !== undefined && (!Number.isInteger(asset.expectedBytes) || asset.expectedBytes < 0)) {
      return validationError(`${field}.expectedBytes must be a non-negative integer`, { field });
    }
    const normalized = asset.targetPath.replace(/\\/g, '/');
    if (seen.has(normalized)) {
      return validationError(`Two assets share the targetPath ${asset.targetPath}`, { field, targetPath: asset.targetPath });
    }
    seen.add(normalized);
  }
  return null;
}

/** The lifecycle orchestrator. */
export class LifecycleOrchestrator {
  private config: OrchestratorConfig;
  private store: Store;
  private publisher: DataPlanePublisher;
  private provisioner: TemplateProvisioner;
  private fetcher: AssetFetcher;
  private archiver: Archiver;
  private uploader: Uploader;
  private registry: DraftRegistry;
  private log: Logger;

  constructor(deps: OrchestratorDeps, config?: Partial<OrchestratorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.store = deps.store;
    this.publisher = deps.publisher;
    this.provisioner = deps.provisioner;
    this.fetcher = deps.fetcher;
    this.archiver = deps.archiver;
    this.uploader = deps.uploader;
    this.registry = deps.registry ?? new DraftRegistry();
    this.log = (deps.logger ?? rootLogger).child({ module: 'orchestrator' });
  }

  /** Run one draft through the whole pipeline. Never throws for pipeline failures. */
  async runLifecycle(request: LifecycleRequest, options: RunLifecycleOptions = {}): Promise<LifecycleResult> {
    const now = new Date().toISOString();
    const run: LifecycleRun = {
      id: `lrun_${uuid()}`,
      draftId: request.draftId,
      templateName: request.templateName,
      state: LifecycleState.Created,
      outcome: 'pending',
      assets: [],
      transitions: [],
      createdAt: now,
      updatedAt: now,
    };
    const log = this.log.child({ runId: run.id, draftId: run.draftId });

    await this.observe(log, 'persist run', () => this.store.lifecycles.create(run));
    await this.publish(run, LIFECYCLE_EVENTS[LifecycleState.Created], log);
    log.info('Lifecycle started', { templateName: run.templateName, assetCount: Array.isArray(request.assets) ? request.assets.length : 0 });

    const invalid = validateLifecycleRequest(request);
    if (invalid) {
      return this.rejectBeforeStart(run, 'validate', invalid, log);
    }

    const lease = this.registry.acquire(request.draftId, run.id);
    if (!lease) {
      return this.rejectBeforeStart(run, 'registry', workspaceAlreadyExistsError(request.draftId), log);
    }

    const external = options.signal;
    const forwardAbort = () => {
      const reason: unknown = external?.reason;
      lease.cancel(typeof reason === 'string' ? reason : 'aborted by caller');
    };
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    let stage: LifecycleStage = 'provision';
    let workspace: DraftWorkspace | undefined;
    let receipt: UploadReceipt | undefined;
    let failure: FailureReason | undefined;

    try {
      throwIfAborted(lease.signal);
      workspace = await this.provisioner.provision(request.templateName, request.draftId);
      await this.transition(run, LifecycleState.Provisioned, log);

      stage = 'validate';
      for (const spec of request.assets) {
        workspace.addAsset(spec);
      }
      workspace.lockAssets();
      run.assets = workspace.assetStatuses();

      stage = 'fetch';
      await this.transition(run, LifecycleState.AssetsFetching, log, { assetCount: run.assets.length });
      await this.fetchAll(run, workspace, lease.signal, options.hooks, log);

      stage = 'finalize';
      throwIfAborted(lease.signal);
      const document = await request.buildMetadata({
        draftId: run.draftId,
        workspacePath: workspace.path(),
        assets: workspace.assetStatuses(),
      });
      await workspace.finalizeMetadata(document);
      await this.transition(run, LifecycleState.MetadataFinalized, log);

      stage = 'archive';
      throwIfAborted(lease.signal);
      const artifact = await this.archiver.archive(workspace);
      await this.transition(run, LifecycleState.Archived, log, {
        sizeBytes: artifact.sizeBytes,
        sha256: artifact.sha256,
      });

      stage = 'upload';
      receipt = await this.uploader.upload(artifact, lease.signal);
      run.receipt = receipt;
      await this.transition(run, LifecycleState.Uploaded, log, { key: receipt.key, url: receipt.url });
    } catch (err) {
      receipt = undefined;
      run.receipt = undefined;
      const error: TypedError = { ...toTypedError(err, run.draftId), runId: run.id };
      failure = { stage, error };
      run.failure = failure;
      if (error.code === 'RUN.CANCELED') {
        run.canceledAt = new Date().toISOString();
        const reason = error.details?.reason;
        run.cancelReason = typeof reason === 'string' ? reason : undefined;
      }
      log.error('Lifecycle failed', { stage, code: error.code, error: error.message });
      await this.transition(run, LifecycleState.Failed, log, { stage, error });
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      try {
        if (workspace) {
          await this.cleanup(run, workspace, log);
        }
      } finally {
        lease.release();
      }
      run.outcome = failure ? 'failed' : 'succeeded';
      run.completedAt = new Date().toISOString();
      await this.transition(run, LifecycleState.CleanedUp, log, { cleanupError: run.cleanupError });
    }

    return this.result(run, receipt, failure);
  }

  /** Abort the in-flight run for a draft. Resolves false when nothing is running. */
  cancel(draftId: string, reason?: string): boolean {
    const lease = this.registry.get(draftId);
    if (!lease) return false;
    this.log.info('Cancel requested', { draftId, runId: lease.runId, reason });
    lease.cancel(reason);
    return true;
  }

  activeDraftIds(): string[] {
    return this.registry.activeDraftIds();
  }

  /** Fan the asset tasks out through the bounded pool and join on all of them. */
  private async fetchAll(
    run: LifecycleRun,
    workspace: DraftWorkspace,
    signal: AbortSignal,
    hooks: LifecycleHooks | undefined,
    log: Logger,
  ): Promise<void> {
    const tasks = workspace.tasks();
    const progress: AssetProgress = { total: tasks.length, settled: 0, verified: 0 };

    const settle = async (task: AssetTask): Promise<void> => {
      progress.settled++;
      if (task.status === AssetStatus.Verified) progress.verified++;
      run.assets = workspace.assetStatuses();
      await this.publisher
        .publishAssetEvent(run, task, task.status === AssetStatus.Verified ? 'asset.verified' : 'asset.failed')
        .catch((err: unknown) => log.warn('Failed to publish asset event', { assetId: task.id, error: errorMessage(err) }));
      await this.notifyAssetSettled(hooks, task, progress, run, log);
    };

    const results = await runBounded(
      tasks,
      this.config.fetchConcurrency,
      async (task) => {
        try {
          await this.fetcher.fetch(task, workspace, signal);
        } finally {
          await settle(task);
        }
      },
      signal,
    );

    // Tasks the pool never started after an abort are still pending.
    const skipped = tasks.filter((t) => !isTerminalAssetStatus(t.status));
    for (const task of skipped) {
      task.status = AssetStatus.Failed;
      task.error = abortReason(signal).typedError;
      task.completedAt = new Date().toISOString();
      await settle(task);
    }

    await this.observe(log, 'persist run', () => this.store.lifecycles.update(run.id, { assets: run.assets }));

    if (signal.aborted) {
      throw abortReason(signal);
    }

    const failures = results.flatMap((r) => (r.status === 'rejected' ? [toTypedError(r.reason, run.draftId)] : []));
    if (failures.length > 0) {
      throw new LifecycleError(aggregateAssetFetchError(run.draftId, failures));
    }
  }

  private async notifyAssetSettled(
    hooks: LifecycleHooks | undefined,
    task: AssetTask,
    progress: AssetProgress,
    run: LifecycleRun,
    log: Logger,
  ): Promise<void> {
    if (!hooks?.onAssetSettled) return;
    try {
      await hooks.onAssetSettled(toAssetStatusView(task), { ...progress }, run);
    } catch (err) {
      log.warn('onAssetSettled hook threw', { assetId: task.id, error: errorMessage(err) });
    }
  }

  /** Remove the workspace and any artifact; failures land on the run, not the result. */
  private async cleanup(run: LifecycleRun, workspace: DraftWorkspace, log: Logger): Promise<void> {
    const problems: string[] = [];
    try {
      await this.provisioner.teardown(workspace);
    } catch (err) {
      problems.push(`workspace: ${errorMessage(err)}`);
    }
    try {
      await this.archiver.discard(run.draftId);
    } catch (err) {
      problems.push(`artifact: ${errorMessage(err)}`);
    }

    if (problems.length > 0) {
      run.cleanupError = problems.join('; ');
      log.error('Cleanup failed', { cleanupError: run.cleanupError });
    } else {
      log.debug('Cleanup complete');
    }
  }

  /** Fail a run that never took the draft ID or touched the filesystem. */
  private async rejectBeforeStart(
    run: LifecycleRun,
    stage: LifecycleStage,
    error: TypedError,
    log: Logger,
  ): Promise<LifecycleResult> {
    const failure: FailureReason = { stage, error: { ...error, runId: run.id } };
    run.failure = failure;
    run.outcome = 'failed';
    log.warn('Lifecycle rejected', { stage, code: error.code, error: error.message });
    await this.transition(run, LifecycleState.Failed, log, { stage, error: failure.error });
    run.completedAt = new Date().toISOString();
    await this.transition(run, LifecycleState.CleanedUp, log);
    return this.result(run, undefined, failure);
  }

  private result(run: LifecycleRun, receipt: UploadReceipt | undefined, failure: FailureReason | undefined): LifecycleResult {
    const snapshot = structuredClone(run);
    if (failure) return { ok: false, failure, run: snapshot };
    if (receipt) return { ok: true, receipt, run: snapshot };
    throw new LifecycleError(toTypedError(new Error('Run ended with neither a receipt nor a failure'), run.draftId));
  }

  private async transition(
    run: LifecycleRun,
    target: LifecycleState,
    log: Logger,
    payload: Record<string, unknown> = {},
  ): Promise<void> {
    const result = transitionLifecycleState(run.state, target);
    if (!result.success) {
      throw new LifecycleError(
        result.error ?? invalidTransitionError(run.state, target, []),
      );
    }

    const at = new Date().toISOString();
    run.transitions.push({ from: run.state, to: target, at });
    log.info('Lifecycle transition', { from: run.state, to: target });
    run.state = target;
    run.updatedAt = at;

    await this.observe(log, 'persist run', () => this.store.lifecycles.update(run.id, run));
    await this.publish(run, LIFECYCLE_EVENTS[target], log, payload);
  }

  private async publish(
    run: LifecycleRun,
    eventType: DataPlaneEventType,
    log: Logger,
    payload?: Record<string, unknown>,
  ): Promise<void> {
    await this.observe(log, `publish ${eventType}`, () => this.publisher.publishLifecycleEvent(run, eventType, payload));
  }

  /** Run a side effect whose failure must not change the run's outcome. */
  private async observe(log: Logger, what: string, effect: () => Promise<unknown>): Promise<void> {
    try {
      await effect();
    } catch (err) {
      log.error(`Failed to ${what}`, { error: errorMessage(err) });
    }
  }
}
