/**
 * Draft API routes.
 *
 * POST /drafts/:draftId/archive  Run the archive lifecycle for a draft
 * POST /drafts/:draftId/cancel   Cancel the in-flight run for a draft
 * GET  /drafts/:draftId/runs     Lifecycle runs for a draft, newest first
 * GET  /runs/:runId              One lifecycle run
 * GET  /runs/:runId/events       Events published for a run
 */

import { Router } from 'express';
import { ASSET_KINDS, AssetKind, AssetSpec } from '../domain/asset';
import { apiError, LifecycleError, notFoundError, validationError } from '../domain/errors';
import { DataPlanePublisher } from '../data-plane/publisher';
import { LifecycleOrchestrator } from '../engine/orchestrator';
import { DraftArchiveService, SaveDraftRequest } from '../archives/draft-archive-service';
import { Store } from '../storage/store';
import { getHttpStatus, isRecord, queryInt, sendError } from './middleware';

function isAssetKind(value: unknown): value is AssetKind {
  return ASSET_KINDS.some((kind) => kind === value);
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new LifecycleError(validationError(`${field} must be a string`, { field }));
  }
  return value;
}

function parseAsset(value: unknown, index: number): AssetSpec {
  const field = `assets[${index}]`;
  if (!isRecord(value)) {
    throw new LifecycleError(validationError(`${field} must be an object`, { field }));
  }
  const { locator, kind, targetPath, expectedBytes } = value;
  if (typeof locator !== 'string' || locator.length === 0) {
    throw new LifecycleError(validationError(`${field}.locator is required`, { field }));
  }
  if (!isAssetKind(kind)) {
    throw new LifecycleError(
      validationError(`${field}.kind must be one of ${ASSET_KINDS.join(', ')}`, { field, kind }),
    );
  }
  if (typeof targetPath !== 'string' || targetPath.length === 0) {
    throw new LifecycleError(validationError(`${field}.targetPath is required`, { field }));
  }
  if (expectedBytes !== undefined && (typeof expectedBytes !== 'number' || !Number.isInteger(expectedBytes) || expectedBytes < 0)) {
    throw new LifecycleError(validationError(`${field}.expectedBytes must be a non-negative integer`, { field }));
  }
  return { locator, kind, targetPath, expectedBytes };
}

/** Validate an archive request body. */
export function parseArchiveBody(draftId: string, body: unknown): Omit<SaveDraftRequest, 'signal'> {
  if (!isRecord(body)) {
    throw new LifecycleError(validationError('Request body must be a JSON object'));
  }

  const templateName = body.templateName;
  if (typeof templateName !== 'string' || templateName.length === 0) {
    throw new LifecycleError(validationError('templateName is required', { field: 'templateName' }));
  }

  const metadata = body.metadata ?? {};
  if (!isRecord(metadata)) {
    throw new LifecycleError(validationError('metadata must be a JSON object', { field: 'metadata' }));
  }

  const rawAssets = body.assets ?? [];
  if (!Array.isArray(rawAssets)) {
    throw new LifecycleError(validationError('assets must be an array', { field: 'assets' }));
  }

  const draftVersion = body.draftVersion;
  if (draftVersion !== undefined && (typeof draftVersion !== 'number' || !Number.isInteger(draftVersion) || draftVersion < 0)) {
    throw new LifecycleError(validationError('draftVersion must be a non-negative integer', { field: 'draftVersion' }));
  }

  return {
    draftId,
    templateName,
    metadata,
    assets: rawAssets.map(parseAsset),
    draftVersion,
    userId: optionalString(body, 'userId'),
    userName: optionalString(body, 'userName'),
    archiveName: optionalString(body, 'archiveName'),
  };
}

export function createDraftRoutes(
  store: Store,
  orchestrator: LifecycleOrchestrator,
  archives: DraftArchiveService,
  publisher: DataPlanePublisher,
): Router {
  const router = Router();

  /**
   * POST /drafts/:draftId/archive
   * Provision, fetch, archive and upload. Responds once cleanup has run.
   */
  router.post('/drafts/:draftId/archive', async (req, res) => {
    try {
      const request = parseArchiveBody(req.params.draftId, req.body);

      // A client that goes away cancels its run.
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort('client disconnected');
      });

      const result = await archives.saveDraft({ ...request, signal: controller.signal });
      if (!result.ok) {
        res.status(getHttpStatus(result.failure.error)).json({
          ...apiError(result.failure.error),
          stage: result.failure.stage,
          archive: result.archive,
          run: result.run,
        });
        return;
      }
      if (result.reused) {
        res.json({ archive: result.archive, reused: true });
        return;
      }
      res.status(201).json({ receipt: result.receipt, archive: result.archive, run: result.run, reused: false });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /drafts/:draftId/cancel
   * Abort the draft's in-flight run. The run itself reports the cancellation.
   */
  router.post('/drafts/:draftId/cancel', (req, res) => {
    try {
      const reason = isRecord(req.body) ? optionalString(req.body, 'reason') : undefined;
      const draftId = req.params.draftId;
      if (!orchestrator.cancel(draftId, reason)) {
        res.status(404).json(apiError(notFoundError('Active run for draft', draftId)));
        return;
      }
      res.status(202).json({ draftId, canceled: true });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/drafts/:draftId/runs', async (req, res) => {
    try {
      const limit = queryInt('limit', req.query.limit, 1, 500);
      const offset = queryInt('offset', req.query.offset, 0);
      const runs = await store.lifecycles.listByDraft(req.params.draftId, { limit, offset });
      res.json({ runs });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId', async (req, res) => {
    try {
      const run = await store.lifecycles.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(notFoundError('Run', req.params.runId)));
        return;
      }
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/runs/:runId/events', async (req, res) => {
    try {
      const run = await store.lifecycles.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(notFoundError('Run', req.params.runId)));
        return;
      }
      const events = await publisher.getEventsByRun(run.id);
      res.json({ events });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
