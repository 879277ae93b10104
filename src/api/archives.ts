/**
 * Draft archive record routes.
 *
 * GET    /archives              List records (draftId, userId, limit, offset)
 * GET    /archives/stats        Aggregate counts
 * GET    /archives/by-draft     Record for a draft and optional version
 * GET    /archives/:archiveId   One record
 * PATCH  /archives/:archiveId   Update progress fields or the download URL
 * DELETE /archives/:archiveId   Delete a record and its uploaded object
 */

import { Router } from 'express';
import { apiError, LifecycleError, notFoundError, validationError } from '../domain/errors';
import { DraftArchiveService } from '../archives/draft-archive-service';
import { isRecord, queryInt, queryString, sendError } from './middleware';

export function createArchiveRoutes(archives: DraftArchiveService): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    try {
      const result = await archives.list({
        draftId: queryString(req.query.draftId),
        userId: queryString(req.query.userId),
        limit: queryInt('limit', req.query.limit, 1, 500),
        offset: queryInt('offset', req.query.offset, 0),
      });
      res.json({
        archives: result.items,
        total: result.total,
        limit: result.limit,
        offset: result.offset,
        hasMore: result.hasMore,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/stats', async (_req, res) => {
    try {
      res.json({ stats: await archives.stats() });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/by-draft', async (req, res) => {
    try {
      const draftId = queryString(req.query.draftId);
      if (!draftId) {
        throw new LifecycleError(validationError('draftId query parameter is required', { field: 'draftId' }));
      }
      const draftVersion = queryInt('draftVersion', req.query.draftVersion, 0);
      const archive = await archives.getByDraft(draftId, draftVersion);
      if (!archive) {
        const label = draftVersion === undefined ? draftId : `${draftId}@${draftVersion}`;
        res.status(404).json(apiError(notFoundError('Archive for draft', label)));
        return;
      }
      res.json({ archive });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/:archiveId', async (req, res) => {
    try {
      const archive = await archives.get(req.params.archiveId);
      if (!archive) {
        res.status(404).json(apiError(notFoundError('Archive', req.params.archiveId)));
        return;
      }
      res.json({ archive });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.patch('/:archiveId', async (req, res) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new LifecycleError(validationError('Request body must be a JSON object'));
      }
      const archive = await archives.update(req.params.archiveId, body);
      if (!archive) {
        res.status(404).json(apiError(notFoundError('Archive', req.params.archiveId)));
        return;
      }
      res.json({ archive });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete('/:archiveId', async (req, res) => {
    try {
      const deleted = await archives.delete(req.params.archiveId);
      if (!deleted) {
        res.status(404).json(apiError(notFoundError('Archive', req.params.archiveId)));
        return;
      }
      res.json({ archiveId: req.params.archiveId, deleted: true });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
